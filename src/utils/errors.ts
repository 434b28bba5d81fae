/**
 * Error taxonomy shared by every backend.
 *
 * Backends translate native failures into these classes where the cause maps
 * onto a known POSIX error code; anything else propagates unchanged.
 */

export interface FileErrorOptions {
    cause?: unknown;
    message?: string;
}

/**
 * Base class for all file errors
 */
export class FileError extends Error {
    readonly code: string;
    readonly path?: string;

    constructor(code: string, description: string, path?: string, options: FileErrorOptions = {}) {
        super(options.message ?? (path === undefined ? description : `${description}: '${path}'`), {
            cause: options.cause,
        });
        this.name = 'FileError';
        this.code = code;
        this.path = path;
    }
}

export class NotFoundError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('ENOENT', 'No such file or directory', path, options);
        this.name = 'NotFoundError';
    }
}

export class AlreadyExistsError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('EEXIST', 'File exists', path, options);
        this.name = 'AlreadyExistsError';
    }
}

export class NotADirectoryError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('ENOTDIR', 'Not a directory', path, options);
        this.name = 'NotADirectoryError';
    }
}

export class NotAFileError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('EISDIR', 'Not a regular file', path, options);
        this.name = 'NotAFileError';
    }
}

export class PermissionError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('EACCES', 'Permission denied', path, options);
        this.name = 'PermissionError';
    }
}

export class UnsupportedOperationError extends FileError {
    readonly operation: string;

    constructor(operation: string, path?: string, options?: FileErrorOptions) {
        super('ENOTSUP', `Operation '${operation}' not supported`, path, options);
        this.name = 'UnsupportedOperationError';
        this.operation = operation;
    }
}

export class SymlinkLoopError extends FileError {
    constructor(path?: string, options?: FileErrorOptions) {
        super('ELOOP', 'Too many levels of symbolic links', path, options);
        this.name = 'SymlinkLoopError';
    }
}

/**
 * Thrown by safeChild when the requested names resolve outside the parent
 */
export class EscapeError extends FileError {
    readonly names: readonly string[];

    constructor(path: string, names: readonly string[]) {
        super('EESCAPE', `Names ${JSON.stringify(names)} escape the parent`, path);
        this.name = 'EscapeError';
        this.names = names;
    }
}

type ErrorFactory = (path: string | undefined, options: FileErrorOptions) => FileError;

const ERRNO_TABLE: Record<string, ErrorFactory> = {
    ENOENT: (path, options) => new NotFoundError(path, options),
    EEXIST: (path, options) => new AlreadyExistsError(path, options),
    ENOTDIR: (path, options) => new NotADirectoryError(path, options),
    EISDIR: (path, options) => new NotAFileError(path, options),
    EACCES: (path, options) => new PermissionError(path, options),
    EPERM: (path, options) => new PermissionError(path, options),
    ENOTSUP: (path, options) => new UnsupportedOperationError('native call', path, options),
    EOPNOTSUPP: (path, options) => new UnsupportedOperationError('native call', path, options),
    ENOSYS: (path, options) => new UnsupportedOperationError('native call', path, options),
    ELOOP: (path, options) => new SymlinkLoopError(path, options),
};

/**
 * Narrow an unknown value to a Node errno exception
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map a native error onto the taxonomy. Errors that are already FileErrors, or
 * whose code is unknown, are returned as they are.
 */
export function translateError(error: unknown, path?: string): unknown {
    if (error instanceof FileError || !isErrnoException(error) || !error.code) {
        return error;
    }
    const factory = ERRNO_TABLE[error.code];
    if (!factory) {
        return error;
    }
    return factory(path ?? error.path, { cause: error });
}

/**
 * Run a backend call, translating whatever it throws
 */
export async function translated<T>(path: string, operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        throw translateError(error, path);
    }
}

/**
 * True for the errors a filesystem raises when an extended attribute name is
 * outside the namespaces the caller may write
 */
export function isAttributeNameRestriction(error: unknown): boolean {
    return error instanceof PermissionError || error instanceof UnsupportedOperationError ||
        (isErrnoException(error) && (error.code === 'EINVAL' || error.code === 'ERANGE'));
}
