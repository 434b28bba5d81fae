import {
    chmod,
    lchmod,
    lstat,
    mkdir,
    mkdtemp,
    open,
    readdir,
    readlink,
    rename,
    rmdir,
    stat,
    symlink,
    unlink,
} from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import type { Readable, Writable } from 'stream';
import { PosixPermissions } from '../attributes/posix.js';
import { POSIX_PERMISSIONS } from '../attributes/types.js';
import type { AttributeMap } from '../attributes/types.js';
import { FileSystem } from '../core/filesystem.js';
import { VFile } from '../core/file.js';
import { LINK, permissionBits, typeFromMode } from '../types/index.js';
import type { EntryStat, FileType } from '../types/index.js';
import {
    NotAFileError,
    UnsupportedOperationError,
    isErrnoException,
    translateError,
    translated,
} from '../utils/errors.js';
import { NodePathModel } from './paths.js';
import type {
    AttributeOperations,
    Backend,
    LinkOperations,
    ListOperations,
    RenameOperations,
    WriteOperations,
} from './types.js';

// Only macOS can change the mode of a symlink itself
const LINK_MODES = process.platform === 'darwin';

function isMissing(error: unknown): boolean {
    return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

class LocalPosixPermissions extends PosixPermissions {
    constructor(private readonly path: string, private readonly isLink: boolean) {
        super();
    }

    async getMode(): Promise<number> {
        const stats = await translated(this.path, () => lstat(this.path));
        return permissionBits(stats.mode);
    }

    async setMode(mode: number): Promise<void> {
        if (this.isLink) {
            await translated(this.path, () => lchmod(this.path, mode));
        } else {
            await translated(this.path, () => chmod(this.path, mode));
        }
    }
}

/**
 * Local disk through fs/promises
 */
export class LocalBackend extends NodePathModel implements Backend, ListOperations, WriteOperations,
    LinkOperations, RenameOperations, AttributeOperations {
    readonly kind = 'local';

    constructor() {
        super(path, path.parse(process.cwd()).root, process.platform === 'win32');
    }

    async lstat(filePath: string): Promise<EntryStat | null> {
        try {
            const stats = await lstat(filePath);
            return { type: typeFromMode(stats.mode), size: stats.size, mode: stats.mode };
        } catch (error) {
            if (isMissing(error)) {
                return null;
            }
            throw translateError(error, filePath);
        }
    }

    async readlink(filePath: string): Promise<string> {
        return translated(filePath, () => readlink(filePath));
    }

    async openRead(filePath: string): Promise<Readable> {
        const handle = await translated(filePath, () => open(filePath, 'r'));
        let isDirectory: boolean;
        try {
            isDirectory = (await translated(filePath, () => handle.stat())).isDirectory();
        } catch (error) {
            await handle.close();
            throw error;
        }
        if (isDirectory) {
            await handle.close();
            throw new NotAFileError(filePath);
        }
        return handle.createReadStream();
    }

    async listNames(filePath: string): Promise<string[] | null> {
        try {
            if (!(await stat(filePath)).isDirectory()) {
                return null;
            }
        } catch (error) {
            if (isMissing(error)) {
                return null;
            }
            throw translateError(error, filePath);
        }
        const names = await translated(filePath, () => readdir(filePath));
        return names.sort();
    }

    async openWrite(filePath: string, append: boolean): Promise<Writable> {
        const handle = await translated(filePath, () => open(filePath, append ? 'a' : 'w'));
        return handle.createWriteStream();
    }

    async mkdir(filePath: string): Promise<void> {
        await translated(filePath, () => mkdir(filePath));
    }

    async remove(filePath: string): Promise<void> {
        await translated(filePath, () => unlink(filePath));
    }

    async rmdir(filePath: string): Promise<void> {
        await translated(filePath, () => rmdir(filePath));
    }

    async symlink(filePath: string, target: string): Promise<void> {
        await translated(filePath, () => symlink(target, filePath));
    }

    async rename(from: string, to: string): Promise<void> {
        await translated(from, () => rename(from, to));
    }

    async attributes(filePath: string, type: FileType | null): Promise<AttributeMap> {
        const attributes = new Map<string, PosixPermissions>();
        if (type !== null && (type !== LINK || LINK_MODES)) {
            attributes.set(POSIX_PERMISSIONS, new LocalPosixPermissions(filePath, type === LINK));
        }
        return attributes;
    }
}

export const localBackend = new LocalBackend();

export const localFileSystem = new FileSystem(localBackend);

/**
 * Local handle for a path, resolved against the working directory when
 * relative
 */
export function file(...paths: string[]): VFile {
    return new VFile(localBackend, path.resolve(...paths));
}

export interface TemporaryFolderOptions {
    /**
     * Local folder to create it in; defaults to the OS temp directory
     */
    parent?: VFile;
    prefix?: string;
    deleteOnExit?: boolean;
}

/**
 * New empty folder with a unique name
 */
export async function createTemporaryFolder(options: TemporaryFolderOptions = {}): Promise<VFile> {
    const { parent, prefix = 'tmp', deleteOnExit = false } = options;
    if (parent && parent.backend.kind !== localBackend.kind) {
        throw new UnsupportedOperationError(`local temporary folder in ${parent.backend.kind}`, parent.path);
    }
    const base = parent ? parent.path : tmpdir();
    const created = await translated(base, () => mkdtemp(path.join(base, prefix)));
    const folder = file(created);
    folder.setDeleteOnExit(deleteOnExit);
    return folder;
}
