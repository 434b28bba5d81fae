import path from 'path';
import { PassThrough, Writable } from 'stream';
import type { Readable } from 'stream';
import ftp from 'basic-ftp';
import { FOLDER, FILE, FtpOptionsSchema } from '../types/index.js';
import type { EntryStat, FtpOptions } from '../types/index.js';
import {
    NotAFileError,
    NotFoundError,
    PermissionError,
    UnsupportedOperationError,
    translateError,
} from '../utils/errors.js';
import { backendLogger } from '../utils/logger.js';
import { NodePathModel } from './paths.js';
import type { Backend, ListOperations, RenameOperations, WriteOperations } from './types.js';

// Reply codes
const FTP_NOT_LOGGED_IN = 530;
const FTP_UNAVAILABLE = 550;
const FTP_NOT_IMPLEMENTED = 502;
const FTP_PARAMETER_NOT_IMPLEMENTED = 504;
const FTP_NAME_NOT_ALLOWED = 553;

/**
 * The part of a basic-ftp Client this backend drives. Only one command may be
 * in flight at a time.
 */
export interface FtpSession {
    cd(path: string): Promise<unknown>;
    size(path: string): Promise<number>;
    list(path: string): Promise<{ name: string }[]>;
    downloadTo(destination: Writable, path: string): Promise<unknown>;
    uploadFrom(source: Readable, path: string): Promise<unknown>;
    appendFrom(source: Readable, path: string): Promise<unknown>;
    remove(path: string): Promise<unknown>;
    send(command: string): Promise<unknown>;
    rename(from: string, to: string): Promise<unknown>;
    close(): void;
}

function replyCode(error: unknown): number | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
        return error.code;
    }
    return undefined;
}

/**
 * Map FTP reply failures onto the error taxonomy
 */
export function translateFtpError(error: unknown, filePath: string): unknown {
    switch (replyCode(error)) {
        case FTP_UNAVAILABLE:
            return new NotFoundError(filePath, { cause: error });
        case FTP_NOT_LOGGED_IN:
        case FTP_NAME_NOT_ALLOWED:
            return new PermissionError(filePath, { cause: error });
        case FTP_NOT_IMPLEMENTED:
        case FTP_PARAMETER_NOT_IMPLEMENTED:
            return new UnsupportedOperationError('ftp command', filePath, { cause: error });
        default:
            return translateError(error, filePath);
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

async function ftpCall<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        throw translateFtpError(error, filePath);
    }
}

/**
 * Remote tree over plain or explicit-TLS FTP. No links and no attributes.
 */
export class FtpBackend extends NodePathModel implements Backend, ListOperations, WriteOperations, RenameOperations {
    readonly kind = 'ftp';
    private session: FtpSession;

    constructor(session: FtpSession) {
        super(path.posix);
        this.session = session;
    }

    static async connect(options: FtpOptions): Promise<FtpBackend> {
        const parsed = FtpOptionsSchema.parse(options);
        const client = new ftp.Client(parsed.timeout);
        try {
            await client.access({
                host: parsed.host,
                port: parsed.port,
                user: parsed.user,
                password: parsed.password,
                secure: parsed.secure,
            });
        } catch (error) {
            client.close();
            throw translateFtpError(error, '/');
        }
        backendLogger('ftp').debug({ host: parsed.host, port: parsed.port }, 'connected');
        return new FtpBackend(client);
    }

    close(): void {
        this.session.close();
    }

    /**
     * A folder if we can cd into it, a file if it has a size, absent when the
     * server answers 550 to both
     */
    async lstat(filePath: string): Promise<EntryStat | null> {
        try {
            await this.session.cd(filePath);
            return { type: FOLDER, size: 0 };
        } catch (error) {
            if (replyCode(error) !== FTP_UNAVAILABLE) {
                throw translateFtpError(error, filePath);
            }
        }
        try {
            return { type: FILE, size: await this.session.size(filePath) };
        } catch (error) {
            if (replyCode(error) === FTP_UNAVAILABLE) {
                return null;
            }
            throw translateFtpError(error, filePath);
        }
    }

    async readlink(filePath: string): Promise<string> {
        throw new UnsupportedOperationError('readlink on ftp', filePath);
    }

    async openRead(filePath: string): Promise<Readable> {
        const stat = await this.lstat(filePath);
        if (!stat) {
            throw new NotFoundError(filePath);
        }
        if (stat.type !== FILE) {
            throw new NotAFileError(filePath);
        }

        const stream = new PassThrough();
        void this.session.downloadTo(stream, filePath).then(
            () => {
                if (!stream.writableEnded) {
                    stream.end();
                }
            },
            (error: unknown) => stream.destroy(toError(translateFtpError(error, filePath))),
        );
        return stream;
    }

    async listNames(filePath: string): Promise<string[] | null> {
        if ((await this.lstat(filePath))?.type !== FOLDER) {
            return null;
        }
        const entries = await ftpCall(filePath, () => this.session.list(filePath));
        return entries
            .map(entry => entry.name)
            .filter(name => name !== '.' && name !== '..')
            .sort();
    }

    /**
     * Streams into a STOR (or APPE) transfer. The returned stream finishes only
     * once the server has acknowledged the upload.
     */
    async openWrite(filePath: string, append: boolean): Promise<Writable> {
        if ((await this.lstat(filePath))?.type === FOLDER) {
            throw new NotAFileError(filePath);
        }

        const body = new PassThrough();
        const upload = append
            ? this.session.appendFrom(body, filePath)
            : this.session.uploadFrom(body, filePath);
        const finished: Promise<Error | null> = upload.then(
            () => null,
            (error: unknown) => {
                const failure = toError(translateFtpError(error, filePath));
                sink.destroy(failure);
                return failure;
            },
        );

        const sink = new Writable({
            write(chunk, encoding, callback) {
                if (body.write(chunk, encoding)) {
                    callback();
                } else {
                    body.once('drain', () => callback());
                }
            },
            final(callback) {
                body.end();
                void finished.then(error => callback(error));
            },
        });
        return sink;
    }

    async mkdir(filePath: string): Promise<void> {
        await ftpCall(filePath, () => this.session.send(`MKD ${filePath}`));
    }

    async remove(filePath: string): Promise<void> {
        await ftpCall(filePath, () => this.session.remove(filePath));
    }

    async rmdir(filePath: string): Promise<void> {
        await ftpCall(filePath, () => this.session.send(`RMD ${filePath}`));
    }

    async rename(from: string, to: string): Promise<void> {
        await ftpCall(from, () => this.session.rename(from, to));
    }
}
