import path from 'path';
import { PassThrough, Writable } from 'stream';
import type { Readable } from 'stream';
import { finished } from 'stream/promises';
import ssh2 from 'ssh2';
import type { ConnectConfig, SFTPWrapper } from 'ssh2';
import { PosixPermissions } from '../attributes/posix.js';
import { POSIX_PERMISSIONS } from '../attributes/types.js';
import type { AttributeMap } from '../attributes/types.js';
import { FOLDER, LINK, SshOptionsSchema, permissionBits, typeFromMode } from '../types/index.js';
import type { EntryStat, FileType, SshOptions } from '../types/index.js';
import {
    NotAFileError,
    NotFoundError,
    PermissionError,
    UnsupportedOperationError,
    translateError,
} from '../utils/errors.js';
import { backendLogger } from '../utils/logger.js';
import { NodePathModel } from './paths.js';
import type {
    AttributeOperations,
    Backend,
    LinkOperations,
    ListOperations,
    RenameOperations,
    WriteOperations,
} from './types.js';

// SFTP status codes (draft-ietf-secsh-filexfer-02)
const SFTP_NO_SUCH_FILE = 2;
const SFTP_PERMISSION_DENIED = 3;
const SFTP_OP_UNSUPPORTED = 8;

export interface SftpAttributes {
    mode: number;
    size: number;
}

/**
 * Promise view of an SFTP channel. Failures carry the SFTP status as a
 * numeric `code`.
 */
export interface SftpSession {
    lstat(path: string): Promise<SftpAttributes>;
    stat(path: string): Promise<SftpAttributes>;
    readlink(path: string): Promise<string>;
    readdir(path: string): Promise<string[]>;
    createReadStream(path: string): Readable;
    createWriteStream(path: string, append: boolean): Writable;
    mkdir(path: string): Promise<void>;
    unlink(path: string): Promise<void>;
    rmdir(path: string): Promise<void>;
    symlink(path: string, target: string): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    chmod(path: string, mode: number): Promise<void>;
    end(): void;
}

type Done<T> = (error: Error | null | undefined, value: T) => void;

function settle<T>(run: (done: Done<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        run((error, value) => {
            if (error) {
                reject(error);
            } else {
                resolve(value);
            }
        });
    });
}

function settleVoid(run: (done: (error?: Error | null) => void) => void): Promise<void> {
    return settle<void>(done => run(error => done(error, undefined)));
}

/**
 * Adapt an ssh2 SFTP channel to SftpSession
 */
export function wrapSftp(sftp: SFTPWrapper): SftpSession {
    return {
        lstat: filePath => settle<SftpAttributes>(done => sftp.lstat(filePath, done)),
        stat: filePath => settle<SftpAttributes>(done => sftp.stat(filePath, done)),
        readlink: filePath => settle<string>(done => sftp.readlink(filePath, done)),
        readdir: async filePath => {
            const entries = await settle<{ filename: string }[]>(done => sftp.readdir(filePath, done));
            return entries.map(entry => entry.filename);
        },
        createReadStream: filePath => sftp.createReadStream(filePath),
        createWriteStream: (filePath, append) => sftp.createWriteStream(filePath, { flags: append ? 'a' : 'w' }),
        mkdir: filePath => settleVoid(done => sftp.mkdir(filePath, done)),
        unlink: filePath => settleVoid(done => sftp.unlink(filePath, done)),
        rmdir: filePath => settleVoid(done => sftp.rmdir(filePath, done)),
        symlink: (filePath, target) => settleVoid(done => sftp.symlink(target, filePath, done)),
        rename: (from, to) => settleVoid(done => sftp.rename(from, to, done)),
        chmod: (filePath, mode) => settleVoid(done => sftp.chmod(filePath, mode, done)),
        end: () => sftp.end(),
    };
}

function sftpStatus(error: unknown): number | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
        return error.code;
    }
    return undefined;
}

/**
 * Map SFTP status failures onto the error taxonomy
 */
export function translateSftpError(error: unknown, filePath: string): unknown {
    switch (sftpStatus(error)) {
        case SFTP_NO_SUCH_FILE:
            return new NotFoundError(filePath, { cause: error });
        case SFTP_PERMISSION_DENIED:
            return new PermissionError(filePath, { cause: error });
        case SFTP_OP_UNSUPPORTED:
            return new UnsupportedOperationError('sftp request', filePath, { cause: error });
        default:
            return translateError(error, filePath);
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * ssh2 streams fail asynchronously with raw status errors; pass the data
 * through a stream whose errors are already translated
 */
function translatedReadable(source: Readable, filePath: string): Readable {
    const output = new PassThrough();
    source.on('error', error => output.destroy(toError(translateSftpError(error, filePath))));
    output.on('close', () => {
        if (!source.destroyed) {
            source.destroy();
        }
    });
    source.pipe(output);
    return output;
}

function translatedWritable(target: Writable, filePath: string): Writable {
    const translate = (error: unknown) => toError(translateSftpError(error, filePath));
    const sink: Writable = new Writable({
        write(chunk, encoding, callback) {
            target.write(chunk, encoding, error => callback(error ? translate(target.errored ?? error) : null));
        },
        final(callback) {
            void finished(target).then(() => callback(), (error: unknown) => callback(translate(error)));
            target.end();
        },
        destroy(error, callback) {
            if (!target.destroyed) {
                target.destroy();
            }
            callback(error);
        },
    });
    target.on('error', error => sink.destroy(translate(error)));
    return sink;
}

async function sftpCall<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        throw translateSftpError(error, filePath);
    }
}

class SftpPosixPermissions extends PosixPermissions {
    constructor(private readonly session: SftpSession, private readonly path: string) {
        super();
    }

    async getMode(): Promise<number> {
        const attributes = await sftpCall(this.path, () => this.session.lstat(this.path));
        return permissionBits(attributes.mode);
    }

    async setMode(mode: number): Promise<void> {
        await sftpCall(this.path, () => this.session.chmod(this.path, mode));
    }
}

/**
 * Remote POSIX tree over SFTP
 */
export class SshBackend extends NodePathModel implements Backend, ListOperations, WriteOperations,
    LinkOperations, RenameOperations, AttributeOperations {
    readonly kind = 'ssh';
    readonly defaultBlockSize = 512 * 1024;
    private session: SftpSession;
    private onClose: () => void;

    constructor(session: SftpSession, onClose: () => void = () => session.end()) {
        super(path.posix);
        this.session = session;
        this.onClose = onClose;
    }

    /**
     * Authenticate and open an SFTP channel
     */
    static async connect(options: SshOptions): Promise<SshBackend> {
        const parsed = SshOptionsSchema.parse(options);
        const logger = backendLogger('ssh');
        const client = new ssh2.Client();
        const config: ConnectConfig = {
            host: parsed.host,
            port: parsed.port,
            username: parsed.username,
            password: parsed.password,
            privateKey: parsed.privateKey,
            passphrase: parsed.passphrase,
            readyTimeout: parsed.readyTimeout,
        };

        await new Promise<void>((resolve, reject) => {
            client.once('ready', () => resolve());
            client.once('error', reject);
            client.connect(config);
        });
        logger.debug({ host: parsed.host, port: parsed.port }, 'connected');

        try {
            const sftp = await settle<SFTPWrapper>(done => client.sftp(done));
            return new SshBackend(wrapSftp(sftp), () => {
                sftp.end();
                client.end();
            });
        } catch (error) {
            client.end();
            throw error;
        }
    }

    /**
     * End the SFTP channel and its connection
     */
    close(): void {
        this.onClose();
    }

    async lstat(filePath: string): Promise<EntryStat | null> {
        try {
            const attributes = await this.session.lstat(filePath);
            return { type: typeFromMode(attributes.mode), size: attributes.size, mode: attributes.mode };
        } catch (error) {
            if (sftpStatus(error) === SFTP_NO_SUCH_FILE) {
                return null;
            }
            throw translateSftpError(error, filePath);
        }
    }

    async readlink(filePath: string): Promise<string> {
        return sftpCall(filePath, () => this.session.readlink(filePath));
    }

    private async followedType(filePath: string): Promise<FileType | null> {
        try {
            return typeFromMode((await this.session.stat(filePath)).mode);
        } catch (error) {
            if (sftpStatus(error) === SFTP_NO_SUCH_FILE) {
                return null;
            }
            throw translateSftpError(error, filePath);
        }
    }

    async openRead(filePath: string): Promise<Readable> {
        const type = await this.followedType(filePath);
        if (type === null) {
            throw new NotFoundError(filePath);
        }
        if (type === FOLDER) {
            throw new NotAFileError(filePath);
        }
        return translatedReadable(this.session.createReadStream(filePath), filePath);
    }

    async listNames(filePath: string): Promise<string[] | null> {
        if ((await this.followedType(filePath)) !== FOLDER) {
            return null;
        }
        const names = await sftpCall(filePath, () => this.session.readdir(filePath));
        return names.filter(name => name !== '.' && name !== '..').sort();
    }

    async openWrite(filePath: string, append: boolean): Promise<Writable> {
        if ((await this.followedType(filePath)) === FOLDER) {
            throw new NotAFileError(filePath);
        }
        return translatedWritable(this.session.createWriteStream(filePath, append), filePath);
    }

    async mkdir(filePath: string): Promise<void> {
        await sftpCall(filePath, () => this.session.mkdir(filePath));
    }

    async remove(filePath: string): Promise<void> {
        await sftpCall(filePath, () => this.session.unlink(filePath));
    }

    async rmdir(filePath: string): Promise<void> {
        await sftpCall(filePath, () => this.session.rmdir(filePath));
    }

    async symlink(filePath: string, target: string): Promise<void> {
        await sftpCall(filePath, () => this.session.symlink(filePath, target));
    }

    async rename(from: string, to: string): Promise<void> {
        await sftpCall(from, () => this.session.rename(from, to));
    }

    async attributes(filePath: string, type: FileType | null): Promise<AttributeMap> {
        const attributes = new Map<string, PosixPermissions>();
        // SFTP chmod follows links
        if (type !== null && type !== LINK) {
            attributes.set(POSIX_PERMISSIONS, new SftpPosixPermissions(this.session, filePath));
        }
        return attributes;
    }
}
