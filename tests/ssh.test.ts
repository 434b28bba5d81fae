import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createReadStream, createWriteStream, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { chmod, lstat, mkdir, readdir, readlink, rename, rmdir, stat, symlink, unlink } from 'fs/promises';
import { join } from 'path';
import { Readable, Writable } from 'stream';
import { MemoryBackend } from '../src/adapters/memory.js';
import { SshBackend, translateSftpError } from '../src/adapters/ssh.js';
import type { SftpAttributes, SftpSession } from '../src/adapters/ssh.js';
import { PosixPermissions } from '../src/attributes/posix.js';
import { POSIX_PERMISSIONS } from '../src/attributes/types.js';
import { FileSystem } from '../src/core/filesystem.js';
import { isErrnoException, NotFoundError, PermissionError, UnsupportedOperationError } from '../src/utils/errors.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'ssh');

class SftpStatusError extends Error {
    constructor(readonly code: number, message: string) {
        super(message);
    }
}

const STATUS_BY_ERRNO: Record<string, number> = {
    ENOENT: 2,
    EACCES: 3,
};

async function sftp<T>(operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        const errno = isErrnoException(error) ? error.code ?? '' : '';
        throw new SftpStatusError(STATUS_BY_ERRNO[errno] ?? 4, String(error));
    }
}

/**
 * SFTP session served from a local folder, failing with SFTP status codes
 */
class FolderSftpSession implements SftpSession {
    ended = false;

    constructor(private readonly root: string) {}

    private local(remotePath: string): string {
        return join(this.root, remotePath);
    }

    async lstat(remotePath: string): Promise<SftpAttributes> {
        return sftp(() => lstat(this.local(remotePath)));
    }

    async stat(remotePath: string): Promise<SftpAttributes> {
        return sftp(() => stat(this.local(remotePath)));
    }

    async readlink(remotePath: string): Promise<string> {
        return sftp(() => readlink(this.local(remotePath)));
    }

    async readdir(remotePath: string): Promise<string[]> {
        const names = await sftp(() => readdir(this.local(remotePath)));
        return ['.', '..', ...names.reverse()];
    }

    createReadStream(remotePath: string): Readable {
        return createReadStream(this.local(remotePath));
    }

    createWriteStream(remotePath: string, append: boolean): Writable {
        return createWriteStream(this.local(remotePath), { flags: append ? 'a' : 'w' });
    }

    async mkdir(remotePath: string): Promise<void> {
        await sftp(() => mkdir(this.local(remotePath)));
    }

    async unlink(remotePath: string): Promise<void> {
        await sftp(() => unlink(this.local(remotePath)));
    }

    async rmdir(remotePath: string): Promise<void> {
        await sftp(() => rmdir(this.local(remotePath)));
    }

    async symlink(remotePath: string, target: string): Promise<void> {
        await sftp(() => symlink(target, this.local(remotePath)));
    }

    async rename(from: string, to: string): Promise<void> {
        await sftp(() => rename(this.local(from), this.local(to)));
    }

    async chmod(remotePath: string, mode: number): Promise<void> {
        await sftp(() => chmod(this.local(remotePath), mode));
    }

    end(): void {
        this.ended = true;
    }
}

describe('SSH backend', () => {
    let session: FolderSftpSession;
    let backend: SshBackend;
    let fs: FileSystem<SshBackend>;

    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });
        session = new FolderSftpSession(TEST_DIR);
        backend = new SshBackend(session);
        fs = new FileSystem(backend, { requires: ['list', 'write', 'link', 'rename', 'attributes'] });
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    it('should write and read remote files', async () => {
        await fs.file('docs').createFolder();
        await fs.file('docs', 'readme').write('remote text');

        expect(await fs.file('docs', 'readme').readText()).toBe('remote text');
        expect(readFileSync(join(TEST_DIR, 'docs', 'readme'), 'utf-8')).toBe('remote text');
        expect(await fs.file('docs', 'readme').size()).toBe(11);
    });

    it('should list names sorted without dot entries', async () => {
        await fs.file('b').write('');
        await fs.file('a').createFolder();

        expect(await fs.root.childNames()).toEqual(['a', 'b']);
        expect(await fs.file('b').childNames()).toBeNull();
    });

    it('should report missing paths as absent', async () => {
        expect(await fs.file('ghost').type()).toBeNull();
        await expect(fs.file('ghost').read()).rejects.toThrow(NotFoundError);
    });

    it('should handle links', async () => {
        await fs.file('target').write('linked');
        await fs.file('link').linkTo('target');

        expect(await fs.file('link').type()).toBe('link');
        expect(await fs.file('link').linkTarget()).toBe('target');
        expect(await fs.file('link').readText()).toBe('linked');
    });

    it('should read in large blocks by default', async () => {
        await fs.file('big').write(Buffer.alloc(600 * 1024, 1));

        const sizes: number[] = [];
        for await (const block of fs.file('big').readBlocks()) {
            sizes.push(block.length);
        }
        expect(sizes).toEqual([524288, 90112]);
    });

    it('should expose and change permission bits', async () => {
        await fs.file('script').write('#!/bin/sh');
        const set = (await fs.file('script').attributes()).get(POSIX_PERMISSIONS);
        if (!(set instanceof PosixPermissions)) {
            throw new Error('missing permissions');
        }

        await set.setMode(0o750);
        expect(await set.getMode()).toBe(0o750);
    });

    it('should rename natively and delete trees', async () => {
        await fs.file('tree', 'sub').createFolder({ recursive: true });
        await fs.file('tree', 'sub', 'leaf').write('x');

        await fs.file('tree').renameTo(fs.file('moved'));
        expect(await fs.file('moved', 'sub', 'leaf').readText()).toBe('x');

        await fs.file('moved').delete();
        expect(await fs.root.childNames()).toEqual([]);
    });

    it('should copy trees to and from other backends', async () => {
        const memory = new FileSystem(new MemoryBackend());
        await memory.file('src').createFolder();
        await memory.file('src', 'one').write('1');
        await memory.file('src', 'link').linkTo('one');

        await memory.file('src').copyTo(fs.file('dst'), { dereferenceLinks: false });
        expect(await fs.file('dst', 'one').readText()).toBe('1');
        expect(await fs.file('dst', 'link').linkTarget()).toBe('one');

        await fs.file('dst').copyTo(memory.file('back'));
        expect(await memory.file('back', 'link').readText()).toBe('1');
        expect(await memory.file('back', 'link').isLink()).toBe(false);
    });

    it('should translate failures reported by SFTP streams', async () => {
        session.createWriteStream = () => new Writable({
            construct(callback) {
                callback(new SftpStatusError(2, 'No such file'));
            },
            write(chunk, encoding, callback) {
                callback();
            },
        });
        session.createReadStream = () => new Readable({
            read() {
                this.destroy(new SftpStatusError(2, 'No such file'));
            },
        });

        await expect(fs.file('nodir', 'f').write('x')).rejects.toThrow(NotFoundError);

        writeFileSync(join(TEST_DIR, 'vanishing'), 'x');
        await expect(fs.file('vanishing').read()).rejects.toThrow(NotFoundError);
    });

    it('should end the session on close', () => {
        backend.close();
        expect(session.ended).toBe(true);
    });

    it('should map SFTP status codes onto file errors', () => {
        expect(translateSftpError(new SftpStatusError(2, 'no such file'), '/x')).toBeInstanceOf(NotFoundError);
        expect(translateSftpError(new SftpStatusError(3, 'denied'), '/x')).toBeInstanceOf(PermissionError);
        expect(translateSftpError(new SftpStatusError(8, 'unsupported'), '/x')).toBeInstanceOf(UnsupportedOperationError);

        const other = new SftpStatusError(4, 'failure');
        expect(translateSftpError(other, '/x')).toBe(other);
    });

    it('should validate connection options before connecting', async () => {
        await expect(SshBackend.connect({ host: 'example.invalid', username: 'deploy' }))
            .rejects.toThrow('Either password or privateKey is required');
    });
});
