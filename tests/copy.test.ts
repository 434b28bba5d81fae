import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    chmodSync,
    existsSync,
    lstatSync,
    mkdirSync,
    readFileSync,
    readlinkSync,
    rmSync,
    statSync,
    writeFileSync,
} from 'fs';
import { join } from 'path';
import { file } from '../src/adapters/local.js';
import { MemoryBackend } from '../src/adapters/memory.js';
import { UrlBackend } from '../src/adapters/url.js';
import { PosixPermissions } from '../src/attributes/posix.js';
import { POSIX_PERMISSIONS } from '../src/attributes/types.js';
import { FileSystem } from '../src/core/filesystem.js';
import { VFile } from '../src/core/file.js';
import { AlreadyExistsError, NotFoundError, UnsupportedOperationError } from '../src/utils/errors.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'copy');

async function modeOf(handle: VFile): Promise<number> {
    const set = (await handle.attributes()).get(POSIX_PERMISSIONS);
    if (!(set instanceof PosixPermissions)) {
        throw new Error(`no permissions on ${handle}`);
    }
    return set.getMode();
}

describe('Copying', () => {
    let memory: FileSystem<MemoryBackend>;

    beforeEach(async () => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });

        // src/{file1, link -> file1, sub/file2}
        memory = new FileSystem(new MemoryBackend());
        await memory.file('src', 'sub').createFolder({ recursive: true });
        await memory.file('src', 'file1').write('one');
        await memory.file('src', 'sub', 'file2').write('two');
        await memory.file('src', 'link').linkTo('file1');
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    describe('copyTo across backends', () => {
        it('should reproduce the tree with links kept as links', async () => {
            await memory.file('src').copyTo(file(TEST_DIR, 'dst'), { dereferenceLinks: false });

            expect(readFileSync(join(TEST_DIR, 'dst', 'file1'), 'utf-8')).toBe('one');
            expect(readFileSync(join(TEST_DIR, 'dst', 'sub', 'file2'), 'utf-8')).toBe('two');
            expect(lstatSync(join(TEST_DIR, 'dst', 'link')).isSymbolicLink()).toBe(true);
            expect(readlinkSync(join(TEST_DIR, 'dst', 'link'))).toBe('file1');
            expect(await file(TEST_DIR, 'dst').childNames()).toEqual(['file1', 'link', 'sub']);
        });

        it('should replace links with their target contents when dereferencing', async () => {
            await memory.file('src').copyTo(file(TEST_DIR, 'dst'));

            expect(lstatSync(join(TEST_DIR, 'dst', 'link')).isSymbolicLink()).toBe(false);
            expect(readFileSync(join(TEST_DIR, 'dst', 'link'), 'utf-8')).toBe('one');
        });

        it('should copy permission bits along with contents', async () => {
            writeFileSync(join(TEST_DIR, 'secret'), 'classified');
            chmodSync(join(TEST_DIR, 'secret'), 0o600);

            await file(TEST_DIR, 'secret').copyTo(memory.file('secret'));
            expect(await memory.file('secret').readText()).toBe('classified');
            expect(await modeOf(memory.file('secret'))).toBe(0o600);
        });

        it('should copy a single file into a folder under its own name', async () => {
            mkdirSync(join(TEST_DIR, 'inbox'));
            const created = await memory.file('src', 'sub', 'file2').copyInto(file(TEST_DIR, 'inbox'));

            expect(created.path).toBe(join(TEST_DIR, 'inbox', 'file2'));
            expect(readFileSync(join(TEST_DIR, 'inbox', 'file2'), 'utf-8')).toBe('two');
        });
    });

    describe('Existing targets', () => {
        it('should refuse an existing target without overwrite', async () => {
            writeFileSync(join(TEST_DIR, 'taken'), 'old');

            await expect(memory.file('src', 'file1').copyTo(file(TEST_DIR, 'taken')))
                .rejects.toThrow(AlreadyExistsError);
            expect(readFileSync(join(TEST_DIR, 'taken'), 'utf-8')).toBe('old');
        });

        it('should replace an existing target with overwrite', async () => {
            mkdirSync(join(TEST_DIR, 'taken', 'deep'), { recursive: true });

            await memory.file('src', 'file1').copyTo(file(TEST_DIR, 'taken'), { overwrite: true });
            expect(statSync(join(TEST_DIR, 'taken')).isFile()).toBe(true);
            expect(readFileSync(join(TEST_DIR, 'taken'), 'utf-8')).toBe('one');
        });

        it('should keep the target when the source is missing', async () => {
            writeFileSync(join(TEST_DIR, 'taken'), 'old');

            await expect(memory.file('nothing').copyTo(file(TEST_DIR, 'taken'), { overwrite: true }))
                .rejects.toThrow(NotFoundError);
            expect(readFileSync(join(TEST_DIR, 'taken'), 'utf-8')).toBe('old');
        });
    });

    describe('Failures', () => {
        it('should fail when a dereferenced link leads nowhere', async () => {
            await memory.file('dangling').linkTo('gone');

            await expect(memory.file('dangling').copyTo(memory.file('copy'))).rejects.toThrow(NotFoundError);
            expect(await memory.file('copy').exists()).toBe(false);
        });

        it('should recreate broken links verbatim without dereferencing', async () => {
            await memory.file('dangling').linkTo('gone');

            await memory.file('dangling').copyTo(memory.file('copy'), { dereferenceLinks: false });
            expect(await memory.file('copy').linkTarget()).toBe('gone');
        });

        it('should refuse a target backend that cannot write', async () => {
            const backend = new UrlBackend('http://example.com/', {
                fetch: async () => new Response(null, { status: 404 }),
            });
            const readOnly = new VFile(backend, 'http://example.com/file1');

            await expect(memory.file('src', 'file1').copyTo(readOnly)).rejects.toThrow(UnsupportedOperationError);
        });
    });

    describe('renameTo', () => {
        it('should fall back to copy and delete across backends', async () => {
            await memory.file('src').renameTo(file(TEST_DIR, 'moved'));

            expect(await memory.file('src').exists()).toBe(false);
            expect(readFileSync(join(TEST_DIR, 'moved', 'sub', 'file2'), 'utf-8')).toBe('two');
        });

        it('should fall back between two memory backends', async () => {
            const other = new FileSystem(new MemoryBackend());

            await memory.file('src', 'file1').renameTo(other.file('file1'));
            expect(await memory.file('src', 'file1').exists()).toBe(false);
            expect(await other.file('file1').readText()).toBe('one');
        });

        it('should refuse an atomic rename across backends', async () => {
            await expect(memory.file('src', 'file1').atomicRenameTo(file(TEST_DIR, 'x')))
                .rejects.toThrow(UnsupportedOperationError);
            expect(await memory.file('src', 'file1').exists()).toBe(true);
        });
    });
});
