import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryBackend } from '../src/adapters/memory.js';
import { UrlBackend } from '../src/adapters/url.js';
import { FileSystem } from '../src/core/filesystem.js';
import { VFile } from '../src/core/file.js';
import type { TraversalFilter } from '../src/core/file.js';
import { BOTH, RECURSE, SKIP, YIELD } from '../src/types/index.js';
import { excludeFilter } from '../src/utils/patterns.js';

async function collect(walk: AsyncIterable<VFile>): Promise<string[]> {
    const paths: string[] = [];
    for await (const handle of walk) {
        paths.push(handle.path);
    }
    return paths;
}

describe('Recursive traversal', () => {
    let fs: FileSystem<MemoryBackend>;

    beforeEach(async () => {
        // /t/{x/{deep}, y, z.tmp, build/{out}}
        fs = new FileSystem(new MemoryBackend());
        await fs.file('t', 'x').createFolder({ recursive: true });
        await fs.file('t', 'x', 'deep').write('1');
        await fs.file('t', 'y').write('2');
        await fs.file('t', 'z.tmp').write('3');
        await fs.file('t', 'build').createFolder();
        await fs.file('t', 'build', 'out').write('4');
    });

    it('should walk in pre-order', async () => {
        expect(await collect(fs.file('t').recurse())).toEqual([
            '/t',
            '/t/build',
            '/t/build/out',
            '/t/x',
            '/t/x/deep',
            '/t/y',
            '/t/z.tmp',
        ]);
    });

    it('should omit only the starting handle without includeSelf', async () => {
        const paths = await collect(fs.file('t', 'x').recurse(undefined, { includeSelf: false }));
        expect(paths).toEqual(['/t/x/deep']);
    });

    it('should yield a file on its own', async () => {
        expect(await collect(fs.file('t', 'y').recurse())).toEqual(['/t/y']);
    });

    it('should honour yield-only and recurse-only outcomes', async () => {
        const filter: TraversalFilter = handle => (handle.name === 'x' ? YIELD : handle.name === 'build' ? RECURSE : BOTH);
        expect(await collect(fs.file('t').recurse(filter))).toEqual([
            '/t',
            '/t/build/out',
            '/t/x',
            '/t/y',
            '/t/z.tmp',
        ]);
    });

    it('should descend into skipped folders only when recurseSkipped is set', async () => {
        const filter: TraversalFilter = handle => handle.name !== 'build';

        expect(await collect(fs.file('t').recurse(filter))).toContain('/t/build/out');
        const pruned = await collect(fs.file('t').recurse(filter, { recurseSkipped: false }));
        expect(pruned).toEqual(['/t', '/t/x', '/t/x/deep', '/t/y', '/t/z.tmp']);
    });

    it('should accept asynchronous filters', async () => {
        const filter: TraversalFilter = async handle => ((await handle.isFile()) ? YIELD : SKIP);
        expect(await collect(fs.file('t').recurse(filter))).toEqual([
            '/t/build/out',
            '/t/x/deep',
            '/t/y',
            '/t/z.tmp',
        ]);
    });

    it('should prune with exclusion patterns', async () => {
        const root = fs.file('t');
        const paths = await collect(root.recurse(excludeFilter(root, ['*.tmp', 'build/']), { recurseSkipped: false }));
        expect(paths).toEqual(['/t', '/t/x', '/t/x/deep', '/t/y']);
    });

    it('should glob names directly below a folder', async () => {
        const paths = (handles: VFile[]) => handles.map(handle => handle.path);

        expect(paths(await fs.file('t').glob('*'))).toEqual(['/t/build', '/t/x', '/t/y', '/t/z.tmp']);
        expect(paths(await fs.file('t').glob('*.tmp'))).toEqual(['/t/z.tmp']);
        expect(paths(await fs.file('t').glob('missing'))).toEqual([]);
    });

    it('should glob across folder levels', async () => {
        const paths = (handles: VFile[]) => handles.map(handle => handle.path);

        expect(paths(await fs.file('t').glob('*/*'))).toEqual(['/t/build/out', '/t/x/deep']);
        expect(paths(await fs.file('t').glob('x/?eep'))).toEqual(['/t/x/deep']);
        expect(paths(await fs.file('t').glob('**/deep'))).toEqual(['/t/x/deep']);
    });

    it('should not descend on backends that cannot list', async () => {
        const backend = new UrlBackend('http://example.com/', {
            fetch: async () => new Response(null, { status: 200 }),
        });
        const page = new VFile(backend, 'http://example.com/index.html');
        expect(await collect(page.recurse())).toEqual(['http://example.com/index.html']);
    });
});
