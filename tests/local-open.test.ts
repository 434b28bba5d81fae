import { describe, it, expect, vi } from 'vitest';
import { localBackend } from '../src/adapters/local.js';

const handles = vi.hoisted(() => ({ closed: 0 }));

vi.mock('fs/promises', async importOriginal => {
    const actual = await importOriginal<typeof import('fs/promises')>();
    return {
        ...actual,
        open: async () => ({
            stat: async () => {
                throw Object.assign(new Error('EIO: i/o error, fstat'), { code: 'EIO' });
            },
            close: async () => {
                handles.closed++;
            },
        }),
    };
});

describe('Local backend file handles', () => {
    it('should close the handle when stat fails after opening', async () => {
        await expect(localBackend.openRead('/srv/data/file')).rejects.toThrow('EIO: i/o error');
        expect(handles.closed).toBe(1);
    });
});
