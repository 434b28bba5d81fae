import { describe, it, expect } from 'vitest';
import { computeHash, createDigest, digestBlocks } from '../src/utils/hash.js';
import { UnsupportedOperationError } from '../src/utils/errors.js';

async function* blocks(...parts: string[]): AsyncGenerator<Uint8Array> {
    for (const part of parts) {
        yield Buffer.from(part);
    }
}

describe('Hash Utils', () => {
    describe('computeHash', () => {
        it('should default to md5', () => {
            expect(computeHash('hello')).toBe('5d41402abc4b2a76b9719d911017c592');
            expect(computeHash('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
        });

        it('should accept other algorithms', () => {
            expect(computeHash('abc', 'sha1')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
        });

        it('should treat strings and bytes alike', () => {
            expect(computeHash(Buffer.from('hello'))).toBe(computeHash('hello'));
        });
    });

    describe('digestBlocks', () => {
        it('should digest a stream of blocks as one value', async () => {
            const digest = await digestBlocks(blocks('hel', 'lo'), 'md5');
            expect(digest.toString('hex')).toBe('5d41402abc4b2a76b9719d911017c592');
        });

        it('should digest an empty stream', async () => {
            const digest = await digestBlocks(blocks(), 'md5');
            expect(digest.toString('hex')).toBe('d41d8cd98f00b204e9800998ecf8427e');
        });
    });

    describe('createDigest', () => {
        it('should accept algorithm names in any case', () => {
            expect(createDigest('SHA256').update('hello').digest('hex'))
                .toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
        });

        it('should reject unknown algorithms', () => {
            expect(() => createDigest('nonesuch')).toThrow(UnsupportedOperationError);
            expect(() => computeHash('x', 'nonesuch')).toThrow("Operation 'hash:nonesuch' not supported");
        });
    });
});
