import { createHash, getHashes } from 'crypto';
import type { Hash } from 'crypto';
import { UnsupportedOperationError } from './errors.js';

/**
 * Create a digest accumulator, rejecting names node:crypto does not know
 */
export function createDigest(algorithm: string): Hash {
    if (!getHashes().includes(algorithm.toLowerCase())) {
        throw new UnsupportedOperationError(`hash:${algorithm}`);
    }
    return createHash(algorithm);
}

/**
 * Feed every block of a stream into a digest
 */
export async function digestBlocks(blocks: AsyncIterable<Uint8Array>, algorithm: string): Promise<Buffer> {
    const hasher = createDigest(algorithm);
    for await (const block of blocks) {
        hasher.update(block);
    }
    return hasher.digest();
}

/**
 * Compute the hex digest of an in-memory value
 */
export function computeHash(data: string | Uint8Array, algorithm = 'md5'): string {
    return createDigest(algorithm).update(data).digest('hex');
}
