import type { Backend } from '../adapters/types.js';
import type { VFile } from '../core/file.js';
import { getLogger } from './logger.js';

export interface CleanupFailure {
    file: VFile;
    error: unknown;
}

/**
 * Files to delete when the host application shuts down. Nothing hooks process
 * exit; the host calls runCleanup() from its own shutdown path.
 */
export class CleanupRegistry {
    private files = new Map<Backend, Map<string, VFile>>();

    add(file: VFile): void {
        let paths = this.files.get(file.backend);
        if (!paths) {
            paths = new Map();
            this.files.set(file.backend, paths);
        }
        paths.set(file.path, file);
    }

    discard(file: VFile): void {
        const paths = this.files.get(file.backend);
        paths?.delete(file.path);
        if (paths?.size === 0) {
            this.files.delete(file.backend);
        }
    }

    has(file: VFile): boolean {
        return this.files.get(file.backend)?.has(file.path) ?? false;
    }

    get size(): number {
        let total = 0;
        for (const paths of this.files.values()) {
            total += paths.size;
        }
        return total;
    }

    /**
     * Delete every registered file, continuing past failures. The registry is
     * empty afterwards; failures are logged and returned.
     */
    async runCleanup(): Promise<CleanupFailure[]> {
        const pending = [...this.files.values()].flatMap(paths => [...paths.values()]);
        this.files.clear();

        const failures: CleanupFailure[] = [];
        for (const file of pending) {
            try {
                await file.delete({ ignoreMissing: true });
            } catch (error) {
                getLogger().warn({ file: file.toString(), err: error }, 'cleanup failed');
                failures.push({ file, error });
            }
        }
        getLogger().debug({ deleted: pending.length - failures.length, failed: failures.length }, 'cleanup finished');
        return failures;
    }
}

/**
 * Process-scoped registry used by VFile.setDeleteOnExit and isDeletedOnExit by default
 */
export const cleanupRegistry = new CleanupRegistry();
