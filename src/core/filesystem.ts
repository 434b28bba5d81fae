import type { Backend } from '../adapters/types.js';
import { capabilitiesOf } from '../adapters/types.js';
import type { Capability } from '../types/index.js';
import { assertCapabilities } from './capabilities.js';
import { VFile } from './file.js';

export interface FileSystemOptions {
    /**
     * Capabilities the caller relies on; construction fails if any is missing
     */
    requires?: readonly Capability[];
}

/**
 * Entry point onto one backend
 */
export class FileSystem<B extends Backend = Backend> {
    readonly backend: B;

    constructor(backend: B, options: FileSystemOptions = {}) {
        assertCapabilities(backend, options.requires ?? []);
        this.backend = backend;
    }

    get root(): VFile {
        return new VFile(this.backend, this.backend.rootPath);
    }

    /**
     * Handle for names resolved against the root
     */
    file(...names: string[]): VFile {
        return this.root.child(...names);
    }

    get capabilities(): Capability[] {
        return capabilitiesOf(this.backend);
    }
}
