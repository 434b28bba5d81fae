import path from 'path';
import type { PlatformPath } from 'path';
import type { PathModel } from './types.js';

/**
 * Path model over one of Node's path flavours. Remote backends use the POSIX
 * flavour whatever the local platform is.
 */
export class NodePathModel implements PathModel {
    readonly separator: string;
    readonly rootPath: string;
    private flavour: PlatformPath;
    private caseInsensitive: boolean;

    constructor(flavour: PlatformPath = path.posix, rootPath: string = flavour.sep, caseInsensitive = false) {
        this.flavour = flavour;
        this.separator = flavour.sep;
        this.rootPath = flavour.resolve(rootPath);
        this.caseInsensitive = caseInsensitive;
    }

    join(base: string, names: readonly string[]): string {
        return this.flavour.resolve(base, ...names);
    }

    dirname(path: string): string | null {
        const parent = this.flavour.dirname(path);
        return parent === path ? null : parent;
    }

    split(path: string): string[] {
        return path.split(this.separator);
    }

    relative(path: string, base: string): string[] {
        const relativePath = this.flavour.relative(base, path);
        return relativePath === '' ? [] : relativePath.split(this.separator);
    }

    samePath(a: string, b: string): boolean {
        if (this.caseInsensitive) {
            return a.toLowerCase() === b.toLowerCase();
        }
        return a === b;
    }
}
