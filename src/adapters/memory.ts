import path from 'path';
import { Readable, Writable } from 'stream';
import { PosixPermissions } from '../attributes/posix.js';
import { EXTENDED_ATTRIBUTES, POSIX_PERMISSIONS } from '../attributes/types.js';
import type { AttributeMap, AttributeSet } from '../attributes/types.js';
import { ExtendedAttributes } from '../attributes/xattr.js';
import type { EntryStat, FileType } from '../types/index.js';
import {
    AlreadyExistsError,
    FileError,
    NotADirectoryError,
    NotAFileError,
    NotFoundError,
    PermissionError,
    SymlinkLoopError,
} from '../utils/errors.js';
import { NodePathModel } from './paths.js';
import type {
    AttributeOperations,
    Backend,
    LinkOperations,
    ListOperations,
    RenameOperations,
    WriteOperations,
} from './types.js';

// Linux MAXSYMLINKS
const MAX_LINK_HOPS = 40;

interface EntryMetadata {
    mode: number;
    xattrs: Map<string, Buffer>;
}

type MemoryEntry =
    | EntryMetadata & { type: 'file'; data: Buffer }
    | EntryMetadata & { type: 'folder' }
    | EntryMetadata & { type: 'link'; target: string };

export interface MemoryBackendOptions {
    /**
     * Extended attribute name prefixes that may be set; others are refused
     * with PermissionError
     */
    xattrNamespaces?: readonly string[];
}

class MemoryPosixPermissions extends PosixPermissions {
    constructor(private readonly backend: MemoryBackend, private readonly key: string) {
        super();
    }

    async getMode(): Promise<number> {
        return this.backend.entryAt(this.key).mode;
    }

    async setMode(mode: number): Promise<void> {
        this.backend.entryAt(this.key).mode = mode & 0o7777;
    }
}

class MemoryExtendedAttributes extends ExtendedAttributes {
    constructor(
        private readonly backend: MemoryBackend,
        private readonly key: string,
        private readonly namespaces: readonly string[],
    ) {
        super();
    }

    async get(name: string): Promise<Buffer> {
        const value = this.backend.entryAt(this.key).xattrs.get(name);
        if (value === undefined) {
            throw new FileError('ENODATA', `No attribute '${name}'`, this.key);
        }
        return Buffer.from(value);
    }

    async set(name: string, value: Buffer): Promise<void> {
        if (!this.namespaces.some(prefix => name.startsWith(prefix))) {
            throw new PermissionError(this.key, { message: `Attribute '${name}' may not be set on '${this.key}'` });
        }
        this.backend.entryAt(this.key).xattrs.set(name, Buffer.from(value));
    }

    async list(): Promise<string[]> {
        return [...this.backend.entryAt(this.key).xattrs.keys()].sort();
    }

    async delete(name: string): Promise<void> {
        this.backend.entryAt(this.key).xattrs.delete(name);
    }
}

/**
 * In-process POSIX-like tree. Writes land as they are made; nothing is shared
 * between instances.
 */
export class MemoryBackend extends NodePathModel implements Backend, ListOperations, WriteOperations,
    LinkOperations, RenameOperations, AttributeOperations {
    readonly kind = 'memory';
    private entries = new Map<string, MemoryEntry>();
    private xattrNamespaces: readonly string[];

    constructor(options: MemoryBackendOptions = {}) {
        super(path.posix);
        this.xattrNamespaces = options.xattrNamespaces ?? ['user.'];
        this.entries.set(this.rootPath, { type: 'folder', mode: 0o755, xattrs: new Map() });
    }

    /**
     * Entry stored under an already resolved key
     */
    entryAt(key: string): MemoryEntry {
        const entry = this.entries.get(key);
        if (!entry) {
            throw new NotFoundError(key);
        }
        return entry;
    }

    /**
     * Follow links in every component but the last (and the last too when
     * followLast is set)
     */
    private resolve(filePath: string, followLast: boolean, hops = 0): string {
        const names = this.split(filePath).filter(name => name !== '');
        let current = this.rootPath;
        for (const [index, name] of names.entries()) {
            const next = this.join(current, [name]);
            const entry = this.entries.get(next);
            const last = index === names.length - 1;
            if (entry?.type === 'link' && (followLast || !last)) {
                if (hops >= MAX_LINK_HOPS) {
                    throw new SymlinkLoopError(filePath);
                }
                const redirected = this.join(current, [entry.target, ...names.slice(index + 1)]);
                return this.resolve(redirected, followLast, hops + 1);
            }
            current = next;
        }
        return current;
    }

    /**
     * Key for creating an entry at filePath, after checking its parent
     */
    private creationKey(filePath: string): string {
        const key = this.resolve(filePath, false);
        if (this.entries.has(key)) {
            throw new AlreadyExistsError(filePath);
        }
        this.checkParent(key, filePath);
        return key;
    }

    private checkParent(key: string, filePath: string): void {
        const parentKey = this.dirname(key);
        if (parentKey === null) {
            return;
        }
        const parent = this.entries.get(parentKey);
        if (!parent) {
            throw new NotFoundError(filePath);
        }
        if (parent.type !== 'folder') {
            throw new NotADirectoryError(filePath);
        }
    }

    private childKeys(key: string): string[] {
        return [...this.entries.keys()].filter(candidate => candidate !== key && this.dirname(candidate) === key);
    }

    async lstat(filePath: string): Promise<EntryStat | null> {
        const entry = this.entries.get(this.resolve(filePath, false));
        if (!entry) {
            return null;
        }
        switch (entry.type) {
            case 'file':
                return { type: 'file', size: entry.data.length };
            case 'link':
                return { type: 'link', size: Buffer.byteLength(entry.target) };
            default:
                return { type: 'folder', size: 0 };
        }
    }

    async readlink(filePath: string): Promise<string> {
        const entry = this.entryAt(this.resolve(filePath, false));
        if (entry.type !== 'link') {
            throw new FileError('EINVAL', 'Not a symbolic link', filePath);
        }
        return entry.target;
    }

    async openRead(filePath: string): Promise<Readable> {
        const entry = this.entryAt(this.resolve(filePath, true));
        if (entry.type !== 'file') {
            throw new NotAFileError(filePath);
        }
        return Readable.from(entry.data.length === 0 ? [] : [Buffer.from(entry.data)]);
    }

    async listNames(filePath: string): Promise<string[] | null> {
        const key = this.resolve(filePath, true);
        if (this.entries.get(key)?.type !== 'folder') {
            return null;
        }
        return this.childKeys(key).map(child => path.posix.basename(child)).sort();
    }

    async openWrite(filePath: string, append: boolean): Promise<Writable> {
        const key = this.resolve(filePath, true);
        const existing = this.entries.get(key);
        if (existing && existing.type !== 'file') {
            throw new NotAFileError(filePath);
        }
        if (!existing) {
            this.checkParent(key, filePath);
            this.entries.set(key, { type: 'file', data: Buffer.alloc(0), mode: 0o644, xattrs: new Map() });
        } else if (!append) {
            existing.data = Buffer.alloc(0);
        }

        return new Writable({
            write: (chunk, encoding, callback) => {
                const entry = this.entries.get(key);
                if (entry?.type !== 'file') {
                    callback(new NotFoundError(filePath));
                    return;
                }
                const bytes: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
                entry.data = Buffer.concat([entry.data, bytes]);
                callback();
            },
        });
    }

    async mkdir(filePath: string): Promise<void> {
        const key = this.creationKey(filePath);
        this.entries.set(key, { type: 'folder', mode: 0o755, xattrs: new Map() });
    }

    async remove(filePath: string): Promise<void> {
        const key = this.resolve(filePath, false);
        const entry = this.entryAt(key);
        if (entry.type === 'folder') {
            throw new NotAFileError(filePath);
        }
        this.entries.delete(key);
    }

    async rmdir(filePath: string): Promise<void> {
        const key = this.resolve(filePath, false);
        const entry = this.entryAt(key);
        if (entry.type !== 'folder') {
            throw new NotADirectoryError(filePath);
        }
        if (key === this.rootPath) {
            throw new PermissionError(filePath);
        }
        if (this.childKeys(key).length > 0) {
            throw new FileError('ENOTEMPTY', 'Directory not empty', filePath);
        }
        this.entries.delete(key);
    }

    async symlink(filePath: string, target: string): Promise<void> {
        const key = this.creationKey(filePath);
        this.entries.set(key, { type: 'link', target, mode: 0o777, xattrs: new Map() });
    }

    async rename(from: string, to: string): Promise<void> {
        const fromKey = this.resolve(from, false);
        const toKey = this.resolve(to, false);
        const source = this.entryAt(fromKey);
        if (fromKey === toKey) {
            return;
        }
        if (fromKey === this.rootPath || toKey.startsWith(fromKey + this.separator)) {
            throw new FileError('EINVAL', 'Cannot move a folder into itself', from);
        }
        this.checkParent(toKey, to);

        const existing = this.entries.get(toKey);
        if (existing) {
            if (existing.type === 'folder' && source.type !== 'folder') {
                throw new NotAFileError(to);
            }
            if (existing.type !== 'folder' && source.type === 'folder') {
                throw new NotADirectoryError(to);
            }
            if (existing.type === 'folder' && this.childKeys(toKey).length > 0) {
                throw new FileError('ENOTEMPTY', 'Directory not empty', to);
            }
            this.entries.delete(toKey);
        }

        const prefix = fromKey + this.separator;
        for (const [key, entry] of [...this.entries]) {
            if (key === fromKey || key.startsWith(prefix)) {
                this.entries.delete(key);
                this.entries.set(toKey + key.slice(fromKey.length), entry);
            }
        }
    }

    async attributes(filePath: string, type: FileType | null): Promise<AttributeMap> {
        const attributes = new Map<string, AttributeSet>();
        if (type === null) {
            return attributes;
        }
        const key = this.resolve(filePath, false);
        attributes.set(POSIX_PERMISSIONS, new MemoryPosixPermissions(this, key));
        attributes.set(EXTENDED_ATTRIBUTES, new MemoryExtendedAttributes(this, key, this.xattrNamespaces));
        return attributes;
    }
}
