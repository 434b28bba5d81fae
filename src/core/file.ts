import { randomBytes } from 'crypto';
import { Readable } from 'stream';
import type { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import type {
    Backend,
    LinkableBackend,
    ListableBackend,
    WritableBackend,
} from '../adapters/types.js';
import { hasAttributes, isLinkable, isListable, isRenamable, isWritable } from '../adapters/types.js';
import { transferAttributes } from '../attributes/policy.js';
import type { AttributeKind, AttributeMap, AttributePolicyMap } from '../attributes/types.js';
import {
    BOTH,
    FILE,
    FOLDER,
    LINK,
    OTHER,
    RECURSE,
    SKIP,
    YIELD,
} from '../types/index.js';
import type { Capability, EntryStat, FileType, TraversalOutcome } from '../types/index.js';
import { CleanupRegistry, cleanupRegistry } from '../utils/cleanup.js';
import { getSettings } from '../utils/config.js';
import {
    AlreadyExistsError,
    EscapeError,
    NotADirectoryError,
    NotAFileError,
    NotFoundError,
    SymlinkLoopError,
    UnsupportedOperationError,
} from '../utils/errors.js';
import { digestBlocks } from '../utils/hash.js';
import { backendLogger } from '../utils/logger.js';
import { matchesGlob } from '../utils/patterns.js';
import { assertCapabilities } from './capabilities.js';

export interface CopyOptions {
    /**
     * Replace an existing target instead of failing
     */
    overwrite?: boolean;

    /**
     * Copy what links point at instead of recreating the links
     */
    dereferenceLinks?: boolean;

    attributes?: AttributePolicyMap;
}

export interface CreateFolderOptions {
    ignoreExisting?: boolean;
    recursive?: boolean;
}

export interface DeleteOptions {
    ignoreMissing?: boolean;
}

export interface RecurseOptions {
    includeSelf?: boolean;
    recurseSkipped?: boolean;
}

export type TraversalFilter = (file: VFile) => TraversalOutcome | boolean | Promise<TraversalOutcome | boolean>;

export type FileData = string | Uint8Array;

const NO_ATTRIBUTES: AttributeMap = new Map();

const TEMPORARY_NAME_ATTEMPTS = 20;

/**
 * A path on one backend. Handles are immutable values: they never start
 * pointing elsewhere and hold no open resources. Nothing about the entry
 * itself is cached, so every query goes to the backend.
 */
export class VFile {
    readonly backend: Backend;

    /**
     * Backend-native locator (absolute path, or URL for the URL backend)
     */
    readonly path: string;

    constructor(backend: Backend, path: string = backend.rootPath) {
        this.backend = backend;
        this.path = backend.join(backend.rootPath, [path]);
    }

    // ===== Hierarchy =====

    /**
     * Handle for the given names resolved against this one. An absolute name
     * discards what came before it and ".." is allowed; use safeChild for
     * untrusted names.
     */
    child(...names: string[]): VFile {
        if (names.length === 0) {
            return this;
        }
        return new VFile(this.backend, this.backend.join(this.path, names));
    }

    /**
     * Same as child(), but fails unless the result lies strictly below this
     * handle. "a/b/../c" is fine, "a/../.." is not.
     */
    safeChild(...names: string[]): VFile {
        const result = this.child(...names);
        if (!this.ancestorOf(result)) {
            throw new EscapeError(this.path, names);
        }
        return result;
    }

    get parent(): VFile | null {
        const parentPath = this.backend.dirname(this.path);
        return parentPath === null ? null : new VFile(this.backend, parentPath);
    }

    sibling(...names: string[]): VFile {
        const { parent } = this;
        if (!parent) {
            throw new NotFoundError(this.path, { message: `Root '${this.path}' has no siblings` });
        }
        return parent.child(...names);
    }

    /**
     * Parent chain, nearest first
     */
    getAncestors(includingSelf = false): VFile[] {
        const ancestors: VFile[] = [];
        let current = includingSelf ? this : this.parent;
        while (current) {
            ancestors.push(current);
            current = current.parent;
        }
        return ancestors;
    }

    get ancestors(): VFile[] {
        return this.getAncestors();
    }

    descendantOf(other: VFile, includingSelf = false): boolean {
        return this.getAncestors(includingSelf).some(ancestor => other.sameAs(ancestor));
    }

    ancestorOf(other: VFile, includingSelf = false): boolean {
        return other.descendantOf(this, includingSelf);
    }

    getPathComponents(relativeTo?: VFile): string[] {
        if (!relativeTo) {
            return this.backend.split(this.path);
        }
        if (relativeTo.backend.kind !== this.backend.kind) {
            throw new UnsupportedOperationError(`relative path from ${relativeTo.backend.kind}`, this.path);
        }
        return this.backend.relative(this.path, relativeTo.path);
    }

    get pathComponents(): string[] {
        return this.getPathComponents();
    }

    getPath(relativeTo?: VFile, separator: string = this.backend.separator): string {
        return this.getPathComponents(relativeTo).join(separator);
    }

    get name(): string {
        const components = this.pathComponents;
        return components[components.length - 1] ?? '';
    }

    /**
     * Same backend kind and equivalent paths, as the backend judges them
     */
    sameAs(other: VFile): boolean {
        return this.backend.kind === other.backend.kind && this.backend.samePath(this.path, other.path);
    }

    toString(): string {
        return `${this.backend.kind}:${this.path}`;
    }

    // ===== Readable =====

    async stat(): Promise<EntryStat | null> {
        return this.backend.lstat(this.path);
    }

    /**
     * Type of the entry itself (links are not followed), or null if absent
     */
    async type(): Promise<FileType | null> {
        const stat = await this.stat();
        return stat ? stat.type : null;
    }

    async linkTarget(): Promise<string | null> {
        if ((await this.type()) !== LINK) {
            return null;
        }
        return this.backend.readlink(this.path);
    }

    /**
     * Byte stream over the file's contents. The caller must end or destroy it.
     */
    async openForReading(): Promise<Readable> {
        return this.backend.openRead(this.path);
    }

    /**
     * True for broken links too; see valid()
     */
    async exists(): Promise<boolean> {
        return (await this.type()) !== null;
    }

    /**
     * Exists, and resolves to something if it is a link
     */
    async valid(): Promise<boolean> {
        return (await this.resolvedType()) !== null;
    }

    async isLink(): Promise<boolean> {
        return (await this.type()) === LINK;
    }

    /**
     * A link whose chain ends nowhere (or loops)
     */
    async isBroken(): Promise<boolean> {
        return (await this.isLink()) && (await this.resolvedType()) === null;
    }

    async isFile(): Promise<boolean> {
        return (await this.resolvedType()) === FILE;
    }

    async isFolder(): Promise<boolean> {
        return (await this.resolvedType()) === FOLDER;
    }

    async checkFolder(): Promise<void> {
        if (!(await this.isFolder())) {
            throw new NotADirectoryError(this.path);
        }
    }

    async checkFile(): Promise<void> {
        if (!(await this.isFile())) {
            throw new NotAFileError(this.path);
        }
    }

    /**
     * Follow this link (and, if recursive, the links it leads to). Link text is
     * resolved against the link's own folder. Handles that are not links
     * dereference to themselves.
     */
    async dereference(recursive = false): Promise<VFile> {
        const { maxLinkDepth } = getSettings();
        let current: VFile = this;
        let hops = 0;
        for (;;) {
            const target = await current.linkTarget();
            if (target === null) {
                return current;
            }
            if (hops === maxLinkDepth) {
                throw new SymlinkLoopError(this.path);
            }
            hops++;
            current = (current.parent ?? current).child(target);
            if (!recursive) {
                return current;
            }
        }
    }

    private async resolvedType(): Promise<FileType | null> {
        try {
            return await (await this.dereference(true)).type();
        } catch (error) {
            if (error instanceof SymlinkLoopError) {
                return null;
            }
            throw error;
        }
    }

    /**
     * Bytes in a file, the recursive total for a folder, 0 for anything else
     */
    async size(): Promise<number> {
        const type = await this.resolvedType();
        if (type === FILE) {
            const target = await this.dereference(true);
            const stat = await target.stat();
            if (!stat) {
                return 0;
            }
            if (stat.size !== undefined) {
                return stat.size;
            }
            let counted = 0;
            for await (const block of target.readBlocks()) {
                counted += block.length;
            }
            return counted;
        }
        if (type === FOLDER) {
            let total = 0;
            for (const child of (await this.children()) ?? []) {
                total += await child.size();
            }
            return total;
        }
        return 0;
    }

    /**
     * Successive chunks of the contents, each blockSize bytes except possibly
     * the last. Never yields an empty chunk. The stream is released when the
     * generator finishes, whether or not it was drained.
     */
    async *readBlocks(blockSize?: number): AsyncGenerator<Buffer, void, undefined> {
        const size = blockSize ?? this.backend.defaultBlockSize ?? getSettings().blockSize;
        if (!Number.isInteger(size) || size <= 0) {
            throw new RangeError(`Invalid block size: ${size}`);
        }

        const stream = await this.openForReading();
        try {
            let carry: Buffer = Buffer.alloc(0);
            for await (const chunk of stream) {
                const data = toBuffer(chunk);
                carry = carry.length === 0 ? data : Buffer.concat([carry, data]);
                while (carry.length >= size) {
                    yield carry.subarray(0, size);
                    carry = carry.subarray(size);
                }
            }
            if (carry.length > 0) {
                yield carry;
            }
        } finally {
            stream.destroy();
        }
    }

    async read(): Promise<Buffer> {
        const blocks: Buffer[] = [];
        for await (const block of this.readBlocks()) {
            blocks.push(block);
        }
        return Buffer.concat(blocks);
    }

    async readText(encoding: BufferEncoding = 'utf8'): Promise<string> {
        return (await this.read()).toString(encoding);
    }

    /**
     * Digest of the contents; any node:crypto algorithm name is accepted
     */
    hash(algorithm?: string): Promise<string>;
    hash(algorithm: string, hex: true): Promise<string>;
    hash(algorithm: string, hex: false): Promise<Buffer>;
    async hash(algorithm = 'md5', hex = true): Promise<string | Buffer> {
        const digest = await digestBlocks(this.readBlocks(), algorithm);
        return hex ? digest.toString('hex') : digest;
    }

    // ===== Listable =====

    private listing(): ListableBackend {
        const { backend } = this;
        if (!isListable(backend)) {
            throw new UnsupportedOperationError(`list on ${backend.kind}`, this.path);
        }
        return backend;
    }

    /**
     * Sorted child names, or null if this is not a folder
     */
    async childNames(): Promise<string[] | null> {
        return this.listing().listNames(this.path);
    }

    async children(): Promise<VFile[] | null> {
        const names = await this.childNames();
        return names === null ? null : names.map(name => this.child(name));
    }

    // ===== Writable =====

    private writing(): WritableBackend {
        const { backend } = this;
        if (!isWritable(backend)) {
            throw new UnsupportedOperationError(`write on ${backend.kind}`, this.path);
        }
        return backend;
    }

    private linking(): LinkableBackend {
        const { backend } = this;
        if (!isLinkable(backend)) {
            throw new UnsupportedOperationError(`link on ${backend.kind}`, this.path);
        }
        return backend;
    }

    async createFolder(options: CreateFolderOptions = {}): Promise<void> {
        const { ignoreExisting = false, recursive = false } = options;
        const backend = this.writing();

        if (await this.isFolder()) {
            if (ignoreExisting) {
                return;
            }
            throw new AlreadyExistsError(this.path);
        }
        if (await this.exists()) {
            throw new NotADirectoryError(this.path);
        }

        const { parent } = this;
        if (parent && !(await parent.exists())) {
            if (!recursive) {
                throw new NotFoundError(parent.path);
            }
            await parent.createFolder({ ignoreExisting: true, recursive: true });
        }
        await backend.mkdir(this.path);
    }

    /**
     * Delete this entry, emptying folders first. Links are removed as links,
     * never followed.
     */
    async delete(options: DeleteOptions = {}): Promise<void> {
        const { ignoreMissing = false } = options;
        assertCapabilities(this.backend, ['write', 'list'], this.path);
        const backend = this.writing();

        const type = await this.type();
        if (type === null) {
            if (ignoreMissing) {
                return;
            }
            throw new NotFoundError(this.path);
        }

        if (type === FOLDER) {
            for (const child of (await this.children()) ?? []) {
                await child.delete();
            }
            await backend.rmdir(this.path);
        } else {
            await backend.remove(this.path);
        }
    }

    /**
     * Make this entry a symlink. A string is used verbatim as the link text; a
     * handle is linked by its absolute path.
     */
    async linkTo(target: string | VFile): Promise<void> {
        const backend = this.linking();
        let text: string;
        if (typeof target === 'string') {
            text = target;
        } else {
            if (target.backend.kind !== this.backend.kind) {
                throw new UnsupportedOperationError(`link to ${target.backend.kind}`, this.path);
            }
            text = target.path;
        }
        await backend.symlink(this.path, text);
    }

    /**
     * Writable positioned at the start of the emptied file, or at its end when
     * appending. Some backends only commit when the stream finishes, so end it
     * before reading the file back.
     */
    async openForWriting(append = false): Promise<Writable> {
        return this.writing().openWrite(this.path, append);
    }

    async write(data: FileData): Promise<void> {
        await this.pour(chunksOf(data), false);
    }

    async append(data: FileData): Promise<void> {
        await this.pour(chunksOf(data), true);
    }

    private async pour(blocks: Iterable<Buffer> | AsyncIterable<Buffer>, append: boolean): Promise<void> {
        const stream = await this.openForWriting(append);
        await pipeline(Readable.from(blocks), stream);
    }

    /**
     * Create a uniquely named subfolder of this folder
     */
    async createTemporaryFolder(prefix = 'tmp'): Promise<VFile> {
        for (let attempt = 0; attempt < TEMPORARY_NAME_ATTEMPTS; attempt++) {
            const folder = this.child(prefix + randomBytes(4).toString('hex'));
            try {
                await folder.createFolder();
                return folder;
            } catch (error) {
                if (!(error instanceof AlreadyExistsError)) {
                    throw error;
                }
            }
        }
        throw new AlreadyExistsError(this.path, { message: `No free temporary name in '${this.path}'` });
    }

    isDeletedOnExit(registry: CleanupRegistry = cleanupRegistry): boolean {
        return registry.has(this);
    }

    setDeleteOnExit(value: boolean, registry: CleanupRegistry = cleanupRegistry): void {
        if (value) {
            registry.add(this);
        } else {
            registry.discard(this);
        }
    }

    // ===== Copying =====

    /**
     * Copy contents and attributes to target, which may live on another
     * backend. Fails if target exists unless overwrite is set. With
     * dereferenceLinks off, links are recreated with the same text even if
     * that leaves them broken at the destination. An aborted copy leaves
     * whatever was already written.
     */
    async copyTo(target: VFile, options: CopyOptions = {}): Promise<void> {
        const { overwrite = false, dereferenceLinks = true, attributes = {} } = options;

        const targetExists = await target.exists();
        if (targetExists && !overwrite) {
            throw new AlreadyExistsError(target.path);
        }

        const source = dereferenceLinks ? await this.dereference(true) : this;
        const type = await source.type();
        if (type === null) {
            throw new NotFoundError(source.path);
        }
        if (type === OTHER) {
            throw new UnsupportedOperationError('copy of special file', source.path);
        }

        const targetNeeds: Capability[] = ['write'];
        if (targetExists || type === FOLDER) targetNeeds.push('list');
        if (type === LINK) targetNeeds.push('link');
        assertCapabilities(target.backend, targetNeeds, target.path);
        if (type === FOLDER) {
            assertCapabilities(source.backend, ['list'], source.path);
        }

        if (targetExists) {
            await target.delete();
        }

        if (type === FILE) {
            await target.pour(source.readBlocks(), false);
        } else if (type === FOLDER) {
            await target.createFolder();
            for (const child of (await source.children()) ?? []) {
                await child.copyInto(target, { dereferenceLinks, attributes });
            }
        } else {
            await target.linkTo(await source.backend.readlink(source.path));
        }

        await source.copyAttributesTo(target, attributes);
    }

    /**
     * Copy into folder under this handle's name; returns the new handle
     */
    async copyInto(folder: VFile, options: CopyOptions = {}): Promise<VFile> {
        const created = folder.child(this.name);
        await this.copyTo(created, options);
        return created;
    }

    /**
     * Attribute sets this entry exposes, keyed by kind
     */
    async attributes(): Promise<AttributeMap> {
        const { backend } = this;
        if (!hasAttributes(backend)) {
            return NO_ATTRIBUTES;
        }
        return backend.attributes(this.path, await this.type());
    }

    /**
     * Copy the kinds present on both entries, per the policy map; returns the kinds copied
     */
    async copyAttributesTo(other: VFile, policies: AttributePolicyMap = {}): Promise<AttributeKind[]> {
        return transferAttributes(await this.attributes(), await other.attributes(), policies);
    }

    /**
     * Move this entry to other. One native call when both share a backend that
     * can rename; otherwise copy then delete, which is not atomic.
     */
    async renameTo(other: VFile): Promise<void> {
        if (this.renamesNatively(other)) {
            await this.atomicRenameTo(other);
            return;
        }
        assertCapabilities(this.backend, ['write', 'list'], this.path);
        backendLogger(this.backend.kind).debug(
            { from: this.toString(), to: other.toString() },
            'rename falls back to copy and delete',
        );
        await this.copyTo(other);
        await this.delete();
    }

    /**
     * Native rename only; fails rather than degrade to copy and delete
     */
    async atomicRenameTo(other: VFile): Promise<void> {
        const { backend } = this;
        if (backend !== other.backend || !isRenamable(backend)) {
            throw new UnsupportedOperationError(`atomic rename to ${other.backend.kind}`, this.path);
        }
        await backend.rename(this.path, other.path);
    }

    private renamesNatively(other: VFile): boolean {
        return this.backend === other.backend && isRenamable(this.backend);
    }

    // ===== Traversal =====

    /**
     * Pre-order walk of this entry and everything below it.
     *
     * The filter decides per handle: 'both' (or true) yields and descends,
     * 'yield' only yields, 'recurse' only descends, 'skip' (or false) yields
     * nothing and descends only when recurseSkipped is set. includeSelf only
     * affects the handle the walk starts from.
     */
    async *recurse(filter?: TraversalFilter, options: RecurseOptions = {}): AsyncGenerator<VFile, void, undefined> {
        const { includeSelf = true, recurseSkipped = true } = options;
        const outcome = filter ? await filter(this) : true;

        const yields = outcome === true || outcome === BOTH || outcome === YIELD;
        const descends = outcome === true || outcome === BOTH || outcome === RECURSE ||
            (recurseSkipped && !yields);

        if (yields && includeSelf) {
            yield this;
        }
        if (!descends || !isListable(this.backend)) {
            return;
        }
        for (const child of (await this.children()) ?? []) {
            yield* child.recurse(filter, { includeSelf: true, recurseSkipped });
        }
    }

    /**
     * Entries below this folder whose '/'-separated path relative to it
     * matches pattern, in traversal order. Descends only as deep as the
     * pattern reaches, unless it contains `**`.
     */
    async glob(pattern: string): Promise<VFile[]> {
        const depth = pattern.split('/').length;
        const unbounded = pattern.includes('**');
        const filter: TraversalFilter = handle => {
            const relative = handle.getPath(this, '/');
            if (relative === '') {
                return RECURSE;
            }
            const descends = unbounded || relative.split('/').length < depth;
            if (matchesGlob(relative, pattern)) {
                return descends ? BOTH : YIELD;
            }
            return descends ? RECURSE : SKIP;
        };

        const matches: VFile[] = [];
        for await (const handle of this.recurse(filter, { includeSelf: false, recurseSkipped: false })) {
            matches.push(handle);
        }
        return matches;
    }
}

function toBuffer(chunk: unknown): Buffer {
    if (Buffer.isBuffer(chunk)) {
        return chunk;
    }
    if (chunk instanceof Uint8Array) {
        return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    }
    if (typeof chunk === 'string') {
        return Buffer.from(chunk);
    }
    throw new TypeError(`Unexpected ${typeof chunk} chunk in byte stream`);
}

function chunksOf(data: FileData): Buffer[] {
    const buffer = typeof data === 'string' ? Buffer.from(data) : toBuffer(data);
    return buffer.length === 0 ? [] : [buffer];
}
