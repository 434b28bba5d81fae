import type { Readable, Writable } from 'stream';
import type { AttributeMap } from '../attributes/types.js';
import type { Capability, EntryStat, FileType } from '../types/index.js';

/**
 * How a backend spells and compares paths. Paths handed to a backend are
 * always ones it produced itself through join().
 */
export interface PathModel {
    readonly separator: string;

    /**
     * Locator of the default root
     */
    readonly rootPath: string;

    /**
     * Resolve names against a base path, as path.join would, except that an
     * absolute name discards everything before it. No names returns the base.
     */
    join(base: string, names: readonly string[]): string;

    /**
     * Parent locator, or null at a root
     */
    dirname(path: string): string | null;

    /**
     * Path components; absolute paths start with an empty component
     */
    split(path: string): string[];

    /**
     * Components of path relative to base
     */
    relative(path: string, base: string): string[];

    /**
     * Whether two locators name the same entry
     */
    samePath(a: string, b: string): boolean;
}

/**
 * Read surface every backend provides
 */
export interface ReadOperations {
    /**
     * Stat without following a final symlink; null when nothing is there
     */
    lstat(path: string): Promise<EntryStat | null>;

    /**
     * Link text, only asked for entries whose type is link
     */
    readlink(path: string): Promise<string>;

    openRead(path: string): Promise<Readable>;
}

export interface ListOperations {
    /**
     * Sorted names of the immediate children, or null if path is not a folder
     * (symlinks to folders count as folders)
     */
    listNames(path: string): Promise<string[] | null>;
}

export interface WriteOperations {
    openWrite(path: string, append: boolean): Promise<Writable>;

    /**
     * Create one folder; fails if the parent is missing or path is taken
     */
    mkdir(path: string): Promise<void>;

    /**
     * Remove a file or link
     */
    remove(path: string): Promise<void>;

    /**
     * Remove an empty folder
     */
    rmdir(path: string): Promise<void>;
}

export interface LinkOperations {
    /**
     * Create path as a symlink whose text is target, verbatim
     */
    symlink(path: string, target: string): Promise<void>;
}

export interface RenameOperations {
    rename(from: string, to: string): Promise<void>;
}

export interface AttributeOperations {
    /**
     * Attribute sets available for the entry, given its current type
     */
    attributes(path: string, type: FileType | null): Promise<AttributeMap>;
}

/**
 * A transport plus its path model. Optional operation groups are the
 * backend's declared capabilities.
 */
export interface Backend extends PathModel, ReadOperations,
    Partial<ListOperations>,
    Partial<WriteOperations>,
    Partial<LinkOperations>,
    Partial<RenameOperations>,
    Partial<AttributeOperations> {
    readonly kind: string;

    /**
     * Preferred readBlocks size, where the transport favours larger reads
     */
    readonly defaultBlockSize?: number;
}

export type ListableBackend = Backend & ListOperations;
export type WritableBackend = Backend & WriteOperations;
export type LinkableBackend = Backend & LinkOperations;
export type RenamableBackend = Backend & RenameOperations;
export type AttributedBackend = Backend & AttributeOperations;

export function isListable(backend: Backend): backend is ListableBackend {
    return typeof backend.listNames === 'function';
}

export function isWritable(backend: Backend): backend is WritableBackend {
    return typeof backend.openWrite === 'function' &&
        typeof backend.mkdir === 'function' &&
        typeof backend.remove === 'function' &&
        typeof backend.rmdir === 'function';
}

export function isLinkable(backend: Backend): backend is LinkableBackend {
    return typeof backend.symlink === 'function';
}

export function isRenamable(backend: Backend): backend is RenamableBackend {
    return typeof backend.rename === 'function';
}

export function hasAttributes(backend: Backend): backend is AttributedBackend {
    return typeof backend.attributes === 'function';
}

/**
 * Capabilities a backend declares
 */
export function capabilitiesOf(backend: Backend): Capability[] {
    const capabilities: Capability[] = [];
    if (isListable(backend)) capabilities.push('list');
    if (isWritable(backend)) capabilities.push('write');
    if (isLinkable(backend)) capabilities.push('link');
    if (isRenamable(backend)) capabilities.push('rename');
    if (hasAttributes(backend)) capabilities.push('attributes');
    return capabilities;
}
