import { z } from 'zod';

// File types
export const FileTypeSchema = z.enum([
    'file',
    'folder',
    'link',
    'other',
]);

/**
 * Kind of entry found at a path. Absence is modelled as `null`, never as a
 * member of this union.
 */
export type FileType = z.infer<typeof FileTypeSchema>;

export const FILE: FileType = 'file';
export const FOLDER: FileType = 'folder';
export const LINK: FileType = 'link';
export const OTHER: FileType = 'other';

/**
 * Result of a backend lstat. Never cached on a handle.
 */
export interface EntryStat {
    type: FileType;
    /**
     * Absent when the backend cannot tell without reading the contents
     */
    size?: number;
    mode?: number;
}

// POSIX st_mode file type bits
const S_IFMT = 0o170000;
const S_IFREG = 0o100000;
const S_IFDIR = 0o040000;
const S_IFLNK = 0o120000;

/**
 * Classify a raw st_mode value
 */
export function typeFromMode(mode: number): FileType {
    switch (mode & S_IFMT) {
        case S_IFREG:
            return FILE;
        case S_IFDIR:
            return FOLDER;
        case S_IFLNK:
            return LINK;
        default:
            return OTHER;
    }
}

/**
 * Permission bits of a raw st_mode value
 */
export function permissionBits(mode: number): number {
    return mode & 0o7777;
}

// Capabilities a backend may declare on top of the read surface
export const CapabilitySchema = z.enum([
    'list',
    'write',
    'link',
    'rename',
    'attributes',
]);

export type Capability = z.infer<typeof CapabilitySchema>;

// Traversal filter outcomes
export const TraversalOutcomeSchema = z.enum(['skip', 'yield', 'recurse', 'both']);

export type TraversalOutcome = z.infer<typeof TraversalOutcomeSchema>;

export const SKIP: TraversalOutcome = 'skip';
export const YIELD: TraversalOutcome = 'yield';
export const RECURSE: TraversalOutcome = 'recurse';
export const BOTH: TraversalOutcome = 'both';

// Connection options for the remote backends
export const SshOptionsSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(22),
    username: z.string().min(1),
    password: z.string().optional(),
    privateKey: z.union([z.string(), z.instanceof(Buffer)]).optional(),
    passphrase: z.string().optional(),
    readyTimeout: z.number().int().positive().optional(),
}).refine(options => options.password !== undefined || options.privateKey !== undefined, {
    message: 'Either password or privateKey is required',
});

export type SshOptions = z.input<typeof SshOptionsSchema>;

export const FtpOptionsSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(21),
    user: z.string().default('anonymous'),
    password: z.string().default('guest'),
    secure: z.boolean().default(false),
    timeout: z.number().int().nonnegative().default(30000),
});

export type FtpOptions = z.input<typeof FtpOptionsSchema>;
