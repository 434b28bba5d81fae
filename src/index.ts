// Core
export { VFile } from './core/file.js';
export type {
    CopyOptions,
    CreateFolderOptions,
    DeleteOptions,
    FileData,
    RecurseOptions,
    TraversalFilter,
} from './core/file.js';
export { FileSystem } from './core/filesystem.js';
export type { FileSystemOptions } from './core/filesystem.js';
export { assertCapabilities, missingCapabilities } from './core/capabilities.js';

// Backends
export {
    LocalBackend,
    createTemporaryFolder,
    file,
    localBackend,
    localFileSystem,
} from './adapters/local.js';
export type { TemporaryFolderOptions } from './adapters/local.js';
export { MemoryBackend } from './adapters/memory.js';
export type { MemoryBackendOptions } from './adapters/memory.js';
export { SshBackend, translateSftpError, wrapSftp } from './adapters/ssh.js';
export type { SftpAttributes, SftpSession } from './adapters/ssh.js';
export { FtpBackend, translateFtpError } from './adapters/ftp.js';
export type { FtpSession } from './adapters/ftp.js';
export { UrlBackend, urlFile } from './adapters/url.js';
export type { FetchFunction, UrlBackendOptions } from './adapters/url.js';
export { NodePathModel } from './adapters/paths.js';
export {
    capabilitiesOf,
    hasAttributes,
    isLinkable,
    isListable,
    isRenamable,
    isWritable,
} from './adapters/types.js';
export type {
    AttributedBackend,
    Backend,
    LinkableBackend,
    ListableBackend,
    PathModel,
    RenamableBackend,
    WritableBackend,
} from './adapters/types.js';

// Attributes
export {
    AttributeSet,
    EXTENDED_ATTRIBUTES,
    OTHER_KINDS,
    POSIX_PERMISSIONS,
} from './attributes/types.js';
export type {
    AttributeCopyFunction,
    AttributeCopyPolicy,
    AttributeKind,
    AttributeMap,
    AttributePolicyMap,
} from './attributes/types.js';
export { PosixPermissions } from './attributes/posix.js';
export { ExtendedAttributes } from './attributes/xattr.js';
export { resolveCopyPolicy, transferAttributes } from './attributes/policy.js';

// Types
export {
    BOTH,
    CapabilitySchema,
    FILE,
    FOLDER,
    FileTypeSchema,
    FtpOptionsSchema,
    LINK,
    OTHER,
    RECURSE,
    SKIP,
    SshOptionsSchema,
    TraversalOutcomeSchema,
    YIELD,
} from './types/index.js';
export type {
    Capability,
    EntryStat,
    FileType,
    FtpOptions,
    SshOptions,
    TraversalOutcome,
} from './types/index.js';

// Utilities
export {
    AlreadyExistsError,
    EscapeError,
    FileError,
    NotADirectoryError,
    NotAFileError,
    NotFoundError,
    PermissionError,
    SymlinkLoopError,
    UnsupportedOperationError,
    translateError,
} from './utils/errors.js';
export { CleanupRegistry, cleanupRegistry } from './utils/cleanup.js';
export type { CleanupFailure } from './utils/cleanup.js';
export { ConfigManager, configure, getSettings } from './utils/config.js';
export type { Settings } from './utils/config.js';
export { getLogger } from './utils/logger.js';
export { excludeFilter, isExcluded, matchesGlob, parsePatterns } from './utils/patterns.js';
export { computeHash } from './utils/hash.js';
