/**
 * Stable identifier of an attribute kind. Backends may register kinds of their
 * own; the two below are the ones this package knows how to copy.
 */
export type AttributeKind = string;

export const POSIX_PERMISSIONS: AttributeKind = 'posix-permissions';
export const EXTENDED_ATTRIBUTES: AttributeKind = 'extended-attributes';

/**
 * Key of the fallback entry in an AttributePolicyMap, applied to every kind the
 * map does not name
 */
export const OTHER_KINDS = '*';

/**
 * One category of metadata attached to a file, with its own copy strategy
 */
export abstract class AttributeSet {
    abstract readonly kind: AttributeKind;

    /**
     * Whether this kind is copied when the caller gives no instruction for it
     */
    abstract readonly copyByDefault: boolean;

    /**
     * Transfer this set onto the same kind of set on another file
     */
    abstract copyTo(target: AttributeSet): Promise<void>;
}

export type AttributeMap = ReadonlyMap<AttributeKind, AttributeSet>;

export type AttributeCopyFunction = (source: AttributeSet, target: AttributeSet) => void | Promise<void>;

/**
 * true copies with the kind's own copyTo, false skips, a function copies in a
 * custom way
 */
export type AttributeCopyPolicy = boolean | AttributeCopyFunction;

export type AttributePolicyMap = Readonly<Record<AttributeKind, AttributeCopyPolicy>>;
