import { OTHER_KINDS } from './types.js';
import type {
    AttributeCopyPolicy,
    AttributeKind,
    AttributeMap,
    AttributeSet,
    AttributePolicyMap,
} from './types.js';

/**
 * Decide how one kind is copied: explicit entry, then the fallback entry, then
 * the kind's own default
 */
export function resolveCopyPolicy(
    kind: AttributeKind,
    source: AttributeSet,
    policies: AttributePolicyMap,
): AttributeCopyPolicy {
    const explicit = Object.hasOwn(policies, kind) ? policies[kind] : undefined;
    if (explicit !== undefined) {
        return explicit;
    }
    const fallback = Object.hasOwn(policies, OTHER_KINDS) ? policies[OTHER_KINDS] : undefined;
    if (fallback !== undefined) {
        return fallback;
    }
    return source.copyByDefault;
}

/**
 * Copy every kind present on both sides according to the policy map. Kinds missing
 * from either map are never copied.
 */
export async function transferAttributes(
    ours: AttributeMap,
    theirs: AttributeMap,
    policies: AttributePolicyMap = {},
): Promise<AttributeKind[]> {
    const copied: AttributeKind[] = [];
    for (const [kind, source] of ours) {
        const target = theirs.get(kind);
        if (!target) {
            continue;
        }
        const policy = resolveCopyPolicy(kind, source, policies);
        if (policy === false) {
            continue;
        }
        if (policy === true) {
            await source.copyTo(target);
        } else {
            await policy(source, target);
        }
        copied.push(kind);
    }
    return copied;
}
