import type { Backend } from '../adapters/types.js';
import { capabilitiesOf } from '../adapters/types.js';
import type { Capability } from '../types/index.js';
import { UnsupportedOperationError } from '../utils/errors.js';

/**
 * Capabilities from `required` that the backend does not declare
 */
export function missingCapabilities(backend: Backend, required: readonly Capability[]): Capability[] {
    const declared = new Set(capabilitiesOf(backend));
    return required.filter(capability => !declared.has(capability));
}

/**
 * Fail before any work starts when an operation needs more than the backend
 * offers
 */
export function assertCapabilities(backend: Backend, required: readonly Capability[], path?: string): void {
    const missing = missingCapabilities(backend, required);
    if (missing.length > 0) {
        throw new UnsupportedOperationError(`${missing.join(', ')} on ${backend.kind}`, path);
    }
}
