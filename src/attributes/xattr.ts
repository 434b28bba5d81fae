import { AttributeSet, EXTENDED_ATTRIBUTES } from './types.js';
import { isAttributeNameRestriction } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Named extended attributes (user.*, trusted.*, ...)
 */
export abstract class ExtendedAttributes extends AttributeSet {
    readonly kind = EXTENDED_ATTRIBUTES;
    readonly copyByDefault: boolean = true;

    abstract get(name: string): Promise<Buffer>;

    abstract set(name: string, value: Buffer): Promise<void>;

    abstract list(): Promise<string[]>;

    abstract delete(name: string): Promise<void>;

    /**
     * Replace the target's attributes with ours. A name the target filesystem
     * refuses is skipped; any other failure aborts the transfer.
     */
    async copyTo(target: AttributeSet): Promise<void> {
        if (!(target instanceof ExtendedAttributes)) {
            throw new TypeError(`Cannot copy ${this.kind} onto ${target.kind}`);
        }

        for (const name of await target.list()) {
            await target.delete(name);
        }

        for (const name of await this.list()) {
            const value = await this.get(name);
            try {
                await target.set(name, value);
            } catch (error) {
                if (!isAttributeNameRestriction(error)) {
                    throw error;
                }
                getLogger().debug({ attribute: name, err: error }, 'skipped extended attribute');
            }
        }
    }
}
