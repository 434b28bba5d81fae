import { AttributeSet, POSIX_PERMISSIONS } from './types.js';

/**
 * Permission and mode bits. Backends supply the storage.
 */
export abstract class PosixPermissions extends AttributeSet {
    readonly kind = POSIX_PERMISSIONS;
    readonly copyByDefault: boolean = true;

    abstract getMode(): Promise<number>;

    abstract setMode(mode: number): Promise<void>;

    async copyTo(target: AttributeSet): Promise<void> {
        if (!(target instanceof PosixPermissions)) {
            throw new TypeError(`Cannot copy ${this.kind} onto ${target.kind}`);
        }
        await target.setMode(await this.getMode());
    }
}
