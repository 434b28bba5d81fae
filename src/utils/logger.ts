import { pino } from 'pino';
import type { Logger } from 'pino';
import { getSettings } from './config.js';

let root: Logger | undefined;

/**
 * Root library logger. Tracks the configured level, which may change through
 * configure() after the logger was created.
 */
export function getLogger(): Logger {
    const { logLevel } = getSettings();
    if (!root) {
        root = pino({ name: 'omnifile', level: logLevel });
    } else if (root.level !== logLevel) {
        root.level = logLevel;
    }
    return root;
}

/**
 * Logger scoped to one backend kind
 */
export function backendLogger(kind: string): Logger {
    return getLogger().child({ backend: kind });
}
