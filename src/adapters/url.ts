import { Readable } from 'stream';
import { VFile } from '../core/file.js';
import { FILE, LINK } from '../types/index.js';
import type { EntryStat } from '../types/index.js';
import { FileError, NotFoundError, PermissionError, UnsupportedOperationError } from '../utils/errors.js';
import type { Backend } from './types.js';

export type FetchFunction = (
    url: string,
    init: { method: 'GET' | 'HEAD'; redirect: 'follow' | 'manual' },
) => Promise<Response>;

export interface UrlBackendOptions {
    fetch?: FetchFunction;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

type ResponseBody = NonNullable<Response['body']>;

async function* bodyChunks(body: ResponseBody): AsyncGenerator<Uint8Array, void, undefined> {
    const reader = body.getReader();
    try {
        for (;;) {
            const { done, value } = await reader.read();
            if (done) {
                return;
            }
            yield value;
        }
    } finally {
        await reader.cancel();
    }
}

function statusError(status: number, url: string): FileError {
    switch (status) {
        case 404:
        case 410:
            return new NotFoundError(url);
        case 401:
        case 403:
            return new PermissionError(url);
        default:
            return new FileError('EIO', `HTTP ${status}`, url);
    }
}

function withTrailingSlash(href: string): string {
    const parsed = new URL(href);
    if (!parsed.pathname.endsWith('/')) {
        parsed.pathname += '/';
    }
    return parsed.href;
}

/**
 * The URL with trailing slashes dropped from its path, so that "a/" and "a"
 * compare equal
 */
function comparisonKey(href: string): string {
    const parsed = new URL(href);
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
    return parsed.href;
}

/**
 * Read-only HTTP(S) resources. A 200 to HEAD is a file, a redirect is a link
 * to its Location, anything else is absent.
 */
export class UrlBackend implements Backend {
    readonly kind = 'url';
    readonly separator = '/';
    readonly rootPath: string;
    private fetch: FetchFunction;

    constructor(baseUrl: string, options: UrlBackendOptions = {}) {
        this.rootPath = new URL('/', baseUrl).href;
        this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    }

    /**
     * Names resolve like relative references against the base taken as a
     * folder; absolute URLs replace it
     */
    join(base: string, names: readonly string[]): string {
        let current = new URL(base).href;
        for (const name of names) {
            if (name !== '') {
                current = new URL(name, withTrailingSlash(current)).href;
            }
        }
        return current;
    }

    dirname(href: string): string | null {
        const parsed = new URL(href);
        const trimmed = parsed.pathname.replace(/\/+$/, '');
        if (trimmed === '') {
            return null;
        }
        parsed.pathname = trimmed.slice(0, trimmed.lastIndexOf('/') + 1);
        parsed.search = '';
        parsed.hash = '';
        return parsed.href;
    }

    split(href: string): string[] {
        return ['', ...new URL(href).pathname.split('/').filter(segment => segment !== '')];
    }

    relative(href: string): string[] {
        throw new UnsupportedOperationError('relative path on url', href);
    }

    samePath(a: string, b: string): boolean {
        return comparisonKey(a) === comparisonKey(b);
    }

    private async head(href: string): Promise<Response> {
        return this.fetch(href, { method: 'HEAD', redirect: 'manual' });
    }

    async lstat(href: string): Promise<EntryStat | null> {
        const response = await this.head(href);
        if (response.status === 200) {
            const header = response.headers.get('content-length');
            const length = header === null ? NaN : Number(header);
            // without a usable Content-Length, size() counts the body
            return Number.isInteger(length) && length >= 0 ? { type: FILE, size: length } : { type: FILE };
        }
        if (REDIRECT_STATUSES.has(response.status)) {
            return { type: LINK, size: 0 };
        }
        return null;
    }

    async readlink(href: string): Promise<string> {
        const response = await this.head(href);
        const location = response.headers.get('location');
        if (!REDIRECT_STATUSES.has(response.status) || location === null) {
            throw new FileError('EINVAL', 'Not a redirect', href);
        }
        return location;
    }

    async openRead(href: string): Promise<Readable> {
        const response = await this.fetch(href, { method: 'GET', redirect: 'follow' });
        if (response.status !== 200) {
            throw statusError(response.status, href);
        }
        return response.body ? Readable.from(bodyChunks(response.body)) : Readable.from([]);
    }
}

/**
 * Handle for an absolute http(s) URL
 */
export function urlFile(href: string, options: UrlBackendOptions = {}): VFile {
    return new VFile(new UrlBackend(href, options), href);
}
