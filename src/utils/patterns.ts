/**
 * Gitignore-style exclusion patterns for recursive traversal
 */

import type { TraversalFilter, VFile } from '../core/file.js';
import { BOTH, SKIP } from '../types/index.js';

/**
 * Parse pattern file content into a pattern list
 */
export function parsePatterns(content: string): string[] {
    return content
        .split('\n')
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#')); // Remove empty lines and comments
}

/**
 * Check if a relative path is excluded by the patterns. Later patterns win.
 * Supports:
 * - Glob patterns: *.tmp, *.log
 * - Any depth: docs/**
 * - Directory patterns: node_modules/, build/
 * - Negation: !keep.tmp
 */
export function isExcluded(path: string, patterns: readonly string[]): boolean {
    let excluded = false;

    for (const pattern of patterns) {
        if (pattern.startsWith('!')) {
            if (matchPattern(path, pattern.slice(1))) {
                excluded = false;
            }
            continue;
        }

        if (matchPattern(path, pattern)) {
            excluded = true;
        }
    }

    return excluded;
}

function globToRegExp(pattern: string): RegExp {
    let source = '';
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];
        if (char === '*' && pattern[i + 1] === '*') {
            source += '.*';
            i++;
        } else if (char === '*') {
            source += '[^/]*';
        } else if (char === '?') {
            source += '[^/]';
        } else {
            source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
        }
    }
    return new RegExp(`^${source}$`);
}

/**
 * Whole-path glob match: `*` and `?` stay inside one component, `**` spans
 * components
 */
export function matchesGlob(path: string, pattern: string): boolean {
    return globToRegExp(pattern).test(path);
}

/**
 * Match a path, or any of its parent folders, against one pattern. Patterns
 * without a slash match a single name at any depth.
 */
function matchPattern(path: string, pattern: string): boolean {
    // Directory pattern (ends with /)
    if (pattern.endsWith('/')) {
        const dir = pattern.slice(0, -1);
        return path === dir || path.startsWith(dir + '/');
    }

    const regex = globToRegExp(pattern);
    const parts = path.split('/');

    if (!pattern.includes('/')) {
        return parts.some(part => regex.test(part));
    }

    for (let i = 1; i <= parts.length; i++) {
        if (regex.test(parts.slice(0, i).join('/'))) {
            return true;
        }
    }
    return false;
}

/**
 * Traversal filter that skips handles whose path relative to root is excluded.
 * Pass recurseSkipped: false to recurse() so excluded folders are pruned.
 */
export function excludeFilter(root: VFile, patterns: readonly string[]): TraversalFilter {
    return (file: VFile) => {
        const relativePath = file.getPath(root, '/');
        if (relativePath === '') {
            return BOTH;
        }
        return isExcluded(relativePath, patterns) ? SKIP : BOTH;
    };
}
