// src/paths.ts

import { ConfigError, PathParams } from './types';

export const PARAM_MARKER = ':';

// Path part of a request target: query and fragment dropped, the path of an
// absolute-form target taken, trailing slashes removed (`/` stays `/`).
export function normalizePath(target: string): string {
    let path = target;
    if (/^https?:\/\//i.test(path)) {
        const afterAuthority = path.indexOf('/', path.indexOf('//') + 2);
        path = afterAuthority === -1 ? '/' : path.slice(afterAuthority);
    }
    const cut = path.search(/[?#]/);
    if (cut !== -1) path = path.slice(0, cut);
    const trimmed = path.replace(/\/+$/, '');
    return trimmed.length === 0 ? '/' : trimmed;
}

// Normalized form of a route pattern. Patterns must be absolute.
export function preparePattern(pattern: string): string {
    if (!pattern.startsWith('/')) {
        throw new ConfigError(`invalid path: ${pattern}`);
    }
    return normalizePath(pattern);
}

export function splitSegments(path: string): string[] {
    return path.split('/').filter((segment) => segment.length > 0);
}

export function hasPathParams(pattern: string): boolean {
    return splitSegments(pattern).some((segment) => segment.startsWith(PARAM_MARKER));
}

// Binds `:name` segments of `pattern` to the matching segments of `path`.
// Returns null unless both have the same number of segments and every
// literal segment is equal.
export function extractPathParams(pattern: string, path: string): PathParams | null {
    const patternParts = splitSegments(pattern);
    const pathParts = splitSegments(path);
    if (patternParts.length !== pathParts.length) return null;

    const params: PathParams = Object.create(null);
    for (let i = 0; i < patternParts.length; i++) {
        const expected = patternParts[i];
        if (expected.startsWith(PARAM_MARKER)) {
            params[expected.slice(PARAM_MARKER.length)] = pathParts[i];
        } else if (expected !== pathParts[i]) {
            return null;
        }
    }
    return params;
}
