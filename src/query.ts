// src/query.ts

import type { Query } from './types';

// Decodes `a=1&a=2&b=3` into `{ a: ['1', '2'], b: ['3'] }`.
// Parameters with an empty value are left out.
export function parseQueryString(qs: string): Query {
    const query: Query = Object.create(null);
    for (const [name, value] of new URLSearchParams(qs)) {
        if (value === '') continue;
        (query[name] ??= []).push(value);
    }
    return query;
}

// Query parameters of a request target such as `/search?q=x#top`.
export function parseQuery(target: string): Query {
    const start = target.indexOf('?');
    if (start === -1) return parseQueryString('');
    const end = target.indexOf('#', start);
    return parseQueryString(target.slice(start + 1, end === -1 ? undefined : end));
}
