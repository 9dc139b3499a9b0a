// src/cookies.ts

import * as cookie from 'cookie';

export type Cookies = Map<string, string>;
export type CookieOptions = cookie.SerializeOptions;

// Parses a `Cookie` request header. A missing header gives an empty map.
export function parseCookies(header: string | undefined): Cookies {
    const cookies: Cookies = new Map();
    if (!header) return cookies;
    for (const [name, value] of Object.entries(cookie.parse(header))) {
        if (value !== undefined) cookies.set(name, value);
    }
    return cookies;
}

// Cookies to send with a response, one `Set-Cookie` line each.
// Values are serialized when set, so an invalid name or value throws there.
export class ResponseCookies implements Iterable<[string, string]> {
    private readonly jar = new Map<string, { value: string; line: string }>();

    constructor(init?: Iterable<readonly [string, string]> | Record<string, string>) {
        if (!init) return;
        const entries = isIterable(init) ? init : Object.entries(init);
        for (const [name, value] of entries) this.set(name, value);
    }

    get size(): number {
        return this.jar.size;
    }

    set(name: string, value: string, options?: CookieOptions): this {
        this.jar.set(name, { value, line: cookie.serialize(name, value, options) });
        return this;
    }

    get(name: string): string | undefined {
        return this.jar.get(name)?.value;
    }

    has(name: string): boolean {
        return this.jar.has(name);
    }

    delete(name: string): boolean {
        return this.jar.delete(name);
    }

    // Tells the client to drop a cookie it already holds.
    expire(name: string, options: Pick<CookieOptions, 'path' | 'domain'> = {}): this {
        return this.set(name, '', { ...options, expires: new Date(0), maxAge: 0 });
    }

    // Serialized `name=value; attrs` strings, one per cookie.
    serialize(): string[] {
        return [...this.jar.values()].map(({ line }) => line);
    }

    *[Symbol.iterator](): IterableIterator<[string, string]> {
        for (const [name, { value }] of this.jar) yield [name, value];
    }
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
    return Symbol.iterator in value;
}
