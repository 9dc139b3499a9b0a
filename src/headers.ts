// src/headers.ts

import { HTTPError } from './types';

export type HeaderInit = Headers | Iterable<readonly [string, string]> | Record<string, string>;

const FORBIDDEN_CHARS = /[\r\n\0]/;

// Multi-valued header collection. Names are matched case-insensitively,
// iteration follows insertion order and yields names as they were given.
export class Headers implements Iterable<[string, string]> {
    private readonly fields: Array<[string, string]> = [];

    constructor(init?: HeaderInit) {
        if (!init) return;
        if (isIterable(init)) {
            for (const [name, value] of init) this.append(name, value);
        } else {
            for (const [name, value] of Object.entries(init)) this.append(name, value);
        }
    }

    get size(): number {
        return this.fields.length;
    }

    // First value for `name`.
    get(name: string): string | undefined {
        const key = name.toLowerCase();
        return this.fields.find(([field]) => field.toLowerCase() === key)?.[1];
    }

    getAll(name: string): string[] {
        const key = name.toLowerCase();
        return this.fields.filter(([field]) => field.toLowerCase() === key).map(([, value]) => value);
    }

    has(name: string): boolean {
        return this.get(name) !== undefined;
    }

    append(name: string, value: string): this {
        assertValid(name, value);
        this.fields.push([name, value]);
        return this;
    }

    // Replaces every value of `name` with a single one. The field keeps the
    // position of its first occurrence, or goes to the end if it is new.
    set(name: string, value: string): this {
        assertValid(name, value);
        const key = name.toLowerCase();
        const first = this.fields.findIndex(([field]) => field.toLowerCase() === key);
        if (first === -1) {
            this.fields.push([name, value]);
            return this;
        }
        this.fields[first] = [name, value];
        for (let i = this.fields.length - 1; i > first; i--) {
            if (this.fields[i][0].toLowerCase() === key) this.fields.splice(i, 1);
        }
        return this;
    }

    delete(name: string): boolean {
        const key = name.toLowerCase();
        const before = this.fields.length;
        for (let i = this.fields.length - 1; i >= 0; i--) {
            if (this.fields[i][0].toLowerCase() === key) this.fields.splice(i, 1);
        }
        return this.fields.length !== before;
    }

    clone(): Headers {
        return new Headers(this);
    }

    entries(): IterableIterator<[string, string]> {
        return this.fields.map(([name, value]): [string, string] => [name, value])[Symbol.iterator]();
    }

    [Symbol.iterator](): IterableIterator<[string, string]> {
        return this.entries();
    }
}

// Parses the header lines of a request head (without the terminating
// empty line). A line starting with whitespace continues the previous value.
export function parseHeaderLines(lines: string[]): Headers {
    const parsed: Array<[string, string]> = [];
    for (const line of lines) {
        if (line.length === 0) continue;
        if (line[0] === ' ' || line[0] === '\t') {
            const last = parsed[parsed.length - 1];
            if (!last) {
                throw new HTTPError(400, 'Malformed header');
            }
            last[1] = `${last[1]} ${line.trim()}`;
            continue;
        }
        const index = line.indexOf(':');
        if (index <= 0) {
            throw new HTTPError(400, 'Malformed header');
        }
        parsed.push([line.substring(0, index).trim(), line.substring(index + 1).trim()]);
    }
    return new Headers(parsed);
}

function assertValid(name: string, value: string): void {
    if (name.length === 0 || FORBIDDEN_CHARS.test(name) || name.includes(':')) {
        throw new TypeError(`Invalid header name: ${JSON.stringify(name)}`);
    }
    if (FORBIDDEN_CHARS.test(value)) {
        throw new TypeError(`Invalid value for header ${name}`);
    }
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
    return Symbol.iterator in value;
}
