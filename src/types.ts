// src/types.ts

import type { HeaderInit } from './headers';
import type { Request } from './request';
import type { Response } from './response';
import { reasonPhrase } from './status';

// An async request handler. `C` is the application context type.
export type Handler<C = unknown> = (req: Request<C>) => Promise<Response>;

// Wraps a handler with pre/post behaviour.
export type Middleware<C = unknown> = (next: Handler<C>) => Handler<C>;

// Startup/shutdown hook, called with the application context.
export type LifecycleHook<C> = (ctx: C) => Promise<void>;

export type PathParams = Record<string, string>;

// Parameter name -> every value it was given, in order.
export type Query = Record<string, string[]>;
export type Form = Record<string, string[]>;

export interface Address {
    host: string;
    port: number;
    family: string;
}

// An error that maps to a specific HTTP status. Thrown from routing,
// parsing, file lookup or middleware and turned into a response.
export class HTTPError extends Error {
    readonly headers?: HeaderInit;

    constructor(public statusCode: number, message?: string, headers?: HeaderInit) {
        super(message ?? reasonPhrase(statusCode));
        this.name = 'HTTPError';
        this.headers = headers;
    }
}

// Invalid server or route setup. Raised at registration time, never per request.
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
