// src/middleware.ts

import { timingSafeEqual } from 'crypto';
import { StatusCodes } from './status';
import { HTTPError, Handler, Middleware } from './types';

// Wraps `handler` so that `[m1, m2, m3]` runs as `m1(m2(m3(handler)))`:
// the first middleware is the outermost layer.
export function applyMiddlewares<C>(handler: Handler<C>, middlewares: readonly Middleware<C>[]): Handler<C> {
    return middlewares.reduceRight<Handler<C>>((next, middleware) => middleware(next), handler);
}

export function composeMiddlewares<C>(...middlewares: Middleware<C>[]): Middleware<C> {
    return (handler) => applyMiddlewares(handler, middlewares);
}

// Rejects requests without matching `Authorization: Basic` credentials.
export function basicAuthMiddleware<C>(user: string, password: string, realm = 'restricted'): Middleware<C> {
    const expected = Buffer.from(`${user}:${password}`, 'utf8');
    const challenge = { 'WWW-Authenticate': `Basic realm="${realm}", charset="UTF-8"` };

    return (next) => async (req) => {
        const [scheme, encoded] = (req.headers.get('authorization') ?? '').split(' ');
        const given = scheme === 'Basic' && encoded ? Buffer.from(encoded, 'base64') : Buffer.alloc(0);
        if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
            throw new HTTPError(StatusCodes.UNAUTHORIZED, undefined, challenge);
        }
        return next(req);
    };
}
