// src/router.ts

import { accessSync, constants, statSync } from 'fs';
import * as path from 'path';
import { PARAM_MARKER, extractPathParams, hasPathParams, normalizePath, preparePattern, splitSegments } from './paths';
import { serveStaticFile } from './static_files';
import { ConfigError, Handler, PathParams } from './types';

export const HTTP_METHODS = ['CONNECT', 'DELETE', 'GET', 'HEAD', 'OPTIONS', 'PATCH', 'POST', 'PUT', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface Route<C = unknown> {
    readonly kind: 'exact' | 'params' | 'prefix';
    readonly pattern: string;
    readonly methods: readonly HttpMethod[];
    readonly handler: Handler<C>;
    // Path parameters bound by this request when it matches, null otherwise.
    // Nothing is stored on the route.
    match(path: string, method: string): PathParams | null;
}

// Result of a successful lookup, owned by the request that asked for it.
export interface RouteMatch<C = unknown> {
    route: Route<C>;
    pathParams: PathParams;
}

// A literal path such as `/simple/path`.
export class ExactRoute<C = unknown> implements Route<C> {
    readonly kind = 'exact';
    readonly pattern: string;
    readonly methods: readonly HttpMethod[];

    constructor(pattern: string, readonly handler: Handler<C>, methods?: readonly string[]) {
        this.pattern = preparePattern(pattern);
        this.methods = validateMethods(methods);
    }

    match(path: string, method: string): PathParams | null {
        return this.pattern === path && allows(this.methods, method) ? {} : null;
    }
}

// A template such as `/person/:person/item/:item`.
export class ParamsRoute<C = unknown> implements Route<C> {
    readonly kind = 'params';
    readonly pattern: string;
    readonly methods: readonly HttpMethod[];

    constructor(pattern: string, readonly handler: Handler<C>, methods?: readonly string[]) {
        this.pattern = preparePattern(pattern);
        if (!hasPathParams(this.pattern)) {
            throw new ConfigError(`path parameters not found in: ${pattern}`);
        }
        const names = splitSegments(this.pattern)
            .filter((segment) => segment.startsWith(PARAM_MARKER))
            .map((segment) => segment.slice(PARAM_MARKER.length));
        if (names.some((name) => name.length === 0)) {
            throw new ConfigError(`empty path parameter name in: ${pattern}`);
        }
        if (new Set(names).size !== names.length) {
            throw new ConfigError(`repeated path parameter name in: ${pattern}`);
        }
        this.methods = validateMethods(methods);
    }

    match(path: string, method: string): PathParams | null {
        if (!allows(this.methods, method)) return null;
        return extractPathParams(this.pattern, path);
    }
}

// Serves the files under `directory` at every path below `pattern`. GET only.
export class FileSystemRoute<C = unknown> implements Route<C> {
    readonly kind = 'prefix';
    readonly pattern: string;
    readonly methods: readonly HttpMethod[] = ['GET'];
    readonly directory: string;
    readonly handler: Handler<C>;

    constructor(directory: string, pattern: string) {
        this.directory = path.resolve(directory);
        assertReadableDirectory(this.directory);
        this.pattern = preparePattern(pattern);
        this.handler = (req) => serveStaticFile(this.directory, this.pattern, req);
    }

    match(path: string, method: string): PathParams | null {
        if (!allows(this.methods, method)) return null;
        const inside = this.pattern === '/' || path === this.pattern || path.startsWith(`${this.pattern}/`);
        return inside ? {} : null;
    }
}

// Ordered route table. The first route whose predicate accepts a request wins.
export class Router<C = unknown> {
    private readonly routes = new Map<string, Route<C>>();

    constructor(routes: Iterable<Route<C>> = []) {
        for (const route of routes) this.add(route);
    }

    get size(): number {
        return this.routes.size;
    }

    list(): Route<C>[] {
        return [...this.routes.values()];
    }

    add(route: Route<C>): this {
        const key = routeKey(route);
        if (this.routes.has(key)) {
            throw new ConfigError(`duplicate route: ${key}`);
        }
        for (const existing of this.routes.values()) {
            if (existing.pattern === route.pattern && existing.methods.some((m) => route.methods.includes(m))) {
                throw new ConfigError(`duplicate route: ${key} overlaps ${routeKey(existing)}`);
            }
        }
        this.routes.set(key, route);
        return this;
    }

    // Registers `handler` under `pattern`, as a ParamsRoute when the pattern
    // has `:name` segments and as an ExactRoute otherwise.
    route(pattern: string, handler: Handler<C>, methods?: readonly string[]): Route<C> {
        const route = hasPathParams(pattern)
            ? new ParamsRoute<C>(pattern, handler, methods)
            : new ExactRoute<C>(pattern, handler, methods);
        this.add(route);
        return route;
    }

    serveDirectory(pattern: string, directory: string): Route<C> {
        const route = new FileSystemRoute<C>(directory, pattern);
        this.add(route);
        return route;
    }

    match(target: string, method: string): RouteMatch<C> | null {
        const path = normalizePath(target);
        for (const route of this.routes.values()) {
            const pathParams = route.match(path, method);
            if (pathParams) return { route, pathParams };
        }
        return null;
    }
}

function routeKey<C>(route: Route<C>): string {
    return [route.pattern, ...[...new Set(route.methods)].sort()].join('-');
}

function validateMethods(methods: readonly string[] = ['GET']): HttpMethod[] {
    if (methods.length === 0) {
        throw new ConfigError('a route needs at least one method');
    }
    return methods.map((method) => {
        const known = HTTP_METHODS.find((m) => m === method);
        if (!known) {
            throw new ConfigError(`invalid method: ${method}`);
        }
        return known;
    });
}

function allows(methods: readonly HttpMethod[], method: string): boolean {
    return methods.some((m) => m === method);
}

function assertReadableDirectory(directory: string): void {
    let isDirectory: boolean;
    try {
        isDirectory = statSync(directory).isDirectory();
    } catch {
        throw new ConfigError(`not a directory: ${directory}`);
    }
    if (!isDirectory) {
        throw new ConfigError(`not a directory: ${directory}`);
    }
    try {
        accessSync(directory, constants.R_OK | constants.X_OK);
    } catch {
        throw new ConfigError(`folder is not readable: ${directory}`);
    }
}
