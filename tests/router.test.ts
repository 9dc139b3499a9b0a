import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { normalizePath } from '../src/paths';
import { textResponse } from '../src/response';
import { ExactRoute, FileSystemRoute, ParamsRoute, Router } from '../src/router';
import { ConfigError, Handler } from '../src/types';

const handler: Handler = async () => textResponse('ok');

describe('normalizePath', () => {
    it('should strip trailing slashes, query and fragment', () => {
        expect(normalizePath('/a/b/')).toBe('/a/b');
        expect(normalizePath('/a?x=1')).toBe('/a');
        expect(normalizePath('/a/#top')).toBe('/a');
        expect(normalizePath('/')).toBe('/');
        expect(normalizePath('///')).toBe('/');
    });

    it('should take the path of an absolute-form target', () => {
        expect(normalizePath('http://example.test/a/b?c=d')).toBe('/a/b');
        expect(normalizePath('http://example.test')).toBe('/');
    });
});

describe('Router', () => {
    describe('exact routes', () => {
        it('should match the path and method', () => {
            const router = new Router();
            const route = router.route('/html_handler', handler);

            const matched = router.match('/html_handler', 'GET');

            expect(matched?.route).toBe(route);
            expect(matched?.pathParams).toEqual({});
        });

        it('should match with a trailing slash or a query string', () => {
            const router = new Router();
            const route = router.route('/html_handler', handler);

            expect(router.match('/html_handler/', 'GET')?.route).toBe(route);
            expect(router.match('/html_handler?a=1', 'GET')?.route).toBe(route);
        });

        it('should not match another method or path', () => {
            const router = new Router();
            router.route('/html_handler', handler);

            expect(router.match('/html_handler', 'POST')).toBeNull();
            expect(router.match('/random_path_4', 'GET')).toBeNull();
        });

        it('should match the root path', () => {
            const router = new Router();
            const route = router.route('/', handler);

            expect(router.match('/', 'GET')?.route).toBe(route);
        });
    });

    describe('parameterized routes', () => {
        it('should bind parameters by name', () => {
            const router = new Router();
            router.route('/person/:person/item/:item', handler);

            const matched = router.match('/person/123/item/456', 'GET');

            expect(matched?.route).toBeInstanceOf(ParamsRoute);
            expect(matched?.pathParams).toEqual({ person: '123', item: '456' });
        });

        it('should fail on a different segment count', () => {
            const router = new Router();
            router.route('/person/:person', handler);

            expect(router.match('/person', 'GET')).toBeNull();
            expect(router.match('/person/1/extra', 'GET')).toBeNull();
        });

        it('should fail when a literal segment differs', () => {
            const router = new Router();
            router.route('/person/:person/item/:item', handler);

            expect(router.match('/person/1/thing/2', 'GET')).toBeNull();
        });

        it('should keep parameter values verbatim', () => {
            const router = new Router();
            router.route('/files/:name', handler);

            expect(router.match('/files/a%20b.txt', 'GET')?.pathParams).toEqual({ name: 'a%20b.txt' });
        });

        it('should give each match its own parameters', () => {
            const router = new Router();
            router.route('/user/:id', handler);

            const first = router.match('/user/1', 'GET');
            const second = router.match('/user/2', 'GET');

            expect(first?.pathParams).toEqual({ id: '1' });
            expect(second?.pathParams).toEqual({ id: '2' });
            expect(first?.route).toBe(second?.route);
        });

        it('should reject patterns without parameters or with repeated names', () => {
            expect(() => new ParamsRoute('/plain', handler)).toThrow(ConfigError);
            expect(() => new ParamsRoute('/a/:id/b/:id', handler)).toThrow(ConfigError);
            expect(() => new ParamsRoute('/a/:', handler)).toThrow(ConfigError);
        });
    });

    describe('registration', () => {
        it('should reject a duplicate pattern and method set', () => {
            const router = new Router();
            router.route('/a', handler, ['GET', 'POST']);

            expect(() => router.route('/a/', handler, ['POST', 'GET'])).toThrow(ConfigError);
        });

        it('should reject overlapping method sets on one pattern', () => {
            const router = new Router();
            router.route('/a', handler, ['GET', 'POST']);

            expect(() => router.route('/a', handler, ['POST', 'PUT'])).toThrow(ConfigError);
        });

        it('should accept the same pattern with disjoint methods', () => {
            const router = new Router();
            const get = router.route('/a', handler, ['GET']);
            const post = router.route('/a', handler, ['POST']);

            expect(router.size).toBe(2);
            expect(router.match('/a', 'GET')?.route).toBe(get);
            expect(router.match('/a', 'POST')?.route).toBe(post);
        });

        it('should reject relative patterns and unknown methods', () => {
            expect(() => new ExactRoute('no-slash', handler)).toThrow(ConfigError);
            expect(() => new ExactRoute('/a', handler, ['FETCH'])).toThrow(ConfigError);
            expect(() => new ExactRoute('/a', handler, ['get'])).toThrow(ConfigError);
            expect(() => new ExactRoute('/a', handler, [])).toThrow(ConfigError);
        });

        it('should return the first registered of overlapping routes', () => {
            const router = new Router();
            const first = router.route('/items/:id', handler);
            router.route('/items/new', handler);

            expect(router.match('/items/new', 'GET')?.route).toBe(first);
        });

        it('should accept routes through the constructor', () => {
            const a = new ExactRoute('/a', handler);
            const b = new ParamsRoute('/b/:id', handler);
            const router = new Router([a, b]);

            expect(router.list()).toEqual([a, b]);
        });
    });

    describe('file system routes', () => {
        let directory: string;

        beforeAll(() => {
            directory = mkdtempSync(path.join(tmpdir(), 'router-test-'));
        });

        afterAll(() => {
            rmSync(directory, { recursive: true, force: true });
        });

        it('should match GET requests under the prefix', () => {
            const router = new Router();
            const route = router.serveDirectory('/static', directory);

            expect(router.match('/static/0.txt', 'GET')?.route).toBe(route);
            expect(router.match('/static/nested/a.txt', 'GET')?.route).toBe(route);
            expect(router.match('/static', 'GET')?.route).toBe(route);
        });

        it('should not match other methods or sibling paths', () => {
            const router = new Router();
            router.serveDirectory('/static', directory);

            expect(router.match('/static/0.txt', 'POST')).toBeNull();
            expect(router.match('/staticfile', 'GET')).toBeNull();
        });

        it('should reject a missing directory', () => {
            expect(() => new FileSystemRoute(path.join(directory, 'missing'), '/static')).toThrow(ConfigError);
        });
    });
});
