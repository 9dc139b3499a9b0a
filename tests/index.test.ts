import { describe, expect, it } from 'vitest';

import * as api from '../src';

describe('package entry point', () => {
    it('should expose the server building blocks', () => {
        expect(typeof api.Server).toBe('function');
        expect(typeof api.Router).toBe('function');
        expect(typeof api.applyMiddlewares).toBe('function');
        expect(typeof api.loadConfig).toBe('function');
        expect(api.StatusCodes.NOT_FOUND).toBe(404);
    });

    it('should build a router from the exported route classes', () => {
        const router = new api.Router([new api.ExactRoute('/health', async () => api.textResponse('ok'))]);

        expect(router.match('/health', 'GET')?.route.pattern).toBe('/health');
    });
});
