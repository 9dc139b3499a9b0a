import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config';
import { ConfigError } from '../src/types';

describe('loadConfig', () => {
    it('should fall back to the defaults', () => {
        expect(loadConfig({}, {})).toEqual({
            serverName: 'Socket HTTP Server',
            readTimeoutMs: 10_000,
            chunkSize: 65_536,
            spoolMaxBytes: 1_048_576,
            maxHeaderBytes: 8_192,
        });
    });

    it('should read environment variables', () => {
        const config = loadConfig(
            {},
            { HTTP_SERVER_NAME: 'edge', HTTP_READ_TIMEOUT_MS: '2500', HTTP_CHUNK_SIZE: '1024' },
        );

        expect(config.serverName).toBe('edge');
        expect(config.readTimeoutMs).toBe(2500);
        expect(config.chunkSize).toBe(1024);
    });

    it('should prefer explicit overrides over the environment', () => {
        const config = loadConfig({ readTimeoutMs: 50 }, { HTTP_READ_TIMEOUT_MS: '2500' });

        expect(config.readTimeoutMs).toBe(50);
    });

    it('should ignore empty environment variables', () => {
        expect(loadConfig({}, { HTTP_MAX_HEADER_BYTES: '' }).maxHeaderBytes).toBe(8_192);
    });

    it('should reject invalid values with the offending field', () => {
        expect(() => loadConfig({}, { HTTP_CHUNK_SIZE: 'lots' })).toThrow(ConfigError);
        expect(() => loadConfig({ readTimeoutMs: -1 }, {})).toThrow(/readTimeoutMs/);
    });
});
