// src/config.ts

import { z } from 'zod';
import { ConfigError } from './types';

export const serverConfigSchema = z.object({
    // Value of the `Server` response header.
    serverName: z.string().min(1).default('Socket HTTP Server'),
    // Deadline for each individual socket read.
    readTimeoutMs: z.coerce.number().int().positive().default(10_000),
    // Unit of body reads and file writes.
    chunkSize: z.coerce.number().int().positive().default(64 * 1024),
    // Bodies and uploads larger than this go to a temporary file.
    spoolMaxBytes: z.coerce.number().int().nonnegative().default(1024 * 1024),
    maxHeaderBytes: z.coerce.number().int().positive().default(8 * 1024),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;

const ENV_VARS: Record<keyof ServerConfig, string> = {
    serverName: 'HTTP_SERVER_NAME',
    readTimeoutMs: 'HTTP_READ_TIMEOUT_MS',
    chunkSize: 'HTTP_CHUNK_SIZE',
    spoolMaxBytes: 'HTTP_SPOOL_MAX_BYTES',
    maxHeaderBytes: 'HTTP_MAX_HEADER_BYTES',
};

// Resolves the server configuration: explicit overrides, then environment
// variables, then defaults.
export function loadConfig(overrides: ServerConfigInput = {}, env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const raw: Record<string, unknown> = {};
    for (const [key, variable] of Object.entries(ENV_VARS)) {
        const value = env[variable];
        if (value !== undefined && value !== '') raw[key] = value;
    }
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) raw[key] = value;
    }

    const result = serverConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`invalid server config: ${issues.join('; ')}`);
    }
    return result.data;
}
