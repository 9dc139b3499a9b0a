// src/status.ts

import { StatusCodes, getReasonPhrase } from 'http-status-codes';

export { StatusCodes };

export function reasonPhrase(statusCode: number): string {
    try {
        return getReasonPhrase(statusCode);
    } catch {
        // getReasonPhrase throws for codes it has no phrase for.
        return 'Unknown Status';
    }
}
