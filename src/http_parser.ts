// src/http_parser.ts

import { ConnReader } from './conn_reader';
import { Headers, parseHeaderLines } from './headers';
import { HTTPError } from './types';

export interface RequestHead {
    method: string;
    path: string;
    protocol: string;
    headers: Headers;
}

// Reads the start line and header block of one request from the connection.
// `maxHeaderBytes` bounds the whole head.
export async function readRequestHead(reader: ConnReader, maxHeaderBytes: number): Promise<RequestHead> {
    const startLine = await reader.readLine(maxHeaderBytes);
    let consumed = startLine.length + 2;
    if (consumed > maxHeaderBytes) {
        throw new HTTPError(431, 'Request header is too large');
    }
    const [method, path, protocol] = parseStartLine(startLine);

    const lines: string[] = [];
    for (;;) {
        const line = await reader.readLine(maxHeaderBytes - consumed);
        if (line.length === 0) break;
        consumed += line.length + 2;
        if (consumed > maxHeaderBytes) {
            throw new HTTPError(431, 'Request header is too large');
        }
        lines.push(line);
    }

    return { method, path, protocol, headers: parseHeaderLines(lines) };
}

export function parseStartLine(line: string): [string, string, string] {
    const parts = line.split(' ');
    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
        throw new HTTPError(400, 'Malformed request line');
    }
    const [method, path, protocol] = parts;
    return [method, path, protocol];
}

// Declared body length; 0 when the header is absent or not a valid count.
export function contentLength(headers: Headers): number {
    const value = headers.get('content-length');
    if (value === undefined || !/^\d+$/.test(value.trim())) return 0;
    const length = Number(value.trim());
    return Number.isSafeInteger(length) ? length : 0;
}
