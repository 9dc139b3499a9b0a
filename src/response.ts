// src/response.ts

import { constants } from 'fs';
import { FileHandle, access, open, stat } from 'fs/promises';
import * as path from 'path';
import { ResponseCookies } from './cookies';
import { httpDate } from './date';
import { HeaderInit, Headers } from './headers';
import { Logger } from './logger';
import { StatusCodes, reasonPhrase } from './status';
import { HTTPError } from './types';

const logger = new Logger('Response');

// An open file streamed as the response body. Closed by the writer.
export class FileBody {
    private closed = false;

    private constructor(private readonly handle: FileHandle, readonly size: number) {}

    static async open(filePath: string): Promise<FileBody> {
        const handle = await open(filePath, 'r');
        try {
            const stats = await handle.stat();
            return new FileBody(handle, stats.size);
        } catch (err) {
            await handle.close();
            throw err;
        }
    }

    // Reads the file from the start in `chunkSize` pieces.
    async *chunks(chunkSize: number): AsyncGenerator<Buffer> {
        let position = 0;
        for (;;) {
            const buffer = Buffer.alloc(chunkSize);
            const { bytesRead } = await this.handle.read(buffer, 0, chunkSize, position);
            if (bytesRead === 0) return;
            position += bytesRead;
            yield buffer.subarray(0, bytesRead);
        }
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.handle.close();
    }
}

export type ResponseBody = string | Buffer | FileBody;

export interface ResponseInit {
    status?: number;
    headers?: HeaderInit;
    body?: ResponseBody;
    cookies?: ResponseCookies | Record<string, string>;
}

export class Response {
    status: number;
    headers: Headers;
    cookies: ResponseCookies;
    body: ResponseBody;

    constructor(init: ResponseInit = {}) {
        this.status = init.status ?? StatusCodes.OK;
        this.headers = new Headers(init.headers);
        this.cookies = init.cookies instanceof ResponseCookies ? init.cookies : new ResponseCookies(init.cookies);
        this.body = init.body ?? '';
    }

    get streaming(): boolean {
        return this.body instanceof FileBody;
    }

    async close(): Promise<void> {
        if (this.body instanceof FileBody) {
            await this.body.close();
        }
    }
}

export function errorResponse(status: number, headers?: HeaderInit): Response {
    const response = htmlResponse(reasonPhrase(status), status);
    for (const [name, value] of new Headers(headers)) {
        response.headers.set(name, value);
    }
    return response;
}

export function htmlResponse(body: string | Buffer, status: number = StatusCodes.OK): Response {
    return new Response({ status, headers: { 'Content-Type': 'text/html; charset=utf-8' }, body });
}

export function textResponse(body: string | Buffer, status: number = StatusCodes.OK): Response {
    return new Response({ status, headers: { 'Content-Type': 'text/plain; charset=utf-8' }, body });
}

export function jsonResponse(value: unknown, status: number = StatusCodes.OK): Response {
    return new Response({ status, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(value) });
}

export function redirectResponse(url: string, status: number = StatusCodes.MOVED_PERMANENTLY): Response {
    return new Response({ status, headers: { Location: url } });
}

// Streams a file as an attachment. Throws a 404 HTTPError when the path is
// not a readable regular file.
export async function fileResponse(filePath: string, downloadFilename?: string): Promise<Response> {
    const stats = await stat(filePath).catch(() => null);
    const readable = stats?.isFile() ? await access(filePath, constants.R_OK).then(() => true, () => false) : false;
    if (!stats || !readable) {
        logger.debug('file not found', { path: filePath });
        throw new HTTPError(StatusCodes.NOT_FOUND);
    }

    let body: FileBody;
    try {
        body = await FileBody.open(filePath);
    } catch (err) {
        logger.debug('file could not be opened', { path: filePath, err });
        throw new HTTPError(StatusCodes.NOT_FOUND);
    }

    const filename = downloadFilename ?? path.basename(filePath);
    return new Response({
        headers: {
            'Content-Disposition': `attachment; filename="${encodeURIComponent(filename)}"`,
            'Content-Length': String(body.size),
            'Last-Modified': httpDate(stats.mtime),
        },
        body,
    });
}
