// src/http_writer.ts

import { Socket } from 'net';
import { httpDate } from './date';
import { FileBody, Response } from './response';
import { reasonPhrase } from './status';

export interface WriterOptions {
    serverName: string;
    chunkSize: number;
}

// Serializes `response` onto the socket and releases its body resource,
// whether or not the write succeeds. The response object is left untouched.
export async function writeHttpResponse(socket: Socket, response: Response, options: WriterOptions): Promise<void> {
    try {
        await writeChunk(socket, Buffer.from(serializeHead(response, options.serverName), 'latin1'));

        const body = response.body;
        if (body instanceof FileBody) {
            for await (const chunk of body.chunks(options.chunkSize)) {
                await writeChunk(socket, chunk);
            }
        } else if (body.length > 0) {
            await writeChunk(socket, typeof body === 'string' ? Buffer.from(body, 'utf8') : body);
        }
    } finally {
        await response.close();
    }
}

// Status line, headers and cookies up to and including the blank line.
// `Server` and `Date` are always set, and `Content-Length` for in-memory bodies.
export function serializeHead(response: Response, serverName: string, now: Date = new Date()): string {
    const headers = response.headers.clone();
    headers.set('Server', serverName);
    headers.set('Date', httpDate(now));
    if (!(response.body instanceof FileBody)) {
        headers.set('Content-Length', String(Buffer.byteLength(response.body)));
    }

    const lines = [`HTTP/1.1 ${response.status} ${reasonPhrase(response.status)}`];
    for (const [key, value] of headers) {
        lines.push(`${key}: ${value}`);
    }
    for (const cookie of response.cookies.serialize()) {
        lines.push(`Set-Cookie: ${cookie}`);
    }
    return lines.join('\r\n') + '\r\n\r\n';
}

function writeChunk(socket: Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        socket.write(data, (err) => (err ? reject(err) : resolve()));
    });
}
