// src/conn_reader.ts

import { Socket } from 'net';
import { HTTPError } from './types';

export class ReadTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Read timed out after ${timeoutMs}ms`);
        this.name = 'ReadTimeoutError';
    }
}

// Anything the request body can be pulled from.
export interface BodySource {
    // Up to `maxBytes` bytes; an empty buffer means the peer closed.
    read(maxBytes: number): Promise<Buffer>;
}

type PendingRead = { resolve: (chunk: Buffer) => void; reject: (err: Error) => void };

// Pull-based reader over a paused socket. The socket is resumed only while a
// read is waiting, and every network read goes through `readWithTimeout`.
export class ConnReader implements BodySource {
    private buffered: Buffer = Buffer.alloc(0);
    private pending: PendingRead | null = null;
    private ended = false;
    private failure: Error | null = null;
    private discarding = false;

    constructor(private readonly socket: Socket, private readonly timeoutMs: number) {
        socket.pause();
        socket.on('data', (chunk: Buffer) => {
            if (this.discarding) return;
            socket.pause();
            const pending = this.pending;
            this.pending = null;
            if (pending) {
                pending.resolve(chunk);
            } else {
                this.buffered = Buffer.concat([this.buffered, chunk]);
            }
        });
        const onEnd = () => {
            this.ended = true;
            const pending = this.pending;
            this.pending = null;
            pending?.resolve(Buffer.alloc(0));
        };
        socket.on('end', onEnd);
        socket.on('close', onEnd);
        socket.on('error', (err) => {
            this.failure = err;
            const pending = this.pending;
            this.pending = null;
            pending?.reject(err);
        });
    }

    // Reads one line terminated by `\n` and returns it without the line break.
    // Fails with 431 once `maxBytes` are buffered without a line end, and
    // with 400 if the connection ends first.
    async readLine(maxBytes: number): Promise<string> {
        let scanned = 0;
        for (;;) {
            const index = this.buffered.indexOf(0x0a, scanned);
            if (index !== -1) {
                const line = this.buffered.subarray(0, index);
                this.buffered = this.buffered.subarray(index + 1);
                const end = line.length > 0 && line[line.length - 1] === 0x0d ? line.length - 1 : line.length;
                return line.subarray(0, end).toString('latin1');
            }
            if (this.buffered.length > maxBytes) {
                throw new HTTPError(431, 'Request header is too large');
            }
            scanned = this.buffered.length;
            const chunk = await this.readWithTimeout();
            if (chunk.length === 0) {
                throw new HTTPError(400, 'Connection closed before the request head was complete');
            }
            this.buffered = Buffer.concat([this.buffered, chunk]);
        }
    }

    async read(maxBytes: number): Promise<Buffer> {
        if (this.buffered.length === 0) {
            const chunk = await this.readWithTimeout();
            if (chunk.length === 0) return chunk;
            this.buffered = chunk;
        }
        const out = this.buffered.subarray(0, maxBytes);
        this.buffered = this.buffered.subarray(out.length);
        return out;
    }

    // Stops reading for good and lets the socket flow, dropping whatever the
    // peer still sends (such as a body nobody read).
    discard(): void {
        this.discarding = true;
        this.buffered = Buffer.alloc(0);
        this.socket.resume();
    }

    private readWithTimeout(): Promise<Buffer> {
        if (this.failure) return Promise.reject(this.failure);
        if (this.ended) return Promise.resolve(Buffer.alloc(0));
        return new Promise<Buffer>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending = null;
                this.socket.pause();
                reject(new ReadTimeoutError(this.timeoutMs));
            }, this.timeoutMs);
            this.pending = {
                resolve: (chunk) => {
                    clearTimeout(timer);
                    resolve(chunk);
                },
                reject: (err) => {
                    clearTimeout(timer);
                    reject(err);
                },
            };
            this.socket.resume();
        });
    }
}
