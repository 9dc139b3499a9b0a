// src/spooled_buffer.ts

import { randomUUID } from 'crypto';
import { FileHandle, open, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { Readable } from 'stream';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

// Write-once, read-many byte buffer. Data stays in memory until it grows
// past `maxMemoryBytes`, then everything moves to a temporary file.
export class SpooledBuffer {
    private chunks: Buffer[] = [];
    private file: { handle: FileHandle; path: string } | null = null;
    private length = 0;
    private closed = false;

    constructor(
        private readonly maxMemoryBytes: number,
        private readonly chunkSize: number = DEFAULT_CHUNK_SIZE,
    ) {}

    get size(): number {
        return this.length;
    }

    get spilled(): boolean {
        return this.file !== null;
    }

    // Location of the backing file, once spilled.
    get filePath(): string | null {
        return this.file?.path ?? null;
    }

    async write(chunk: Buffer): Promise<void> {
        this.assertOpen();
        if (chunk.length === 0) return;
        if (!this.file && this.length + chunk.length > this.maxMemoryBytes) {
            await this.spill();
        }
        if (this.file) {
            await writeAll(this.file.handle, chunk, this.length);
        } else {
            this.chunks.push(chunk);
        }
        this.length += chunk.length;
    }

    // The whole contents as one buffer.
    async read(): Promise<Buffer> {
        this.assertOpen();
        if (!this.file) return Buffer.concat(this.chunks, this.length);
        const out = Buffer.alloc(this.length);
        let offset = 0;
        while (offset < this.length) {
            const { bytesRead } = await this.file.handle.read(out, offset, this.length - offset, offset);
            if (bytesRead === 0) break;
            offset += bytesRead;
        }
        return out.subarray(0, offset);
    }

    // A fresh stream over the contents from the first byte. Reading it does
    // not consume the buffer.
    stream(): Readable {
        this.assertOpen();
        if (!this.file) return Readable.from([...this.chunks]);
        return Readable.from(this.fileChunks(this.file.handle, this.length));
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.chunks = [];
        const file = this.file;
        this.file = null;
        if (file) {
            try {
                await file.handle.close();
            } finally {
                await rm(file.path, { force: true });
            }
        }
    }

    private async spill(): Promise<void> {
        const filePath = path.join(tmpdir(), `spool-${randomUUID()}`);
        const handle = await open(filePath, 'wx+', 0o600);
        this.file = { handle, path: filePath };
        let offset = 0;
        for (const chunk of this.chunks) {
            await writeAll(handle, chunk, offset);
            offset += chunk.length;
        }
        this.chunks = [];
    }

    private async *fileChunks(handle: FileHandle, length: number): AsyncGenerator<Buffer> {
        let position = 0;
        while (position < length) {
            const buffer = Buffer.alloc(Math.min(this.chunkSize, length - position));
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
            if (bytesRead === 0) return;
            position += bytesRead;
            yield buffer.subarray(0, bytesRead);
        }
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new Error('SpooledBuffer is closed');
        }
    }
}

async function writeAll(handle: FileHandle, chunk: Buffer, position: number): Promise<void> {
    let written = 0;
    while (written < chunk.length) {
        const { bytesWritten } = await handle.write(chunk, written, chunk.length - written, position + written);
        written += bytesWritten;
    }
}
