// src/form.ts

import busboy from 'busboy';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { parseQueryString } from './query';
import { SpooledBuffer } from './spooled_buffer';
import { Form, HTTPError } from './types';

// One uploaded file from a multipart body.
export interface FilePart {
    fieldName: string;
    filename: string;
    contentType: string;
    content: SpooledBuffer;
}

export interface ParsedForm {
    form: Form;
    files: FilePart[];
}

export interface SpoolLimits {
    spoolMaxBytes: number;
    chunkSize: number;
}

export function parseFormUrlencoded(data: string): Form {
    return parseQueryString(data);
}

// Media type of a Content-Type value, lower-cased and without parameters.
export function mediaType(contentType: string | undefined): string {
    return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

// Decodes a multipart/form-data body. Plain fields go to `form`; parts with
// a filename are spooled into their own buffers.
export async function parseMultipartForm(
    contentType: string,
    body: Readable,
    limits: SpoolLimits,
): Promise<ParsedForm> {
    const form: Form = Object.create(null);
    const files: FilePart[] = [];
    const uploads: Promise<void>[] = [];
    let uploadError: unknown = null;

    let parser: busboy.Busboy;
    try {
        parser = busboy({ headers: { 'content-type': contentType } });
    } catch (err) {
        throw new HTTPError(400, `Malformed multipart content type: ${describe(err)}`);
    }

    parser.on('field', (name, value) => {
        (form[name] ??= []).push(value);
    });
    parser.on('file', (fieldName, stream, info) => {
        const content = new SpooledBuffer(limits.spoolMaxBytes, limits.chunkSize);
        files.push({ fieldName, filename: info.filename, contentType: info.mimeType, content });
        uploads.push(
            spool(stream, content).catch((err: unknown) => {
                // Keep draining so the parser can reach the end of the body.
                uploadError ??= err;
                stream.resume();
            }),
        );
    });

    try {
        await pipeline(body, parser);
        await Promise.all(uploads);
        if (uploadError !== null) throw uploadError;
    } catch (err) {
        await Promise.allSettled(files.map((file) => file.content.close()));
        throw new HTTPError(400, `Malformed multipart body: ${describe(err)}`);
    }
    return { form, files };
}

async function spool(stream: Readable, content: SpooledBuffer): Promise<void> {
    for await (const chunk of stream) {
        await content.write(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
