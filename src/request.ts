// src/request.ts

import { BodySource } from './conn_reader';
import { Cookies, parseCookies } from './cookies';
import { FilePart, ParsedForm, mediaType, parseFormUrlencoded, parseMultipartForm } from './form';
import { Headers } from './headers';
import { contentLength } from './http_parser';
import { LazyValue } from './lazy_value';
import { normalizePath } from './paths';
import { parseQuery } from './query';
import { SpooledBuffer } from './spooled_buffer';
import { Address, Form, PathParams, Query } from './types';

export interface RequestInit<C> {
    source: BodySource;
    address: Address;
    method: string;
    path: string;
    protocol: string;
    headers: Headers;
    pathParams?: PathParams;
    ctx: C;
    chunkSize: number;
    spoolMaxBytes: number;
}

// A parsed request. Identity fields are set up front; the body and
// everything derived from it are read on first use and cached.
export class Request<C = unknown> {
    readonly address: Address;
    readonly method: string;
    // Request target as sent, including any query string.
    readonly path: string;
    readonly pathname: string;
    readonly protocol: string;
    readonly headers: Headers;
    readonly pathParams: PathParams;
    readonly ctx: C;

    private readonly source: BodySource;
    private readonly chunkSize: number;
    private readonly spoolMaxBytes: number;

    private readonly lazyQuery = new LazyValue(async () => parseQuery(this.path));
    private readonly lazyCookies = new LazyValue(async () => parseCookies(this.headers.get('cookie')));
    private readonly lazyBody = new LazyValue(() => this.readBody());
    private readonly lazyJson = new LazyValue(() => this.parseJson());
    private readonly lazyForm = new LazyValue(() => this.parseForm());

    constructor(init: RequestInit<C>) {
        this.source = init.source;
        this.address = init.address;
        this.method = init.method;
        this.path = init.path;
        this.pathname = normalizePath(init.path);
        this.protocol = init.protocol;
        this.headers = init.headers;
        this.pathParams = init.pathParams ?? {};
        this.ctx = init.ctx;
        this.chunkSize = init.chunkSize;
        this.spoolMaxBytes = init.spoolMaxBytes;
    }

    query(): Promise<Query> {
        return this.lazyQuery.get();
    }

    cookies(): Promise<Cookies> {
        return this.lazyCookies.get();
    }

    // The raw body, spooled so it can be read more than once.
    body(): Promise<SpooledBuffer> {
        return this.lazyBody.get();
    }

    async bodyData(): Promise<Buffer> {
        const body = await this.body();
        return body.read();
    }

    // Parsed JSON body; `null` for an empty body.
    json(): Promise<unknown> {
        return this.lazyJson.get();
    }

    async form(): Promise<Form> {
        return (await this.lazyForm.get()).form;
    }

    async files(): Promise<FilePart[]> {
        return (await this.lazyForm.get()).files;
    }

    // Releases the spooled body and any uploaded files.
    async close(): Promise<void> {
        const buffers: SpooledBuffer[] = [];
        // A view that failed has already reported to its caller and left
        // nothing open.
        if (this.lazyBody.started) {
            await this.lazyBody.get().then((body) => buffers.push(body), () => undefined);
        }
        if (this.lazyForm.started) {
            await this.lazyForm.get().then(({ files }) => buffers.push(...files.map((f) => f.content)), () => undefined);
        }
        await Promise.all(buffers.map((buffer) => buffer.close()));
    }

    private async readBody(): Promise<SpooledBuffer> {
        const buffer = new SpooledBuffer(this.spoolMaxBytes, this.chunkSize);
        let remaining = contentLength(this.headers);
        try {
            while (remaining > 0) {
                const chunk = await this.source.read(Math.min(this.chunkSize, remaining));
                if (chunk.length === 0) break;
                await buffer.write(chunk);
                remaining -= chunk.length;
            }
        } catch (err) {
            await buffer.close();
            throw err;
        }
        return buffer;
    }

    private async parseJson(): Promise<unknown> {
        const data = await this.bodyData();
        if (data.length === 0) return null;
        return JSON.parse(data.toString('utf8'));
    }

    private async parseForm(): Promise<ParsedForm> {
        const contentType = this.headers.get('content-type') ?? '';
        switch (mediaType(contentType)) {
            case 'application/x-www-form-urlencoded':
                return { form: parseFormUrlencoded((await this.bodyData()).toString('utf8')), files: [] };
            case 'multipart/form-data': {
                const body = await this.body();
                return parseMultipartForm(contentType, body.stream(), {
                    spoolMaxBytes: this.spoolMaxBytes,
                    chunkSize: this.chunkSize,
                });
            }
            default:
                return { form: {}, files: [] };
        }
    }
}
