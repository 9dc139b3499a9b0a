// src/server.ts

import * as net from 'net';
import { ServerConfig, ServerConfigInput, loadConfig } from './config';
import { ConnReader, ReadTimeoutError } from './conn_reader';
import { RequestHead, readRequestHead } from './http_parser';
import { writeHttpResponse } from './http_writer';
import { Logger } from './logger';
import { applyMiddlewares } from './middleware';
import { Request } from './request';
import { Response, errorResponse } from './response';
import { Router } from './router';
import { StatusCodes } from './status';
import { Address, HTTPError, LifecycleHook, Middleware } from './types';

export interface ServerOptions<C> {
    router: Router<C>;
    // Applied to every matched handler; the first entry is the outermost layer.
    middlewares?: Middleware<C>[];
    beforeServerStart?: LifecycleHook<C>;
    afterServerStop?: LifecycleHook<C>;
    ctx: C;
    config?: ServerConfigInput;
}

// One request per connection: read, route, handle, write, close.
export class Server<C = unknown> {
    readonly config: ServerConfig;

    private readonly logger = new Logger('Server');
    private readonly router: Router<C>;
    private readonly middlewares: Middleware<C>[];
    private readonly beforeServerStart?: LifecycleHook<C>;
    private readonly afterServerStop?: LifecycleHook<C>;
    private readonly ctx: C;

    private readonly inFlight = new Set<Promise<void>>();
    private listener: net.Server | null = null;
    private requestStop: (() => void) | null = null;
    private readonly ready: Promise<net.AddressInfo>;
    private markReady: (address: net.AddressInfo) => void = () => undefined;
    private markFailed: (err: unknown) => void = () => undefined;

    constructor(options: ServerOptions<C>) {
        this.router = options.router;
        this.middlewares = options.middlewares ?? [];
        this.beforeServerStart = options.beforeServerStart;
        this.afterServerStop = options.afterServerStop;
        this.ctx = options.ctx;
        this.config = loadConfig(options.config);
        this.ready = new Promise((resolve, reject) => {
            this.markReady = resolve;
            this.markFailed = reject;
        });
        // `run` rejects with the same error; nobody has to await `listening()`.
        this.ready.catch(() => undefined);
    }

    // Resolves with the bound address once connections are being accepted,
    // rejects if the server fails before getting there.
    listening(): Promise<net.AddressInfo> {
        return this.ready;
    }

    // Serves until SIGINT or `stop()`, then drains in-flight connections and
    // runs the shutdown hook.
    async run(host: string, port: number): Promise<void> {
        if (this.listener) {
            throw new Error('Server is already running');
        }
        try {
            await this.serve(host, port);
        } catch (err) {
            this.markFailed(err);
            throw err;
        }
    }

    // Starts a graceful shutdown. `run` resolves once it is complete.
    stop(): void {
        this.requestStop?.();
    }

    private async serve(host: string, port: number): Promise<void> {
        if (this.beforeServerStart) {
            await this.beforeServerStart(this.ctx);
        }

        const listener = net.createServer((socket) => this.track(socket));
        this.listener = listener;
        const stopRequested = new Promise<void>((resolve) => {
            this.requestStop = resolve;
        });
        const onSigint = () => {
            this.logger.info('received SIGINT, shutting down');
            this.stop();
        };
        process.once('SIGINT', onSigint);

        try {
            const address = await listen(listener, host, port);
            this.logger.info(`serve http://${host}:${address.port}`);
            this.markReady(address);
            await stopRequested;
        } finally {
            process.removeListener('SIGINT', onSigint);
            await this.drain(listener);
            this.listener = null;
            this.requestStop = null;
        }

        this.logger.info('stop server');
        if (this.afterServerStop) {
            await this.afterServerStop(this.ctx);
        }
    }

    private track(socket: net.Socket): void {
        const task: Promise<void> = this.handleConnection(socket)
            .catch((err: unknown) => this.logger.error('connection handler failed', { err }))
            .finally(() => this.inFlight.delete(task));
        this.inFlight.add(task);
    }

    private async drain(listener: net.Server): Promise<void> {
        const closed = listener.listening
            ? new Promise<void>((resolve, reject) => listener.close((err) => (err ? reject(err) : resolve())))
            : Promise.resolve();
        await Promise.all([...this.inFlight]);
        await closed;
    }

    private async handleConnection(socket: net.Socket): Promise<void> {
        const reader = new ConnReader(socket, this.config.readTimeoutMs);
        const address: Address = {
            host: socket.remoteAddress ?? '',
            port: socket.remotePort ?? 0,
            family: socket.remoteFamily ?? '',
        };
        let head: RequestHead | null = null;
        let request: Request<C> | null = null;
        let response: Response;

        try {
            head = await readRequestHead(reader, this.config.maxHeaderBytes);
            this.logger.debug('start line', { address, method: head.method, path: head.path, protocol: head.protocol });

            const matched = this.router.match(head.path, head.method);
            if (!matched) {
                throw new HTTPError(StatusCodes.NOT_FOUND, `no route for ${head.method} ${head.path}`);
            }

            request = new Request<C>({
                source: reader,
                address,
                method: head.method,
                path: head.path,
                protocol: head.protocol,
                headers: head.headers,
                pathParams: matched.pathParams,
                ctx: this.ctx,
                chunkSize: this.config.chunkSize,
                spoolMaxBytes: this.config.spoolMaxBytes,
            });
            const handler = applyMiddlewares(matched.route.handler, this.middlewares);
            response = await handler(request);
        } catch (err) {
            if (err instanceof ReadTimeoutError) {
                this.logger.warn('read timed out, dropping connection', { address, timeoutMs: err.timeoutMs });
                socket.destroy();
                await this.release(request);
                return;
            }
            response = this.toErrorResponse(err);
        }

        try {
            await writeHttpResponse(socket, response, this.config);
            this.logger.info(`${head?.method ?? '-'} ${head?.path ?? '-'} ${response.status}`, { address });
        } catch (err) {
            this.logger.debug('failed to write response', { address, err });
        } finally {
            await this.release(request);
            this.closeSocket(socket, reader);
        }
    }

    private toErrorResponse(err: unknown): Response {
        if (err instanceof HTTPError) {
            this.logger.warn(err.message, { status: err.statusCode });
            return errorResponse(err.statusCode, err.headers);
        }
        this.logger.error('unhandled error while handling request', { err });
        return errorResponse(StatusCodes.INTERNAL_SERVER_ERROR);
    }

    private async release(request: Request<C> | null): Promise<void> {
        if (!request) return;
        try {
            await request.close();
        } catch (err) {
            this.logger.warn('failed to release request resources', { err });
        }
    }

    // Ends our side of the connection; a peer that never closes its side is
    // cut off after the read timeout.
    private closeSocket(socket: net.Socket, reader: ConnReader): void {
        if (socket.destroyed) return;
        socket.setTimeout(this.config.readTimeoutMs, () => socket.destroy());
        socket.end();
        reader.discard();
    }
}

function listen(listener: net.Server, host: string, port: number): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
        const onError = (err: Error) => reject(err);
        listener.once('error', onError);
        listener.listen(port, host, () => {
            listener.removeListener('error', onError);
            const address = listener.address();
            if (address === null || typeof address === 'string') {
                reject(new Error(`unexpected listener address: ${String(address)}`));
                return;
            }
            resolve(address);
        });
    });
}
