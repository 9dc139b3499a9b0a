// src/logger.ts

import pino from 'pino';

export type LogMeta = Record<string, unknown>;

// Named logger. Every instance is a child of one process-wide pino logger.
export class Logger {
    private static rootLogger: pino.Logger | undefined;
    private readonly logger: pino.Logger;

    constructor(name: string) {
        this.logger = Logger.getChild(name);
    }

    static getChild(name: string): pino.Logger {
        if (!this.rootLogger) {
            this.rootLogger = pino({
                level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
            });
        }
        return this.rootLogger.child({ name });
    }

    trace(message: string, meta: LogMeta = {}): void {
        this.logger.trace(meta, message);
    }

    debug(message: string, meta: LogMeta = {}): void {
        this.logger.debug(meta, message);
    }

    info(message: string, meta: LogMeta = {}): void {
        this.logger.info(meta, message);
    }

    warn(message: string, meta: LogMeta = {}): void {
        this.logger.warn(meta, message);
    }

    error(message: string, meta: LogMeta = {}): void {
        this.logger.error(meta, message);
    }

    fatal(message: string, meta: LogMeta = {}): void {
        this.logger.fatal(meta, message);
    }
}
