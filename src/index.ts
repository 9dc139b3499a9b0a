// src/index.ts

export { loadConfig, serverConfigSchema } from './config';
export type { ServerConfig, ServerConfigInput } from './config';
export { ConnReader, ReadTimeoutError } from './conn_reader';
export type { BodySource } from './conn_reader';
export { ResponseCookies, parseCookies } from './cookies';
export type { CookieOptions, Cookies } from './cookies';
export { httpDate } from './date';
export { mediaType, parseFormUrlencoded, parseMultipartForm } from './form';
export type { FilePart, ParsedForm } from './form';
export { Headers, parseHeaderLines } from './headers';
export type { HeaderInit } from './headers';
export { contentLength, parseStartLine, readRequestHead } from './http_parser';
export type { RequestHead } from './http_parser';
export { serializeHead, writeHttpResponse } from './http_writer';
export { Logger } from './logger';
export type { LogMeta } from './logger';
export { applyMiddlewares, basicAuthMiddleware, composeMiddlewares } from './middleware';
export { PARAM_MARKER, extractPathParams, hasPathParams, normalizePath } from './paths';
export { parseQuery, parseQueryString } from './query';
export { Request } from './request';
export type { RequestInit } from './request';
export {
    FileBody,
    Response,
    errorResponse,
    fileResponse,
    htmlResponse,
    jsonResponse,
    redirectResponse,
    textResponse,
} from './response';
export type { ResponseBody, ResponseInit } from './response';
export { ExactRoute, FileSystemRoute, HTTP_METHODS, ParamsRoute, Router } from './router';
export type { HttpMethod, Route, RouteMatch } from './router';
export { Server } from './server';
export type { ServerOptions } from './server';
export { SpooledBuffer } from './spooled_buffer';
export { serveStaticFile } from './static_files';
export { StatusCodes, reasonPhrase } from './status';
export { ConfigError, HTTPError } from './types';
export type { Address, Form, Handler, LifecycleHook, Middleware, PathParams, Query } from './types';
