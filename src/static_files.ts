// src/static_files.ts

import * as path from 'path';
import type { Request } from './request';
import { Response, fileResponse } from './response';
import { StatusCodes } from './status';
import { HTTPError } from './types';

// Serves `<root>/<rest>` for a request to `<prefix>/<rest>`. Anything that
// resolves outside `root` is reported as not found.
export async function serveStaticFile<C>(root: string, prefix: string, req: Request<C>): Promise<Response> {
    const rest = prefix === '/' ? req.pathname : req.pathname.slice(prefix.length);
    let relative: string;
    try {
        relative = decodeURIComponent(rest);
    } catch {
        throw new HTTPError(StatusCodes.BAD_REQUEST, 'Malformed path encoding');
    }
    if (relative.includes('\0')) {
        throw new HTTPError(StatusCodes.NOT_FOUND);
    }

    const filePath = path.resolve(root, `.${path.sep}${relative}`);
    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
        throw new HTTPError(StatusCodes.NOT_FOUND);
    }
    return fileResponse(filePath);
}
