import * as net from 'net';

export interface RawResponse {
    statusLine: string;
    status: number;
    headers: Array<[string, string]>;
    body: Buffer;
}

// Sends `request` as-is and collects everything until the server closes.
export function sendRaw(port: number, request: string | Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        const socket = net.connect(port, '127.0.0.1', () => {
            socket.write(request);
        });
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.on('error', reject);
        socket.on('close', () => resolve(Buffer.concat(chunks)));
    });
}

export function parseRawResponse(raw: Buffer): RawResponse {
    const headEnd = raw.indexOf('\r\n\r\n');
    if (headEnd === -1) {
        throw new Error(`no response head in ${JSON.stringify(raw.toString('latin1'))}`);
    }
    const [statusLine, ...lines] = raw.subarray(0, headEnd).toString('latin1').split('\r\n');
    const headers = lines.map((line): [string, string] => {
        const index = line.indexOf(':');
        return [line.slice(0, index), line.slice(index + 1).trim()];
    });
    return {
        statusLine,
        status: Number(statusLine.split(' ')[1]),
        headers,
        body: raw.subarray(headEnd + 4),
    };
}

export async function request(port: number, raw: string | Buffer): Promise<RawResponse> {
    return parseRawResponse(await sendRaw(port, raw));
}

export function header(response: RawResponse, name: string): string | undefined {
    return response.headers.find(([key]) => key.toLowerCase() === name.toLowerCase())?.[1];
}

export function headerValues(response: RawResponse, name: string): string[] {
    return response.headers.filter(([key]) => key.toLowerCase() === name.toLowerCase()).map(([, value]) => value);
}

// A GET/POST request with `Connection: close` and a correct Content-Length.
export function httpRequest(method: string, path: string, headers: Record<string, string> = {}, body = ''): string {
    const lines = [`${method} ${path} HTTP/1.1`, 'Host: 127.0.0.1'];
    for (const [name, value] of Object.entries(headers)) lines.push(`${name}: ${value}`);
    if (body.length > 0 || method === 'POST') lines.push(`Content-Length: ${Buffer.byteLength(body)}`);
    return `${lines.join('\r\n')}\r\n\r\n${body}`;
}
