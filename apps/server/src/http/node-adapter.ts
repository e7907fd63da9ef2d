/**
 * Bridges node:http to the fetch-style app: buffers the body (bounded),
 * builds a web Request, and writes the Response back.
 */
import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import { PayloadTooLargeError, getLogger } from '@tasktrack/core';
import type { App } from '../app.js';
import { errorResponse, internalErrorResponse } from './response.js';

const log = getLogger('HTTP');

export interface NodeAdapterOptions {
  maxBodyBytes: number;
}

/** Resolves to null when the body exceeds `maxBytes` */
function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(tooLarge ? null : Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function toHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.set(name, value);
    }
  }
  return headers;
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  res.writeHead(response.status, headers);
  res.end(response.body ? Buffer.from(await response.arrayBuffer()) : undefined);
}

async function handle(app: App, req: IncomingMessage, res: ServerResponse, options: NodeAdapterOptions): Promise<void> {
  const method = (req.method ?? 'GET').toUpperCase();
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const hasBody = method !== 'GET' && method !== 'HEAD';

  const body = hasBody ? await readBody(req, options.maxBodyBytes) : Buffer.alloc(0);
  if (body === null) {
    await writeResponse(res, errorResponse(new PayloadTooLargeError(options.maxBodyBytes)));
    return;
  }

  const request = new Request(url, {
    method,
    headers: toHeaders(req),
    body: hasBody && body.length > 0 ? body : null,
  });
  const response = await app.fetch(request, { remoteAddress: req.socket.remoteAddress });
  await writeResponse(res, response);
}

export function toNodeListener(app: App, options: NodeAdapterOptions): RequestListener {
  return (req, res) => {
    handle(app, req, res, options).catch((err: unknown) => {
      log.error('Failed to serve request', err instanceof Error ? err : { error: String(err) });
      if (res.headersSent) {
        res.destroy();
        return;
      }
      writeResponse(res, internalErrorResponse()).catch(() => res.destroy());
    });
  };
}
