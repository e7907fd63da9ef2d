import { PayloadTooLargeError, ValidationError } from '@tasktrack/core';
import type { ConnectionInfo, Context } from './types.js';

/**
 * Parse the JSON request body. An empty body reads as undefined so the
 * schema reports it as missing.
 */
export async function readJson(ctx: Context, maxBytes: number): Promise<unknown> {
  const declared = Number(ctx.request.headers.get('content-length') ?? '0');
  if (declared > maxBytes) throw new PayloadTooLargeError(maxBytes);

  const text = await ctx.request.text();
  if (Buffer.byteLength(text) > maxBytes) throw new PayloadTooLargeError(maxBytes);
  if (text.trim() === '') return undefined;

  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Malformed JSON body', [{ field: 'body', message: 'request body is not valid JSON' }]);
  }
}

/**
 * Client identity for rate limiting. Behind a trusted proxy the first
 * X-Forwarded-For entry wins; otherwise the socket address.
 */
export function clientIp(request: Request, info: ConnectionInfo, trustProxy: boolean): string {
  if (trustProxy) {
    const forwarded = request.headers.get('x-forwarded-for')?.split(',')[0]?.trim();
    if (forwarded) return forwarded;
  }
  return info.remoteAddress ?? 'unknown';
}
