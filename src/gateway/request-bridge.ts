/**
 * Conversion between Node HTTP messages and fetch Request/Response
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

/**
 * Connection-scoped headers (RFC 9110 §7.6.1) plus the ones the outbound
 * client recomputes
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

// Base for request URLs; only path and query are meaningful downstream
const INTERNAL_ORIGIN = 'http://gateway.internal';

function connectionListed(connection: string | string[] | undefined): Set<string> {
  const value = Array.isArray(connection) ? connection.join(',') : connection ?? '';
  return new Set(
    value.split(',').map((token) => token.trim().toLowerCase()).filter((token) => token.length > 0)
  );
}

export function toForwardHeaders(headers: IncomingHttpHeaders): Headers {
  const listed = connectionListed(headers.connection);
  const forwarded = new Headers();

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name) || listed.has(name)) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        forwarded.append(name, item);
      }
    } else {
      forwarded.set(name, value);
    }
  }
  return forwarded;
}

/**
 * Wrap an inbound message as a fetch Request. The body is streamed, never
 * buffered.
 *
 * @param url - path and query as received (`originalUrl` under Express)
 */
export function toFetchRequest(req: IncomingMessage, url: string): Request {
  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(new URL(url, INTERNAL_ORIGIN), {
    method,
    headers: toForwardHeaders(req.headers),
    body: hasBody ? Readable.toWeb(req) : undefined,
    duplex: 'half',
  });
}

/**
 * Write an instance response back to the client: status, end-to-end
 * headers and the streamed body.
 */
export async function relayResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;

  response.headers.forEach((value, name) => {
    // fetch has already decoded the body
    if (HOP_BY_HOP_HEADERS.has(name) || name === 'content-encoding' || name === 'set-cookie') {
      return;
    }
    res.setHeader(name, value);
  });

  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader('set-cookie', cookies);
  }

  if (!response.body) {
    res.end();
    return;
  }
  await pipeline(Readable.fromWeb(response.body), res);
}
