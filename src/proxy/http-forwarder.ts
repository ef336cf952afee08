/**
 * HTTP Forwarder
 *
 * Sends non-CONNECT requests on to their origin with an absolute-form target
 * and streams the origin's response back untouched.
 *
 * @module proxy/http-forwarder
 */

import { request as httpRequest, type IncomingMessage, type ServerResponse } from 'node:http';
import { RequestError, TransportError, formatError } from './errors.js';
import {
  DEFAULT_HTTP_PORT,
  buildAbsoluteTarget,
  getUriAuthority,
  parseAuthority,
  sendTextResponse,
} from './shared.js';
import type { OriginRequestFn } from './types.js';

export interface ForwardOptions {
  /** Outbound HTTP client (default: http.request) */
  originRequest?: OriginRequestFn;
  /** Abort the origin request after this many ms without activity (0 = never) */
  idleTimeoutMs?: number;
}

/**
 * Forward `req` to its origin and relay the response on `res`.
 *
 * Resolves once the response has been fully written. Rejects with a
 * RequestError when the target has no authority, or a TransportError when the
 * origin cannot be reached; in both cases a 400/502 has already been sent if
 * the response had not started.
 */
export function forwardHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: ForwardOptions = {}
): Promise<void> {
  const authority = getUriAuthority(req.url);
  if (!authority) {
    const err = new RequestError(`Missing authority in request target "${req.url ?? ''}"`);
    sendTextResponse(res, 400, err.message);
    return Promise.reject(err);
  }

  const target = buildAbsoluteTarget(authority, req.url);
  const origin = parseAuthority(authority, DEFAULT_HTTP_PORT);
  const requestFn = options.originRequest ?? httpRequest;
  const idleTimeoutMs = options.idleTimeoutMs ?? 0;

  return new Promise((resolve, reject) => {
    let settled = false;

    const fail = (err: unknown, context: string): void => {
      if (settled) return;
      settled = true;
      const transportError =
        err instanceof TransportError
          ? err
          : new TransportError(`${context}: ${formatError(err)}`, { cause: err });
      sendTextResponse(res, 502, 'Bad Gateway');
      reject(transportError);
    };

    const proxyReq = requestFn(
      {
        host: origin.host,
        port: origin.port,
        method: req.method,
        path: target,
        // Raw name/value pairs keep casing, order and repeated fields
        headers: req.rawHeaders,
      },
      (proxyRes) => {
        res.writeHead(proxyRes.statusCode ?? 502, proxyRes.statusMessage, proxyRes.rawHeaders);
        proxyRes.pipe(res);

        proxyRes.on('error', (err) => fail(err, 'HTTP response error'));
        proxyRes.on('end', () => {
          if (settled) return;
          settled = true;
          resolve();
        });
      }
    );

    if (idleTimeoutMs > 0) {
      proxyReq.setTimeout(idleTimeoutMs, () => {
        proxyReq.destroy(
          new TransportError(`Origin ${authority} idle for more than ${idleTimeoutMs}ms`)
        );
      });
    }

    proxyReq.on('error', (err) => fail(err, 'HTTP request error'));

    // Client gave up: stop talking to the origin as well
    res.on('close', () => {
      if (!res.writableFinished) {
        proxyReq.destroy();
      }
    });

    req.pipe(proxyReq);
  });
}
