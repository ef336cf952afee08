/**
 * HTTP Forward Proxy
 *
 * Accepts proxy connections, applies the domain filter to every request and
 * either forwards plain HTTP or tunnels CONNECT traffic.
 *
 * Architecture:
 * - Node's HTTP server runs one HTTP/1.1 loop per accepted connection
 *   (persistent connections, responses in request order)
 * - `request` events go through the dispatcher to the HTTP forwarder
 * - `connect` events hand over the raw socket and go to the tunnel
 * - Every handler runs inside an error boundary, so one bad client or origin
 *   only ever affects its own connection
 *
 * @module proxy/http-proxy
 */

import {
  createServer,
  request as httpRequest,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import type { Duplex } from 'node:stream';
import type { DomainFilter } from '../filters/index.js';
import { ProtocolError, formatError, isProxyError } from './errors.js';
import { forwardHttpRequest } from './http-forwarder.js';
import {
  blockedMessage,
  getRequestHost,
  getUriAuthority,
  sendTextResponse,
  writeRawResponse,
} from './shared.js';
import { establishTunnel } from './tunnel.js';
import type { FilterDecision, HttpProxyOptions, OriginRequestFn } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Everything a dispatch needs; one instance is shared by all connections */
export interface DispatchContext {
  filter: DomainFilter;
  originRequest: OriginRequestFn;
  idleTimeoutMs: number;
}

// =============================================================================
// Logging
// =============================================================================

function logDecision(kind: string, method: string, target: string, decision: FilterDecision): void {
  console.log(`${kind}: ${method} ${target} [${decision}]`);
}

function logFailure(context: string, err: unknown): void {
  const label = isProxyError(err) ? `${context} (${err.kind})` : context;
  console.error(`❌ ${label}: ${formatError(err)}`);
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Filter and route a non-CONNECT request.
 */
export async function dispatchRequest(
  req: IncomingMessage,
  res: ServerResponse,
  context: DispatchContext
): Promise<FilterDecision> {
  const host = getRequestHost(req);
  const method = req.method ?? 'GET';
  const target = req.url ?? '/';

  if (!context.filter.isAllowed(host)) {
    logDecision('📡 HTTP', method, target, 'blocked');
    console.log(`🚫 BLOCKED: ${host}`);
    sendTextResponse(res, 403, blockedMessage(host));
    req.resume();
    return 'blocked';
  }

  logDecision('📡 HTTP', method, target, 'allowed');
  await forwardHttpRequest(req, res, {
    originRequest: context.originRequest,
    idleTimeoutMs: context.idleTimeoutMs,
  });
  return 'allowed';
}

/**
 * Filter a CONNECT request and tunnel it when allowed.
 * Resolves when the tunnel has closed (or immediately when blocked).
 */
export async function dispatchConnect(
  req: IncomingMessage,
  clientSocket: Duplex,
  head: Buffer,
  context: DispatchContext
): Promise<FilterDecision> {
  const host = getRequestHost(req);
  const target = req.url ?? '';

  if (!context.filter.isAllowed(host)) {
    logDecision('🔒 HTTPS CONNECT', 'CONNECT', target, 'blocked');
    console.log(`🚫 BLOCKED: ${host}`);
    clientSocket.on('error', (err) => logFailure(`Blocked client ${host} socket error`, err));
    writeRawResponse(clientSocket, 403, blockedMessage(host));
    return 'blocked';
  }

  logDecision('🔒 HTTPS CONNECT', 'CONNECT', target, 'allowed');
  await establishTunnel(getUriAuthority(req.url) ?? '', clientSocket, head, {
    idleTimeoutMs: context.idleTimeoutMs,
  });
  return 'allowed';
}

// =============================================================================
// Server Factory
// =============================================================================

/**
 * Create and start the HTTP proxy server.
 *
 * The returned server is already listening (or about to be); wait for its
 * `listening` event before reading `address()`.
 */
export function createHttpProxy(options: HttpProxyOptions): Server {
  const bindAddress = options.bindAddress ?? '127.0.0.1';
  const context: DispatchContext = {
    filter: options.filter,
    originRequest: options.originRequest ?? httpRequest,
    idleTimeoutMs: options.idleTimeoutMs ?? 0,
  };

  const server = createServer((req, res) => {
    dispatchRequest(req, res, context).catch((err: unknown) => {
      logFailure(`HTTP proxy error for ${req.method ?? 'GET'} ${req.url ?? '/'}`, err);
      sendTextResponse(res, 500, 'Internal Server Error');
    });
  });

  server.on('connect', (req: IncomingMessage, clientSocket: Duplex, head: Buffer) => {
    dispatchConnect(req, clientSocket, head, context).catch((err: unknown) => {
      logFailure(`Tunnel error for ${req.url ?? ''}`, err);
      // A 400 written on the raw socket is still flushing
      if (!clientSocket.writableEnded) {
        clientSocket.destroy();
      }
    });
  });

  server.on('clientError', (err: Error, socket: Duplex) => {
    const protocolError = new ProtocolError(`Malformed client request: ${formatError(err)}`, {
      cause: err,
    });
    console.warn(`⚠️ ${protocolError.message}`);
    if (socket.writable) {
      writeRawResponse(socket, 400);
    } else {
      socket.destroy();
    }
  });

  server.on('error', (err) => {
    logFailure('HTTP proxy server error', err);
  });

  server.listen(options.port, bindAddress, () => {
    const addr = server.address();
    const port = typeof addr === 'object' && addr ? addr.port : options.port;
    console.log(`🌐 HTTP Proxy listening on ${bindAddress}:${port} (${context.filter.describe()})`);
  });

  return server;
}
