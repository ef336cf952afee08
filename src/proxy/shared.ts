/**
 * Shared Proxy Utilities
 *
 * Target extraction and response helpers used by the dispatcher, the HTTP
 * forwarder and the CONNECT tunnel.
 *
 * @module proxy/shared
 */

import { STATUS_CODES, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import type { OriginAddress } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Default origin port for rewritten http:// targets */
export const DEFAULT_HTTP_PORT = 80;

/** Matches `scheme://` at the start of an absolute-form request target */
const ABSOLUTE_FORM_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

// =============================================================================
// Target Extraction
// =============================================================================

/**
 * Authority (`host[:port]`) carried by a request target, or null.
 *
 * - authority-form (`example.com:443`, CONNECT) is returned as is
 * - absolute-form (`http://example.com:8080/a?b`) yields `example.com:8080`
 * - origin-form (`/a?b`) and `*` carry none
 */
export function getUriAuthority(target: string | undefined): string | null {
  if (!target) return null;

  if (ABSOLUTE_FORM_PATTERN.test(target)) {
    const rest = target.slice(target.indexOf('://') + 3);
    const end = rest.search(/[/?#]/);
    const authority = end === -1 ? rest : rest.slice(0, end);
    return authority || null;
  }

  if (target.startsWith('/') || target === '*') {
    return null;
  }

  return target;
}

/**
 * Path and query of a request target, without the fragment.
 * Returns '/' when the target has none.
 */
export function getPathAndQuery(target: string | undefined): string {
  if (!target) return '/';

  let rest = target;
  if (ABSOLUTE_FORM_PATTERN.test(target)) {
    rest = target.slice(target.indexOf('://') + 3);
    const start = rest.search(/[/?#]/);
    rest = start === -1 ? '' : rest.slice(start);
  } else if (!target.startsWith('/')) {
    return '/';
  }

  const hash = rest.indexOf('#');
  if (hash !== -1) {
    rest = rest.slice(0, hash);
  }

  if (!rest) return '/';
  return rest.startsWith('?') ? `/${rest}` : rest;
}

/**
 * Host a request is aimed at: the URI authority, else the Host header,
 * else an empty string. An empty host never bypasses the filter: it fails
 * the forward or tunnel step instead.
 */
export function getRequestHost(req: Pick<IncomingMessage, 'url' | 'headers'>): string {
  const authority = getUriAuthority(req.url);
  if (authority) return authority;

  const hostHeader = req.headers.host;
  return hostHeader ?? '';
}

/**
 * Split an authority into a connectable hostname and port.
 * Bracketed IPv6 literals lose their brackets.
 */
export function parseAuthority(authority: string, defaultPort: number): OriginAddress {
  let host = authority;
  let portText = '';

  if (authority.startsWith('[')) {
    const close = authority.indexOf(']');
    if (close !== -1) {
      host = authority.slice(1, close);
      const after = authority.slice(close + 1);
      portText = after.startsWith(':') ? after.slice(1) : '';
    }
  } else {
    const colon = authority.lastIndexOf(':');
    if (colon !== -1) {
      host = authority.slice(0, colon);
      portText = authority.slice(colon + 1);
    }
  }

  const port = portText ? Number.parseInt(portText, 10) : defaultPort;
  return {
    host,
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : defaultPort,
  };
}

/**
 * Absolute-form target sent to the origin: `http://{authority}{path?query}`.
 */
export function buildAbsoluteTarget(authority: string, target: string | undefined): string {
  return `http://${authority}${getPathAndQuery(target)}`;
}

// =============================================================================
// Responses
// =============================================================================

/** Body of the 403 sent for filtered hosts */
export function blockedMessage(host: string): string {
  return `Access to ${host} is blocked by proxy filter rules`;
}

/**
 * Send a plain-text response unless one is already underway.
 */
export function sendTextResponse(res: ServerResponse, statusCode: number, body: string): void {
  if (res.headersSent) {
    if (!res.writableEnded) {
      res.destroy();
    }
    return;
  }

  res.writeHead(statusCode, {
    'Content-Type': 'text/plain',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

/**
 * Write a complete plain-text HTTP/1.1 response onto a raw socket and close it.
 * Used once the HTTP server has handed the socket over (CONNECT).
 */
export function writeRawResponse(socket: Duplex, statusCode: number, body = ''): void {
  if (socket.destroyed || !socket.writable) {
    socket.destroy();
    return;
  }

  const reason = STATUS_CODES[statusCode] ?? 'Unknown';
  const head = body
    ? `HTTP/1.1 ${statusCode} ${reason}\r\n` +
      'Content-Type: text/plain\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      'Connection: close\r\n' +
      '\r\n'
    : `HTTP/1.1 ${statusCode} ${reason}\r\nContent-Length: 0\r\nConnection: close\r\n\r\n`;

  socket.end(head + body);
}
