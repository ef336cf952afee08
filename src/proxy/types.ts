/**
 * Proxy Types
 * Shared type definitions for the dispatcher, forwarder and tunnel
 */

import type { ClientRequest, IncomingMessage, RequestOptions } from 'node:http';
import type { DomainFilter } from '../filters/index.js';

/**
 * Outbound HTTP client capability: send this request, get this response.
 * Matches the signature of `http.request` so it can be passed directly.
 */
export type OriginRequestFn = (
  options: RequestOptions,
  callback: (res: IncomingMessage) => void
) => ClientRequest;

/**
 * Where a forwarded request or tunnel connects to
 */
export interface OriginAddress {
  /** Hostname or IP literal (no IPv6 brackets) */
  host: string;
  /** TCP port */
  port: number;
}

/**
 * Decision recorded for a dispatched request
 */
export type FilterDecision = 'allowed' | 'blocked';

/**
 * Byte counts for a finished tunnel relay
 */
export interface RelayResult {
  /** Bytes copied from the client to the origin */
  clientToOrigin: number;
  /** Bytes copied from the origin to the client */
  originToClient: number;
}

/**
 * Options for the HTTP proxy server
 */
export interface HttpProxyOptions {
  /** Port to listen on (0 picks a free port) */
  port: number;
  /** Address to bind to */
  bindAddress?: string;
  /** Shared, immutable domain filter */
  filter: DomainFilter;
  /** Outbound HTTP client used for non-CONNECT requests (default: http.request) */
  originRequest?: OriginRequestFn;
  /** Destroy idle origin requests and tunnels after this many ms (0 = never) */
  idleTimeoutMs?: number;
}
