/**
 * Proxy Module
 *
 * Main entry point for the proxy functionality.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { createHttpProxy, DomainFilter } from 'portcullis';
 *
 * // Start a proxy on port 8080 that refuses one domain
 * const server = createHttpProxy({
 *   port: 8080,
 *   filter: DomainFilter.denyList(['blocked.example']),
 * });
 * ```
 */

// =============================================================================
// Proxy Server
// =============================================================================

export {
  createHttpProxy,
  dispatchRequest,
  dispatchConnect,
  type DispatchContext,
} from './http-proxy.js';

// =============================================================================
// Forwarding and Tunneling
// =============================================================================

export { forwardHttpRequest, type ForwardOptions } from './http-forwarder.js';
export {
  establishTunnel,
  relayBidirectional,
  CONNECT_ESTABLISHED_RESPONSE,
  type TunnelOptions,
} from './tunnel.js';

// =============================================================================
// Types
// =============================================================================

export type {
  FilterDecision,
  HttpProxyOptions,
  OriginAddress,
  OriginRequestFn,
  RelayResult,
} from './types.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ProxyError,
  ConfigError,
  RequestError,
  TransportError,
  ProtocolError,
  isProxyError,
  formatError,
  type ProxyErrorKind,
} from './errors.js';

// =============================================================================
// Shared Utilities
// =============================================================================

export {
  DEFAULT_HTTP_PORT,
  getUriAuthority,
  getPathAndQuery,
  getRequestHost,
  parseAuthority,
  buildAbsoluteTarget,
  blockedMessage,
  sendTextResponse,
  writeRawResponse,
} from './shared.js';
