/**
 * Proxy Errors
 *
 * Every failure the proxy reports carries a `kind` so handlers can decide
 * between a client-visible response, a closed connection, or a fatal startup
 * error without string matching.
 *
 * @module proxy/errors
 */

export type ProxyErrorKind = 'config' | 'request' | 'transport' | 'protocol';

export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Filter configuration missing or malformed. Fatal at startup. */
export class ConfigError extends ProxyError {
  readonly kind = 'config';
}

/** The request has no usable target authority. Fails that request only. */
export class RequestError extends ProxyError {
  readonly kind = 'request';
}

/** Connecting to or talking with the origin failed. */
export class TransportError extends ProxyError {
  readonly kind = 'transport';
}

/** Malformed client HTTP framing. Terminates that connection. */
export class ProtocolError extends ProxyError {
  readonly kind = 'protocol';
}

export function isProxyError(err: unknown): err is ProxyError {
  return err instanceof ProxyError;
}

/**
 * Render any thrown value for a log line.
 * AggregateError (e.g. both IPv4 and IPv6 connects failing) lists its members.
 */
export function formatError(err: unknown): string {
  if (err instanceof AggregateError) {
    const errorMessages = err.errors
      .map((e: unknown) => (e instanceof Error ? e.message || e.name : String(e)))
      .join('; ');
    return `${err.message}: [${errorMessages}]`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
