/**
 * CONNECT Tunnel
 *
 * Opaque byte tunnel between a client and `host:port`. Nothing inside the
 * tunnel is parsed or decrypted.
 *
 * The client is told the tunnel is ready (200) before the origin connection
 * is attempted. A client whose origin turns out to be unreachable sees the
 * tunnel close right after the 200 instead of an error status. Connecting
 * first and acknowledging afterwards would change the timing clients observe.
 *
 * @module proxy/tunnel
 */

import { connect, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { RequestError, TransportError, formatError } from './errors.js';
import { parseAuthority, writeRawResponse } from './shared.js';
import type { OriginAddress, RelayResult } from './types.js';

/** Sent to the client as soon as a CONNECT is accepted */
export const CONNECT_ESTABLISHED_RESPONSE = 'HTTP/1.1 200 OK\r\n\r\n';

/** Port used when a CONNECT target names none */
const DEFAULT_TUNNEL_PORT = 443;

export interface TunnelOptions {
  /** Destroy both sockets after this many ms without traffic (0 = never) */
  idleTimeoutMs?: number;
  /**
   * Opens the origin connection (default: net.connect). The socket should
   * allow half-open use, or a client still sending after the origin ends loses
   * those bytes.
   */
  connectOrigin?: (address: OriginAddress) => Socket;
}

// =============================================================================
// Byte Relay
// =============================================================================

/**
 * Copy bytes both ways between two duplex streams.
 *
 * When one side ends, the write half of the other side is ended and the
 * opposite direction keeps flowing. A direction also ends when either of its
 * streams closes. Resolves once both directions have ended,
 * rejects with a TransportError on the first error from either side. Both
 * streams are destroyed when the relay settles.
 */
export function relayBidirectional(client: Duplex, origin: Duplex): Promise<RelayResult> {
  return new Promise((resolve, reject) => {
    const result: RelayResult = { clientToOrigin: 0, originToClient: 0 };
    let openDirections = 2;
    let settled = false;

    const teardown = (): void => {
      client.destroy();
      origin.destroy();
    };

    const onError = (side: 'client' | 'origin') => (err: Error) => {
      if (settled) return;
      settled = true;
      teardown();
      reject(new TransportError(`Tunnel ${side} error: ${formatError(err)}`, { cause: err }));
    };

    const copy = (from: Duplex, to: Duplex, count: (bytes: number) => void): void => {
      let done = false;
      const finish = (): void => {
        if (done) return;
        done = true;
        if (!to.destroyed && !to.writableEnded) {
          to.end();
        }
        openDirections -= 1;
        if (openDirections === 0 && !settled) {
          settled = true;
          teardown();
          resolve(result);
        }
      };

      from.on('data', (chunk: Buffer) => count(chunk.length));
      from.on('end', finish);
      from.on('close', finish);
      // Nothing more can be delivered once the destination is gone
      to.on('close', finish);
      from.pipe(to, { end: false });
    };

    client.on('error', onError('client'));
    origin.on('error', onError('origin'));

    copy(client, origin, (bytes) => {
      result.clientToOrigin += bytes;
    });
    copy(origin, client, (bytes) => {
      result.originToClient += bytes;
    });
  });
}

// =============================================================================
// Tunnel Establishment
// =============================================================================

/**
 * Open a TCP connection to the origin. Resolves once connected.
 * The idle timeout is armed before connecting, so a connect attempt that never
 * completes is bounded as well.
 */
function openOrigin(
  authority: string,
  address: OriginAddress,
  options: TunnelOptions
): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = options.connectOrigin
      ? options.connectOrigin(address)
      : connect({ host: address.host, port: address.port, allowHalfOpen: true });

    const idleTimeoutMs = options.idleTimeoutMs ?? 0;
    if (idleTimeoutMs > 0) {
      socket.setTimeout(idleTimeoutMs, () => {
        socket.destroy(
          new TransportError(`Tunnel to ${authority} idle for more than ${idleTimeoutMs}ms`)
        );
      });
    }

    const onError = (err: Error): void => {
      socket.destroy();
      reject(
        err instanceof TransportError
          ? err
          : new TransportError(
              `Failed to connect to ${address.host}:${address.port}: ${formatError(err)}`,
              { cause: err }
            )
      );
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Establish a tunnel for an accepted CONNECT request.
 *
 * @param authority - CONNECT target (`host:port`)
 * @param clientSocket - Raw client socket handed over by the HTTP server
 * @param head - Bytes the client sent after the CONNECT head
 * @returns Relay byte counts once the tunnel has closed
 */
export async function establishTunnel(
  authority: string,
  clientSocket: Duplex,
  head: Buffer,
  options: TunnelOptions = {}
): Promise<RelayResult> {
  // The HTTP server no longer listens for errors on a handed-over socket
  const early: { error?: Error } = {};
  const onEarlyClientError = (err: Error): void => {
    early.error = err;
  };
  clientSocket.on('error', onEarlyClientError);

  if (!authority || authority.startsWith('/')) {
    const err = new RequestError(`CONNECT request missing authority in target "${authority}"`);
    writeRawResponse(clientSocket, 400, err.message);
    throw err;
  }

  // Hold client bytes until the origin is connected
  clientSocket.pause();
  clientSocket.write(CONNECT_ESTABLISHED_RESPONSE);

  const address = parseAuthority(authority, DEFAULT_TUNNEL_PORT);
  let originSocket: Socket;
  try {
    originSocket = await openOrigin(authority, address, options);
  } catch (err) {
    clientSocket.removeListener('error', onEarlyClientError);
    clientSocket.destroy();
    throw err;
  }
  clientSocket.removeListener('error', onEarlyClientError);

  if (early.error || clientSocket.destroyed) {
    originSocket.destroy();
    clientSocket.destroy();
    throw new TransportError(`Client closed before tunnel to ${authority} was ready`, {
      cause: early.error,
    });
  }

  if (head.length > 0) {
    originSocket.write(head);
  }

  const result = await relayBidirectional(clientSocket, originSocket);
  return {
    clientToOrigin: result.clientToOrigin + head.length,
    originToClient: result.originToClient,
  };
}
