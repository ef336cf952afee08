/**
 * Portcullis - Filtering Forward Proxy
 *
 * An HTTP proxy that forwards plain HTTP, tunnels CONNECT traffic without
 * decrypting it, and refuses hosts according to an allow-list or deny-list.
 */

import type { Server } from 'node:http';
import type { AddressInfo, Socket } from 'node:net';
import { getConfig, updateConfig, resolveFilter, type ProxyConfig } from './config/index.js';
import type { DomainFilter } from './filters/index.js';
import { createHttpProxy } from './proxy/index.js';
import type { OriginRequestFn } from './proxy/index.js';

export interface ProxyServerOptions {
  /** Outbound HTTP client for forwarded requests (default: http.request) */
  originRequest?: OriginRequestFn;
}

export interface ProxyServer {
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
  getConfig(): ProxyConfig;
  getFilter(): DomainFilter | null;
}

function printStatus(config: ProxyConfig, filter: DomainFilter, address: AddressInfo): void {
  const source = config.filterConfigPath ?? 'command line';
  console.log(`
🎯 Proxy Status:
   HTTP:    ${address.address}:${address.port}
   Filter:  ${filter.describe()} (${source})
   Timeout: ${config.idleTimeoutMs > 0 ? `${config.idleTimeoutMs}ms idle` : 'none'}
`);
}

export function createProxyServer(
  configOverrides?: Partial<ProxyConfig>,
  options: ProxyServerOptions = {}
): ProxyServer {
  let httpServer: Server | null = null;
  let filter: DomainFilter | null = null;
  const sockets = new Set<Socket>();

  if (configOverrides) {
    updateConfig(configOverrides);
  }

  return {
    async start(): Promise<AddressInfo> {
      if (httpServer) {
        throw new Error('Proxy already started');
      }

      const config = getConfig();

      // Built once, shared read-only by every connection
      console.log('🔎 Loading filter rules...');
      const activeFilter = await resolveFilter(config);

      console.log('🌐 Starting HTTP proxy...');
      const server = createHttpProxy({
        port: config.httpProxyPort,
        bindAddress: config.bindAddress,
        filter: activeFilter,
        originRequest: options.originRequest,
        idleTimeoutMs: config.idleTimeoutMs,
      });

      server.on('connection', (socket: Socket) => {
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
      });

      const address = await new Promise<AddressInfo>((resolve, reject) => {
        const onError = (err: Error): void => {
          server.close();
          reject(err);
        };
        server.once('error', onError);
        server.once('listening', () => {
          server.removeListener('error', onError);
          const addr = server.address();
          if (!addr || typeof addr === 'string') {
            reject(new Error('HTTP proxy did not bind to a TCP address'));
            return;
          }
          resolve(addr);
        });
      });

      httpServer = server;
      filter = activeFilter;

      console.log('✅ Portcullis is ready!');
      printStatus(config, activeFilter, address);
      return address;
    },

    async stop(): Promise<void> {
      const server = httpServer;
      if (!server) {
        return;
      }

      console.log('🛑 Stopping Portcullis...');
      httpServer = null;

      const closed = new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      // Tunnels are detached from the HTTP server, so close them directly
      for (const socket of sockets) {
        socket.destroy();
      }
      sockets.clear();
      await closed;

      console.log('👋 Portcullis stopped');
    },

    getConfig,

    getFilter(): DomainFilter | null {
      return filter;
    },
  };
}

export { getConfig, updateConfig, resetConfig, resolveFilter, type ProxyConfig } from './config/index.js';
export { DomainFilter, extractDomain, type FilterMode, type FilterRules } from './filters/index.js';
export * from './proxy/index.js';
