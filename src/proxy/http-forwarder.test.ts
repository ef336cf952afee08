/**
 * HTTP Forwarder Integration Tests
 *
 * Runs forwardHttpRequest behind a real HTTP server against a real local
 * origin. Nothing leaves 127.0.0.1.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import {
  createServer,
  request as httpRequest,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type RequestOptions,
  type Server,
  type ServerResponse,
} from 'node:http';
import { forwardHttpRequest, type ForwardOptions } from './http-forwarder.js';
import { RequestError, TransportError } from './errors.js';
import type { OriginRequestFn } from './types.js';

interface SeenRequest {
  method: string | undefined;
  url: string | undefined;
  headers: IncomingHttpHeaders;
  rawHeaders: string[];
  body: string;
}

let originServer: Server;
let originPort: number;
let seen: SeenRequest[] = [];

function handleOrigin(req: IncomingMessage, res: ServerResponse): void {
  const chunks: Buffer[] = [];
  req.on('data', (chunk: Buffer) => chunks.push(chunk));
  req.on('end', () => {
    const body = Buffer.concat(chunks).toString('utf-8');
    seen.push({
      method: req.method,
      url: req.url,
      headers: req.headers,
      rawHeaders: req.rawHeaders,
      body,
    });

    const path = new URL(req.url ?? '/', 'http://placeholder').pathname;
    if (path === '/path') {
      res.writeHead(201, 'Made It', { 'Content-Type': 'text/plain', 'X-Origin': 'yes' });
      res.end('origin says hi');
    } else if (path === '/echo') {
      res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
      res.end(body);
    } else if (path === '/raw') {
      res.writeHead(200, [
        'Content-Type', 'text/plain',
        'X-Dup', '1',
        'X-Dup', '2',
        'Content-Length', '3',
      ]);
      res.end('raw');
    } else if (path === '/hang') {
      // never answers
    } else {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
    }
  });
}

async function listen(server: Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  return typeof addr === 'object' && addr ? addr.port : 0;
}

async function close(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** Name/value pairs of a rawHeaders list, for the given header name */
function rawPairs(rawHeaders: string[], name: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    if (rawHeaders[i].toLowerCase() === name.toLowerCase()) {
      pairs.push([rawHeaders[i], rawHeaders[i + 1]]);
    }
  }
  return pairs;
}

/** Front server that runs forwardHttpRequest for every request */
async function startFront(
  options: ForwardOptions = {}
): Promise<{ server: Server; port: number; errors: unknown[] }> {
  const errors: unknown[] = [];
  const server = createServer((req, res) => {
    forwardHttpRequest(req, res, options).catch((err: unknown) => errors.push(err));
  });
  const port = await listen(server);
  return { server, port, errors };
}

function sendThroughProxy(
  proxyPort: number,
  target: string,
  init: { method?: string; headers?: Record<string, string>; body?: string } = {}
): Promise<{ statusCode: number; statusMessage: string; headers: IncomingHttpHeaders; body: string }> {
  return new Promise((resolve, reject) => {
    const req = httpRequest(
      {
        host: '127.0.0.1',
        port: proxyPort,
        path: target,
        method: init.method ?? 'GET',
        // Proxy clients name the origin in Host, not the proxy
        headers: target.startsWith('http://') ? { Host: new URL(target).host, ...init.headers } : init.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({
            statusCode: res.statusCode ?? 0,
            statusMessage: res.statusMessage ?? '',
            headers: res.headers,
            body: Buffer.concat(chunks).toString('utf-8'),
          })
        );
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    req.end(init.body);
  });
}

describe('forwardHttpRequest', () => {
  beforeAll(async () => {
    originServer = createServer(handleOrigin);
    originPort = await listen(originServer);
  });

  afterAll(async () => {
    await close(originServer);
  });

  beforeEach(() => {
    seen = [];
  });

  it('should send an absolute-form target to the origin and relay the response', async () => {
    const front = await startFront();
    try {
      const target = `http://127.0.0.1:${originPort}/path?q=1`;
      const res = await sendThroughProxy(front.port, target);

      expect(seen).toHaveLength(1);
      expect(seen[0].url).toBe(target);
      expect(seen[0].method).toBe('GET');

      expect(res.statusCode).toBe(201);
      expect(res.statusMessage).toBe('Made It');
      expect(res.headers['x-origin']).toBe('yes');
      expect(res.headers['content-type']).toBe('text/plain');
      expect(res.body).toBe('origin says hi');
      expect(front.errors).toEqual([]);
    } finally {
      await close(front.server);
    }
  });

  it('should add a / path when the target has none', async () => {
    const front = await startFront();
    try {
      const res = await sendThroughProxy(front.port, `http://127.0.0.1:${originPort}`);
      expect(seen[0].url).toBe(`http://127.0.0.1:${originPort}/`);
      expect(res.statusCode).toBe(404);
    } finally {
      await close(front.server);
    }
  });

  it('should pass the method, headers and body through', async () => {
    const front = await startFront();
    try {
      const res = await sendThroughProxy(front.port, `http://127.0.0.1:${originPort}/echo`, {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain', 'X-Custom': 'abc' },
        body: 'payload-123',
      });

      expect(seen[0].method).toBe('POST');
      expect(seen[0].headers['x-custom']).toBe('abc');
      expect(seen[0].headers.host).toBe(`127.0.0.1:${originPort}`);
      expect(seen[0].body).toBe('payload-123');
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('payload-123');
    } finally {
      await close(front.server);
    }
  });

  it('should keep header casing, order and repeated fields in both directions', async () => {
    const front = await startFront();
    try {
      const target = `http://127.0.0.1:${originPort}/raw`;
      const response = await new Promise<{ rawHeaders: string[]; body: string }>((resolve, reject) => {
        const req = httpRequest(
          {
            host: '127.0.0.1',
            port: front.port,
            path: target,
            method: 'GET',
            headers: [
              'Host', `127.0.0.1:${originPort}`,
              'X-Custom-Header', 'a',
              'X-Dup', '1',
              'X-Dup', '2',
            ],
            agent: false,
          },
          (res) => {
            const chunks: Buffer[] = [];
            res.on('data', (chunk: Buffer) => chunks.push(chunk));
            res.on('end', () =>
              resolve({ rawHeaders: res.rawHeaders, body: Buffer.concat(chunks).toString('utf-8') })
            );
            res.on('error', reject);
          }
        );
        req.on('error', reject);
        req.end();
      });

      expect(seen).toHaveLength(1);
      expect(seen[0].rawHeaders.slice(0, 8)).toEqual([
        'Host', `127.0.0.1:${originPort}`,
        'X-Custom-Header', 'a',
        'X-Dup', '1',
        'X-Dup', '2',
      ]);

      expect(response.body).toBe('raw');
      expect(rawPairs(response.rawHeaders, 'x-dup')).toEqual([
        ['X-Dup', '1'],
        ['X-Dup', '2'],
      ]);
      expect(rawPairs(response.rawHeaders, 'content-type')).toEqual([['Content-Type', 'text/plain']]);
      expect(front.errors).toEqual([]);
    } finally {
      await close(front.server);
    }
  });

  it('should answer 400 with a RequestError when the target has no authority', async () => {
    const front = await startFront();
    try {
      const res = await sendThroughProxy(front.port, '/plain', {
        headers: { Host: `127.0.0.1:${originPort}` },
      });

      expect(res.statusCode).toBe(400);
      expect(res.body).toBe('Missing authority in request target "/plain"');
      expect(seen).toHaveLength(0);
      expect(front.errors).toHaveLength(1);
      expect(front.errors[0]).toBeInstanceOf(RequestError);
    } finally {
      await close(front.server);
    }
  });

  it('should answer 502 with a TransportError when the origin is unreachable', async () => {
    const unused = createServer();
    const deadPort = await listen(unused);
    await close(unused);

    const front = await startFront();
    try {
      const res = await sendThroughProxy(front.port, `http://127.0.0.1:${deadPort}/`);

      expect(res.statusCode).toBe(502);
      expect(res.body).toBe('Bad Gateway');
      expect(front.errors).toHaveLength(1);
      expect(front.errors[0]).toBeInstanceOf(TransportError);
      expect(front.errors[0]).toHaveProperty(
        'message',
        expect.stringMatching(/^HTTP request error: connect ECONNREFUSED/)
      );
    } finally {
      await close(front.server);
    }
  });

  it('should dispatch through the injected client', async () => {
    const calls: RequestOptions[] = [];
    const originRequest: OriginRequestFn = (options, callback) => {
      calls.push(options);
      return httpRequest(options, callback);
    };

    const front = await startFront({ originRequest });
    try {
      const target = `http://127.0.0.1:${originPort}/path?q=1`;
      const res = await sendThroughProxy(front.port, target);

      expect(calls).toHaveLength(1);
      expect(calls[0].host).toBe('127.0.0.1');
      expect(calls[0].port).toBe(originPort);
      expect(calls[0].path).toBe(target);
      expect(calls[0].method).toBe('GET');
      expect(res.body).toBe('origin says hi');
    } finally {
      await close(front.server);
    }
  });

  it('should give up on an idle origin when a timeout is set', async () => {
    const front = await startFront({ idleTimeoutMs: 50 });
    try {
      const res = await sendThroughProxy(front.port, `http://127.0.0.1:${originPort}/hang`);

      expect(res.statusCode).toBe(502);
      expect(front.errors).toHaveLength(1);
      expect(front.errors[0]).toBeInstanceOf(TransportError);
      expect(front.errors[0]).toHaveProperty(
        'message',
        `Origin 127.0.0.1:${originPort} idle for more than 50ms`
      );
    } finally {
      await close(front.server);
    }
  });
});
