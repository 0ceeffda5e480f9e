/**
 * In-process HTTP server for poller tests.
 *
 * Routes map a path to a canned response, or to a function producing one per
 * request. An `unresponsive` route never answers, so the caller times out.
 */

import http from 'node:http';

export interface MockResponse {
  status?: number;
  contentType?: string;
  body: string;
  /** Hold the response back this long. */
  delayMs?: number;
}

export type MockRoute = MockResponse | { unresponsive: true };

export type MockRouteHandler = () => MockRoute;

export interface MockJsonServer {
  baseUrl: string;
  /** `METHOD path` of every request received, in order. */
  requests: string[];
  url(path: string): string;
  setRoute(path: string, route: MockRoute | MockRouteHandler): void;
  close(): Promise<void>;
}

export function jsonResponse(value: unknown, status = 200): MockResponse {
  return { status, contentType: 'application/json', body: JSON.stringify(value) };
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('mock server did not bind to a TCP port'));
        return;
      }
      resolve(address.port);
    });
  });
}

function shutdown(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export async function startMockJsonServer(
  routes: Record<string, MockRoute | MockRouteHandler> = {},
): Promise<MockJsonServer> {
  const table = new Map(Object.entries(routes));
  const requests: string[] = [];

  const server = http.createServer((req, res) => {
    const path = req.url || '/';
    requests.push(`${req.method} ${path}`);

    const entry = table.get(path);
    if (!entry) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }

    const route = typeof entry === 'function' ? entry() : entry;
    if ('unresponsive' in route) {
      return;
    }

    const respond = (): void => {
      res.writeHead(route.status ?? 200, { 'Content-Type': route.contentType ?? 'application/json' });
      res.end(route.body);
    };

    if (route.delayMs) {
      setTimeout(respond, route.delayMs);
    } else {
      respond();
    }
  });

  const port = await listen(server);
  const baseUrl = `http://127.0.0.1:${port}`;

  return {
    baseUrl,
    requests,
    url: (path) => `${baseUrl}${path}`,
    setRoute: (path, route) => {
      table.set(path, route);
    },
    close: () => shutdown(server),
  };
}

/**
 * Finds a free port by briefly listening on port 0.
 */
export async function getFreePort(): Promise<number> {
  const server = http.createServer();
  const port = await listen(server);
  await shutdown(server);
  return port;
}
