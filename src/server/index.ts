/**
 * Web UI server
 */

import { createServer, type Server } from 'node:http';
import type { Config } from '../config/schema.js';
import { createApp } from './app.js';
import type { HandlerDeps } from './handlers.js';

export * from './app.js';
export * from './browser.js';
export * from './handlers.js';

export interface RunningServer {
  server: Server;
  url: string;
  close: () => Promise<void>;
}

/**
 * Start listening on the configured host and port (0 picks a free port)
 */
export function startServer(config: Config, deps: HandlerDeps): Promise<RunningServer> {
  const app = createApp(deps);
  const server = createServer(app);
  const { host, port } = config.server;

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;

      resolve({
        server,
        url: `http://${host}:${boundPort}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
