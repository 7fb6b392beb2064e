/**
 * HTTP server lifecycle
 */

import { serve } from '@hono/node-server';
import type { AddressInfo, Server } from 'net';
import { errorMessage } from '../errors.js';
import type { ConnectionCache } from '../db/connection-cache.js';
import type { MetadataRegistry } from '../registry/registry.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { ServerConfig } from '../config.js';
import { createApp } from './app.js';

export interface StartServerOptions {
  config: ServerConfig;
  registry: MetadataRegistry;
  connections: ConnectionCache;
  logger?: Logger;
}

export interface RunningServer {
  /** Listening address, e.g. http://0.0.0.0:8006 */
  address: string;
  /** Close the HTTP server and every cached connection */
  stop(): Promise<void>;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Start listening. SIGINT/SIGTERM stop the server and exit the process.
 */
export function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { config, registry, connections } = options;
  const log = options.logger ?? createLogger();
  const app = createApp({ registry, connections, logger: log, rowLimit: config.rowLimit });

  return new Promise((resolve, reject) => {
    const signalHandlers = new Map<NodeJS.Signals, () => void>();
    let stopping: Promise<void> | null = null;

    const stop = (): Promise<void> => {
      if (!stopping) {
        for (const [signal, handler] of signalHandlers) {
          process.removeListener(signal, handler);
        }
        signalHandlers.clear();
        stopping = closeServer(server).finally(() => {
          connections.close();
          log.info({ event: 'server_stopped' });
        });
      }
      return stopping;
    };

    const shutdown = (signal: NodeJS.Signals) => {
      log.info({ event: 'server_shutdown', signal });
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error({ event: 'server_shutdown_error', error: errorMessage(error) });
          process.exit(1);
        }
      );
    };

    const server: Server = serve(
      {
        fetch: app.fetch,
        port: config.port,
        hostname: config.host,
      },
      (info: AddressInfo) => {
        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
          const handler = () => shutdown(signal);
          signalHandlers.set(signal, handler);
          process.on(signal, handler);
        }

        const address = `http://${info.address}:${info.port}`;
        log.info({ event: 'server_started', address, root: config.rootDir });
        resolve({ address, stop });
      }
    );

    // Handle server errors (e.g., EADDRINUSE)
    server.on('error', (err: Error) => {
      if ('code' in err && err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${config.port} is already in use`));
      } else {
        reject(err);
      }
    });
  });
}
