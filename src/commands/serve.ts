/**
 * Serve command - build the registry once, then serve it over HTTP
 */

import { Command } from 'commander';
import { errorMessage } from '../errors.js';
import { DEFAULT_CONFIG } from '../config.js';
import { ConnectionCache } from '../db/connection-cache.js';
import { startServer } from '../server/server.js';
import { createLogger } from '../utils/logger.js';
import { outputError, getOutputOptions } from '../utils/output.js';
import { configFromOptions, createRegistry } from './registry.js';

interface ServeOptions {
  port: string;
  host: string;
  rowLimit: string;
  rebuild?: boolean;
}

export function createServeCommand(getRootDir: () => string): Command {
  const cmd = new Command('serve')
    .description('Serve the databases at content-hashed URLs')
    .option('-p, --port <port>', 'Server port', String(DEFAULT_CONFIG.port))
    .option('--host <host>', 'Server host', DEFAULT_CONFIG.host)
    .option('--row-limit <n>', 'Rows shown per table page', String(DEFAULT_CONFIG.rowLimit))
    .option('--rebuild', 'Rescan and rehash instead of reusing the snapshot')
    .action(async (options: ServeOptions) => {
      const { verbose } = getOutputOptions();
      const logger = createLogger(console.log, verbose ? 'debug' : 'info');

      try {
        const config = configFromOptions(getRootDir(), {
          port: Number(options.port),
          host: options.host,
          rowLimit: Number(options.rowLimit),
        });

        const registry = createRegistry(config, logger);
        await registry.build(options.rebuild === true);

        const connections = new ConnectionCache(registry, { logger });
        await startServer({ config, registry, connections, logger });
      } catch (error) {
        outputError(`Failed to start server: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  return cmd;
}
