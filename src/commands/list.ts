/**
 * List command - show the registry (snapshot reused when present)
 */

import { Command } from 'commander';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { output, outputError, outputTable, getOutputOptions } from '../utils/output.js';
import { configFromOptions, createRegistry, recordJson, recordRow, RECORD_HEADERS } from './registry.js';

export function createListCommand(getRootDir: () => string): Command {
  const cmd = new Command('list')
    .alias('ls')
    .description('List registered databases')
    .action(async () => {
      const { json, verbose } = getOutputOptions();
      const logger = createLogger((line) => console.error(line), verbose ? 'debug' : 'warn');

      try {
        const registry = createRegistry(configFromOptions(getRootDir()), logger);
        await registry.build(false);
        const records = registry.list();

        if (json) {
          output(records.map(recordJson));
          return;
        }
        if (records.length === 0) {
          console.log('No databases found.');
          return;
        }
        outputTable(RECORD_HEADERS, records.map(recordRow));
      } catch (error) {
        outputError(`List failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  return cmd;
}
