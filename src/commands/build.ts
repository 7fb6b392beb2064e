/**
 * Build command - force a full registry regeneration and exit
 */

import { Command } from 'commander';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { output, outputError, outputTable, getOutputOptions } from '../utils/output.js';
import { configFromOptions, createRegistry, recordJson, recordRow, RECORD_HEADERS } from './registry.js';

export function createBuildCommand(getRootDir: () => string): Command {
  const cmd = new Command('build')
    .description('Rescan the root directory, hash every database and write the snapshot')
    .action(async () => {
      const { json, verbose } = getOutputOptions();
      const logger = createLogger((line) => console.error(line), verbose ? 'debug' : 'warn');

      try {
        const config = configFromOptions(getRootDir());
        const registry = createRegistry(config, logger);
        await registry.build(true);
        const records = registry.list();

        if (json) {
          output({ snapshot: registry.snapshotPath, databases: records.map(recordJson) });
          return;
        }

        if (records.length > 0) {
          outputTable(RECORD_HEADERS, records.map(recordRow));
          console.log('');
        }
        console.log(`✓ Indexed ${records.length} database(s), wrote ${registry.snapshotPath}`);
      } catch (error) {
        outputError(`Build failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  return cmd;
}
