#!/usr/bin/env node
/**
 * sqlpin CLI
 * Serve a directory of SQLite files at content-hashed URLs
 *
 *   sqlpin serve   # Build once (snapshot reused) and serve (default)
 *   sqlpin build   # Force a full rescan, write the snapshot and exit
 *   sqlpin list    # Show registered databases
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveRootDir } from './config.js';
import { setOutputOptions } from './utils/output.js';
import { createBuildCommand, createListCommand, createServeCommand } from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');

const program = new Command();

// Global state for the root directory
let globalRoot: string | undefined;

function getRootDir(): string {
  return resolveRootDir({ root: globalRoot });
}

program
  .name('sqlpin')
  .description('Serve SQLite databases read-only at content-hashed, cacheable URLs')
  .version(packageJson.version)
  .option('-r, --root <dir>', 'Directory holding the database files (default: $SQLPIN_ROOT or cwd)')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ root?: string; json?: boolean; verbose?: boolean }>();
    globalRoot = opts.root;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  });

program.addCommand(createServeCommand(getRootDir), { isDefault: true });
program.addCommand(createBuildCommand(getRootDir));
program.addCommand(createListCommand(getRootDir));

// Parse and run
await program.parseAsync();
