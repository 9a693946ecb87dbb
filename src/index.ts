#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import * as path from 'path';
import fs from 'fs/promises';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupGetCommand } from './commands/get.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupDepsCommand } from './commands/deps.js';
import { setupInfoCommand } from './commands/info.js';

/**
 * deplock CLI - Main entry point
 *
 * Resolves a project's dependencies against a registry and locks them.
 */

// Create the main program
const program = new Command();

program
  .name('deplock')
  .description('deplock - resolve and lock project dependencies')
  .version(getVersion())
  .option('--cwd <dir>', 'set project directory')
  .configureHelp({ sortSubcommands: true });

// === DEPENDENCY COMMANDS ===
setupGetCommand(program);
setupUpdateCommand(program);
setupDepsCommand(program);

// === REGISTRY COMMANDS ===
setupInfoCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string }>();

  // Only validate --cwd if provided (no directory changes)
  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.info(`Project directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Project directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with DEPLOCK_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with DEPLOCK_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // No arguments: show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('deplock')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
