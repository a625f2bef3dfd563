#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import * as path from 'path';
import fs from 'fs/promises';
import { constants, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { ensureDepweaveDirectories } from './core/directory.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupResolveCommand } from './commands/resolve.js';
import { setupConfigsCommand } from './commands/configs.js';

/**
 * depweave CLI - Main entry point
 *
 * Resolves a module's declared dependencies, fetches their artifacts and
 * reports where each one lives.
 */

// Create the main program
const program = new Command();

program
  .name('depweave')
  .description('depweave - dependency resolution for multi-configuration builds')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'log resolution details')
  .configureHelp({
    sortSubcommands: true
  });

setupResolveCommand(program);
setupConfigsCommand(program);

program.hook('preAction', async () => {
  const opts: { cwd?: string; verbose?: boolean } = program.opts();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  // Only validate --cwd if provided (no directory changes)
  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK);
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist and be readable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Initialize depweave directories on startup
 */
async function initializeDepweave(): Promise<void> {
  try {
    await ensureDepweaveDirectories();
    logger.debug('depweave directories initialized successfully');
  } catch (error) {
    logger.error('Failed to initialize depweave directories', { error });
    console.error('❌ Failed to initialize depweave directories. Please check permissions.');
    process.exit(1);
  }
}

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    await initializeDepweave();

    // If no arguments provided, show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

/**
 * True when this file is the process entry point, also through the bin link
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
