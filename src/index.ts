#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { ensurePkgdeckDirectories } from './core/directory.js';
import { getVersion } from './utils/package.js';

import { setupInfoCommand } from './commands/info.js';
import { setupInstallCommand } from './commands/install.js';
import { setupRefreshCommand } from './commands/refresh.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupCancelCommand } from './commands/cancel.js';
import { setupListCommand } from './commands/list.js';
import { setupWatchCommand } from './commands/watch.js';
import { setupConfigCommand } from './commands/config.js';

/**
 * pkgdeck CLI - Main entry point
 *
 * Drives install, refresh and removal of packages through the package daemon.
 */

const program = new Command();

program
  .name('pkgdeck')
  .description('pkgdeck - a client for the package daemon')
  .version(getVersion())
  .option('--socket <path>', 'daemon socket path (overrides PKGDECK_SOCKET and config)')
  .option('--verbose', 'enable debug logging')
  .configureHelp({ sortSubcommands: true });

// === PACKAGE COMMANDS ===
setupInfoCommand(program);
setupInstallCommand(program);
setupRefreshCommand(program);
setupRemoveCommand(program);
setupCancelCommand(program);
setupListCommand(program);
setupWatchCommand(program);

// === CONFIGURATION ===
setupConfigCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ verbose?: boolean }>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  try {
    await ensurePkgdeckDirectories();
  } catch (error) {
    logger.error('Failed to initialize pkgdeck directories', { error });
    console.error('❌ Failed to initialize pkgdeck directories. Please check permissions.');
    process.exit(1);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
