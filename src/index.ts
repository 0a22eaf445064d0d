#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { ensureSandkitDirectories } from './core/directory.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupInstallCommand, setupUpdateCommand } from './commands/install.js';

/**
 * sandkit CLI - Main entry point
 *
 * Installs the third-party packages of a native project into a sandbox and
 * generates one static-library target per project target.
 */

const program = new Command();

program
  .name('sandkit')
  .description('sandkit - incremental package installer for native projects')
  .version(getVersion())
  .configureHelp({
    sortSubcommands: true
  })
  .addHelpText(
    'after',
    '\nExamples:\n' +
      '  sandkit install                 install at the versions in sandkit.lock\n' +
      '  sandkit update                  refresh head and external packages\n' +
      '  sandkit install --no-clean      keep all fetched files\n'
  );

setupInstallCommand(program);
setupUpdateCommand(program);

program.hook('preAction', (_thisCommand, actionCommand) => {
  if (process.env.SANDKIT_VERBOSE === '1' || process.env.SANDKIT_VERBOSE === 'true') {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Running '${actionCommand.name()}' in ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

async function initializeSandkit(): Promise<void> {
  try {
    await ensureSandkitDirectories();
    logger.debug('sandkit directories initialized successfully');
  } catch (error) {
    logger.error('Failed to initialize sandkit directories', { error });
    console.error('❌ Failed to initialize ~/.sandkit. Please check permissions.');
    process.exit(1);
  }
}

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    await initializeSandkit();

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

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('sandkit')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
