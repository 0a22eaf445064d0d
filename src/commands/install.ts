import { Command } from 'commander';
import { join, resolve } from 'path';

import type { CommandResult, InstallOptions } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';
import { configManager, resolveInstallerConfig } from '../core/config.js';
import { GitFetcher } from '../core/fetch/git-fetcher.js';
import { createInstallContext } from '../core/install/context.js';
import { displayInstallSummary, type InstallSummary } from '../core/install/install-reporting.js';
import { runInstallPipeline } from '../core/install/pipeline.js';
import { ManifestIntegrator } from '../core/integration/host-integrator.js';
import { PinnedResolver } from '../core/resolution/pinned-resolver.js';
import { LogLevel } from '../types/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Run one install (or update) of the project in `options.projectDir`
 */
export async function installCommand(options: InstallOptions, updateMode: boolean): Promise<CommandResult<InstallSummary>> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const projectDir = resolve(process.cwd(), options.projectDir ?? '.');
  const manifestPath = join(projectDir, FILE_PATTERNS.PROJECT_MANIFEST);
  if (!(await exists(manifestPath))) {
    throw new ValidationError(`No ${FILE_PATTERNS.PROJECT_MANIFEST} found in ${projectDir}`);
  }

  const fileConfig = await configManager.load();
  const config = resolveInstallerConfig(fileConfig, {
    // commander sets negatable flags to true unless --no-<flag> is given
    ...(options.clean === false ? { clean: false } : {}),
    ...(options.integrate === false ? { integrateTargets: false } : {}),
    ...(options.docs ? { generateDocs: true } : {}),
    ...(options.keepGoing ? { keepGoing: true } : {})
  });
  logger.debug('Installer configuration', { config });

  const output = createCliOutput();
  const ctx = createInstallContext({
    projectDir,
    updateMode,
    config,
    output,
    collaborators: {
      resolver: new PinnedResolver(manifestPath, projectDir),
      fetcher: new GitFetcher(),
      integrator: new ManifestIntegrator()
    }
  });

  const summary = await runInstallPipeline(ctx);
  displayInstallSummary(summary, output);

  return { success: true, data: summary, ...(summary.warnings.length > 0 ? { warnings: summary.warnings } : {}) };
}

function addInstallOptions(command: Command): Command {
  return command
    .option('--project-dir <dir>', 'directory containing sandkit.yml', '.')
    .option('--no-clean', 'keep every fetched file instead of only the ones the package layout names')
    .option('--docs', 'generate documentation for installed packages')
    .option('--no-integrate', 'skip writing the integration manifest')
    .option('--keep-going', 'fetch every package before failing, reporting all fetch errors together')
    .option('--verbose', 'enable debug logging');
}

export function setupInstallCommand(program: Command): void {
  addInstallOptions(
    program
      .command('install')
      .alias('i')
      .description('Install the packages of sandkit.yml at the versions recorded in sandkit.lock')
  ).action(
    withErrorHandling(async (options: InstallOptions) => {
      await installCommand(options, false);
    })
  );
}

export function setupUpdateCommand(program: Command): void {
  addInstallOptions(
    program
      .command('update')
      .description('Install the packages of sandkit.yml, refreshing head and external packages')
  ).action(
    withErrorHandling(async (options: InstallOptions) => {
      await installCommand(options, true);
    })
  );
}
