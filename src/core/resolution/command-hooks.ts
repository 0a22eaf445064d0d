import { execFile } from 'child_process';
import { promisify } from 'util';

import type { PackageHooks, ProjectHookContext, ProjectHooks } from '../install/hooks.js';
import type { CommandHookSet } from './project-manifest.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

export const HOOK_CONTEXT_ENV = 'SANDKIT_HOOK_CONTEXT';

export interface CommandRunOptions {
  cwd: string;
  env: Record<string, string>;
}

/**
 * Runs one shell command; rejects when it exits non-zero
 */
export type CommandRunner = (command: string, options: CommandRunOptions) => Promise<void>;

export const runShellCommand: CommandRunner = async (command, { cwd, env }) => {
  const { stdout } = await execFileAsync('sh', ['-c', command], { cwd, env: { ...process.env, ...env } });
  if (stdout.trim()) {
    logger.info(stdout.trim());
  }
};

async function runHookCommand(
  runner: CommandRunner,
  command: string,
  cwd: string,
  payload: Record<string, unknown>
): Promise<void> {
  logger.debug(`Running hook command: ${command}`, { cwd });
  await runner(command, { cwd, env: { [HOOK_CONTEXT_ENV]: JSON.stringify(payload) } });
}

/**
 * Package hooks backed by shell commands from the project manifest. Commands
 * run in the package root and receive the hook context as JSON in
 * SANDKIT_HOOK_CONTEXT.
 */
export function createPackageCommandHooks(set: CommandHookSet, runner: CommandRunner = runShellCommand): PackageHooks {
  const hooks: PackageHooks = {};
  const { preInstall, postInstall } = set;

  if (preInstall) {
    hooks.preInstall = context =>
      runHookCommand(runner, preInstall, context.package.root, {
        hook: context.hook,
        package: context.package,
        target: { name: context.target.name, platform: context.target.platform }
      });
  }
  if (postInstall) {
    hooks.postInstall = context =>
      runHookCommand(runner, postInstall, context.package.root, {
        hook: context.hook,
        package: context.package,
        target: { name: context.target.name, platform: context.target.platform },
        label: context.label
      });
  }
  return hooks;
}

function projectPayload(context: ProjectHookContext): Record<string, unknown> {
  return {
    hook: context.hook,
    sandboxRoot: context.sandboxRoot,
    targets: context.targets.map(target => target.name),
    packageNames: context.packageNames,
    installedNames: context.installedNames
  };
}

/**
 * Project hooks backed by shell commands; they run in the project directory
 */
export function createProjectCommandHooks(
  set: CommandHookSet,
  projectDir: string,
  runner: CommandRunner = runShellCommand
): ProjectHooks {
  const hooks: ProjectHooks = {};
  const { preInstall, postInstall } = set;

  if (preInstall) {
    hooks.preInstall = context => runHookCommand(runner, preInstall, projectDir, projectPayload(context));
  }
  if (postInstall) {
    hooks.postInstall = context => runHookCommand(runner, postInstall, projectDir, projectPayload(context));
  }
  return hooks;
}
