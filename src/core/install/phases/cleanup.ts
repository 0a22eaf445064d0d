import pico from 'picocolors';

import type { InstallContext, InstallPhase } from '../context.js';
import { requireResolution } from '../context.js';
import { CleanupError } from '../../../utils/errors.js';
import { remove } from '../../../utils/fs.js';
import { logger } from '../../../utils/logger.js';

/**
 * Remove the roots of deleted packages. Each removal is independent: a
 * failure is reported and the loop moves on.
 *
 * @returns names actually removed
 */
export async function cleanRemovedPackages(ctx: InstallContext, deleted: Iterable<string>): Promise<string[]> {
  const removed: string[] = [];

  for (const name of [...deleted].sort()) {
    // Locally sourced packages live outside the sandbox
    if (ctx.sandboxManifest?.externalSources[name]?.type === 'path') {
      continue;
    }

    ctx.output.message(`${pico.red('-> ')}Removing ${name}`);
    let path = ctx.sandbox.root;
    try {
      path = ctx.sandbox.packageRoot(name);
      await remove(path);
      removed.push(name);
    } catch (error) {
      const failure = new CleanupError(name, path, error);
      logger.warn(failure.message, { error });
      ctx.output.warn(failure.message);
      ctx.warnings.push(failure.message);
    }
  }

  return removed;
}

/**
 * Cleanup phase: global cleanup of regenerated directories, then removal of
 * deleted packages. Sets: removedNames.
 */
export const cleanupPhase: InstallPhase = {
  name: 'cleanup',

  async run(ctx) {
    const { diff } = requireResolution(ctx);

    await ctx.sandbox.prepareForInstall();

    if (diff.deleted.size > 0) {
      ctx.output.step('Removing deleted dependencies');
      ctx.removedNames = await cleanRemovedPackages(ctx, diff.deleted);
    }
  }
};
