import type { InstallPhase } from '../context.js';
import { readRecord } from '../../record/installation-record.js';
import { logger } from '../../../utils/logger.js';

/**
 * Analyze phase: read both installation records and resolve the project.
 *
 * Sets: lockfile, sandboxManifest, resolution. Writes nothing to disk, so a
 * resolution failure leaves the sandbox untouched.
 */
export const analyzePhase: InstallPhase = {
  name: 'analyze',

  async run(ctx) {
    ctx.output.step('Analyzing dependencies');

    ctx.lockfile = await readRecord(ctx.lockfilePath);
    ctx.sandboxManifest = await ctx.sandbox.readManifest();

    ctx.resolution = await ctx.collaborators.resolver.resolve({
      lockfile: ctx.lockfile,
      sandboxManifest: ctx.sandboxManifest,
      updateMode: ctx.updateMode
    });

    const { diff } = ctx.resolution;
    logger.debug('Sandbox state', {
      added: diff.added,
      changed: diff.changed,
      deleted: diff.deleted,
      unchanged: diff.unchanged
    });
  }
};
