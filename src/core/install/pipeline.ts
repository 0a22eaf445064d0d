import type { InstallContext, InstallPhase } from './context.js';
import { summarizeInstall, type InstallSummary } from './install-reporting.js';
import { analyzePhase } from './phases/analyze.js';
import { registryPhase } from './phases/registry.js';
import { decidePhase } from './phases/decide.js';
import { cleanupPhase } from './phases/cleanup.js';
import { installPackagesPhase } from './phases/install-packages.js';
import { generateTargetsPhase } from './phases/targets.js';
import { writeRecordPhase } from './phases/record.js';
import { integratePhase } from './phases/integrate.js';
import { SandkitError } from '../../types/index.js';
import { PhaseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * The install pipeline, in order. Each phase relies on everything before it
 * having completed: cleanup finishes before any fetch, every package is
 * installed before targets are generated, and records are written only
 * after the build-file container.
 */
export const INSTALL_PHASES: readonly InstallPhase[] = [
  analyzePhase,
  registryPhase,
  decidePhase,
  cleanupPhase,
  installPackagesPhase,
  generateTargetsPhase,
  writeRecordPhase,
  integratePhase
];

/**
 * Run every phase against `ctx`. Errors escaping a phase carry its name;
 * errors that are not sandkit errors are wrapped in a PhaseError.
 */
export async function runInstallPipeline(
  ctx: InstallContext,
  phases: readonly InstallPhase[] = INSTALL_PHASES
): Promise<InstallSummary> {
  logger.info('Starting install pipeline', { projectDir: ctx.projectDir, updateMode: ctx.updateMode });

  for (const phase of phases) {
    if (phase.shouldRun && !phase.shouldRun(ctx)) {
      logger.debug(`Skipping phase ${phase.name}`);
      continue;
    }

    logger.debug(`Running phase ${phase.name}`);
    try {
      await phase.run(ctx);
    } catch (error) {
      if (error instanceof SandkitError) {
        if (error.details?.phase === undefined) {
          error.details = { ...error.details, phase: phase.name };
        }
        throw error;
      }
      throw new PhaseError(phase.name, error);
    }
  }

  return summarizeInstall(ctx);
}
