import type { SandboxStateDiff } from '../../../types/index.js';
import type { InstallPhase } from '../context.js';
import type { LocalPackage } from '../../sandbox/local-package.js';
import { requireResolution } from '../context.js';

/**
 * Names of the packages to (re)install: the union of
 *   - in update mode, head and external packages (never locally sourced ones)
 *   - added and changed packages
 *   - packages whose root is missing on disk
 */
export async function decideInstallSet(
  diff: SandboxStateDiff,
  allLocalPackages: readonly LocalPackage[],
  updateMode: boolean,
  externalSourceNames: ReadonlySet<string>
): Promise<Set<string>> {
  const names = new Set<string>();

  if (updateMode) {
    for (const pkg of allLocalPackages) {
      if (!pkg.locallySourced && (pkg.spec.head || externalSourceNames.has(pkg.name))) {
        names.add(pkg.name);
      }
    }
  }

  for (const name of diff.added) names.add(name);
  for (const name of diff.changed) names.add(name);

  for (const pkg of allLocalPackages) {
    if (!(await pkg.exists())) {
      names.add(pkg.name);
    }
  }

  return names;
}

/**
 * Decision phase. Sets: namesToInstall.
 */
export const decidePhase: InstallPhase = {
  name: 'decide',

  async run(ctx) {
    const resolution = requireResolution(ctx);
    ctx.namesToInstall = await decideInstallSet(
      resolution.diff,
      ctx.localPackages,
      ctx.updateMode,
      resolution.externalSourceNames
    );
  }
};
