import type { ResolvedPackage } from '../../../types/index.js';
import type { InstallPhase } from '../context.js';
import type { LocalPackage } from '../../sandbox/local-package.js';
import type { Sandbox } from '../../sandbox/sandbox.js';
import { requireResolution } from '../context.js';

export interface LocalRegistry {
  byTarget: Map<string, LocalPackage[]>;
  /** Every local package once, sorted by case-insensitive name */
  all: LocalPackage[];
}

export function compareByName(a: LocalPackage, b: LocalPackage): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Map every resolved package to its local package. Packages unsupported on
 * a target's platform are dropped from that target.
 */
export function buildRegistry(
  sandbox: Sandbox,
  packagesByTarget: ReadonlyMap<string, readonly ResolvedPackage[]>,
  externalSourceNames: ReadonlySet<string>
): LocalRegistry {
  const byTarget = new Map<string, LocalPackage[]>();

  for (const [targetName, specs] of packagesByTarget) {
    const locals: LocalPackage[] = [];
    for (const spec of specs) {
      const local = spec.locallySourced
        ? sandbox.locallySourcedPackageFor(spec, spec.platform)
        : sandbox.localPackageFor(spec, spec.platform, externalSourceNames.has(spec.name));
      if (local && !locals.includes(local)) {
        locals.push(local);
      }
    }
    byTarget.set(targetName, locals);
  }

  const all = [...new Set([...byTarget.values()].flat())].sort(compareByName);
  return { byTarget, all };
}

/**
 * Registry phase. Sets: localPackagesByTarget, localPackages.
 */
export const registryPhase: InstallPhase = {
  name: 'registry',

  async run(ctx) {
    const resolution = requireResolution(ctx);
    const registry = buildRegistry(ctx.sandbox, resolution.packagesByTarget, resolution.externalSourceNames);
    ctx.localPackagesByTarget = registry.byTarget;
    ctx.localPackages = registry.all;
  }
};
