import { isAbsolute, resolve } from 'path';

import type {
  InstallationRecord,
  Platform,
  ResolutionResult,
  ResolvedPackage,
  TargetDefinition
} from '../../types/index.js';
import { ResolutionError } from '../../utils/errors.js';
import { isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { computeSandboxStateDiff, sourceKey } from '../sandbox/state-diff.js';
import { createPackageCommandHooks, createProjectCommandHooks, runShellCommand, type CommandRunner } from './command-hooks.js';
import { readProjectManifest, type ManifestPackage } from './project-manifest.js';

export interface ResolveRequest {
  /** Record at the project root; ignored in update mode */
  lockfile: InstallationRecord | null;
  /** Record inside the sandbox: what is installed right now */
  sandboxManifest: InstallationRecord | null;
  updateMode: boolean;
}

/**
 * Produces the per-target package lists and the sandbox diff of one run
 */
export interface DependencyResolver {
  resolve(request: ResolveRequest): Promise<ResolutionResult>;
}

/**
 * Resolver for a project manifest whose packages are already exactly
 * pinned. Nothing is solved: every definition maps to one package.
 */
export class PinnedResolver implements DependencyResolver {
  constructor(
    private readonly manifestPath: string,
    private readonly projectDir: string,
    private readonly runCommand: CommandRunner = runShellCommand
  ) {}

  async resolve(request: ResolveRequest): Promise<ResolutionResult> {
    const manifest = await readProjectManifest(this.manifestPath);
    const lockfile = request.updateMode ? null : request.lockfile;

    const resolved = new Map<string, ResolvedPackage>();
    const resolvePackage = (definition: ManifestPackage, platform: Platform): ResolvedPackage => {
      const key = `${definition.name}\u0000${platform}`;
      let pkg = resolved.get(key);
      if (!pkg) {
        pkg = this.toResolvedPackage(definition, platform, lockfile);
        resolved.set(key, pkg);
      }
      return pkg;
    };

    const targets: TargetDefinition[] = [];
    const packagesByTarget = new Map<string, readonly ResolvedPackage[]>();
    const externalSourceNames = new Set<string>();

    for (const target of manifest.targets) {
      const packages: ResolvedPackage[] = [];
      for (const name of target.packageNames) {
        const definition = manifest.packages.get(name);
        if (!definition) {
          throw new ResolutionError(`Target '${target.name}' references unknown package '${name}'`, {
            targetName: target.name,
            packageName: name
          });
        }
        if (definition.kind === 'path') {
          await this.assertPathExists(definition);
        }
        if (definition.kind === 'external') {
          externalSourceNames.add(name);
        }
        packages.push(resolvePackage(definition, target.platform));
      }
      targets.push({ name: target.name, platform: target.platform, packageNames: target.packageNames });
      packagesByTarget.set(target.name, packages);
    }

    const diff = computeSandboxStateDiff(request.sandboxManifest, resolved.values());
    logger.debug('Resolved project manifest', {
      targets: targets.map(t => t.name),
      packages: resolved.size,
      diff
    });

    return {
      targets,
      packagesByTarget,
      diff,
      externalSourceNames,
      manifestPath: this.manifestPath,
      ...(manifest.hooks
        ? { projectHooks: createProjectCommandHooks(manifest.hooks, this.projectDir, this.runCommand) }
        : {})
    };
  }

  private toResolvedPackage(
    definition: ManifestPackage,
    platform: Platform,
    lockfile: InstallationRecord | null
  ): ResolvedPackage {
    const pinnedCommit = this.pinnedCommit(definition, lockfile);
    return {
      name: definition.name,
      version: definition.version,
      head: definition.head,
      source: definition.source,
      ...(pinnedCommit ? { pinnedCommit } : {}),
      locallySourced: definition.kind === 'path',
      platform,
      ...(definition.platforms ? { supportedPlatforms: definition.platforms } : {}),
      ...(definition.summary ? { summary: definition.summary } : {}),
      layout: definition.layout,
      ...(definition.license ? { license: definition.license } : {}),
      frameworks: definition.frameworks,
      libraries: definition.libraries,
      ...(definition.hooks ? { hooks: createPackageCommandHooks(definition.hooks, this.runCommand) } : {})
    };
  }

  /**
   * External and head packages stay at the commit recorded by the previous
   * installation as long as their declared source is unchanged
   */
  private pinnedCommit(definition: ManifestPackage, lockfile: InstallationRecord | null): string | undefined {
    const { source } = definition;
    if (!lockfile || source.type !== 'git' || source.commit) {
      return undefined;
    }
    if (definition.kind !== 'external' && !definition.head) {
      return undefined;
    }
    const recorded = lockfile.packages[definition.name];
    const checkout = lockfile.checkoutOptions[definition.name];
    if (!recorded || !checkout || recorded.source !== sourceKey(source)) {
      return undefined;
    }
    return checkout.commit;
  }

  private async assertPathExists(definition: ManifestPackage): Promise<void> {
    if (definition.source.type !== 'path') return;
    const { path } = definition.source;
    const absolute = isAbsolute(path) ? path : resolve(this.projectDir, path);
    if (!(await isDirectory(absolute))) {
      throw new ResolutionError(`Path of package '${definition.name}' does not exist: ${absolute}`, {
        packageName: definition.name,
        path: absolute
      });
    }
  }
}
