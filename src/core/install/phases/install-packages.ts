import pico from 'picocolors';

import type { GitCheckout, InstallerConfig } from '../../../types/index.js';
import type { InstallPhase } from '../context.js';
import type { SourceFetcher } from '../../fetch/source-fetcher.js';
import type { OutputPort } from '../../ports/output.js';
import type { LocalPackage } from '../../sandbox/local-package.js';
import type { Sandbox } from '../../sandbox/sandbox.js';
import { DocumentationGenerator } from '../../generator/documentation.js';
import { AggregateFetchError, FetchError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

export interface PackageInstallDeps {
  sandbox: Sandbox;
  fetcher: SourceFetcher;
  config: InstallerConfig;
  output: OutputPort;
  /** Receives the more specific revision a fetch resolved to */
  revisions: Map<string, GitCheckout>;
}

/**
 * Install protocol of one package:
 *   1. fetch unless already fetched (implode first, so no stale files remain)
 *   2. generate documentation when configured and missing for this version
 *   3. clean when configured; always after documentation
 */
export async function installIfNeeded(pkg: LocalPackage, deps: PackageInstallDeps): Promise<void> {
  const { config, output } = deps;

  if (pkg.downloadState !== 'fetched') {
    await pkg.implode();
    const result = await pkg.download(deps.fetcher, {
      // A head package recorded by the previous installation stays at that commit
      headMode: pkg.spec.head && !pkg.spec.pinnedCommit,
      cacheRoot: config.cacheRoot,
      maxCacheSizeMB: config.maxCacheSizeMB,
      aggressiveCache: config.aggressiveCache
    });
    if (result.resolvedRevision) {
      deps.revisions.set(pkg.name, result.resolvedRevision);
      logger.debug(`${pkg.name} resolved to ${result.resolvedRevision.commit}`);
    }
  }

  if (config.generateDocs) {
    const docs = new DocumentationGenerator(pkg, deps.sandbox.documentationDir, config.docsRoot);
    if (await docs.alreadyInstalled()) {
      output.message(' > Using existing documentation');
    } else {
      output.message(' > Installing documentation');
      await docs.generate(config.docInstall);
    }
  }

  if (config.clean) {
    await pkg.clean();
  }
}

/**
 * Install phase: walk every local package in sorted order, installing those
 * in the install set and reporting the rest as used.
 *
 * Sets: installedNames, revisions, fetchFailures.
 */
export const installPackagesPhase: InstallPhase = {
  name: 'install-packages',

  async run(ctx) {
    ctx.output.step('Downloading dependencies');

    const deps: PackageInstallDeps = {
      sandbox: ctx.sandbox,
      fetcher: ctx.collaborators.fetcher,
      config: ctx.config,
      output: ctx.output,
      revisions: ctx.revisions
    };
    const handled = new Set<string>();

    for (const pkg of ctx.localPackages) {
      // Instances for other platforms share the root of the first one
      if (handled.has(pkg.name)) {
        continue;
      }
      handled.add(pkg.name);
      await ctx.sandbox.storeSpecification(pkg.spec);

      if (!ctx.namesToInstall.has(pkg.name)) {
        ctx.output.message(`${pico.green('-> ')}Using ${pkg}`);
        continue;
      }

      ctx.output.message(`${pico.green('-> ')}${pico.green(`Installing ${pkg}`)}`);
      try {
        await installIfNeeded(pkg, deps);
        ctx.installedNames.push(pkg.name);
      } catch (error) {
        if (ctx.config.keepGoing && error instanceof FetchError) {
          logger.warn(error.message, { error });
          ctx.output.error(error.message);
          ctx.fetchFailures.push(error);
          continue;
        }
        throw error;
      }
    }

    if (ctx.fetchFailures.length > 0) {
      throw new AggregateFetchError(ctx.fetchFailures);
    }
  }
};
