import { relative } from 'path';

import type { InstallContext, InstallPhase } from '../context.js';
import type { ProjectHookContext } from '../hooks.js';
import { requireResolution } from '../context.js';
import { PROJECT_GROUPS } from '../../../constants/index.js';
import { writeAcknowledgements } from '../../generator/acknowledgements.js';
import { BuildProject } from '../../generator/build-project.js';
import { writeDummySource } from '../../generator/dummy-source.js';
import { TargetInstaller } from '../../generator/target-installer.js';
import { TargetLibrary, assertDistinctLibraries } from '../../generator/target-library.js';
import { HookError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

function ensureProject(ctx: InstallContext): BuildProject {
  if (!ctx.project) {
    const project = new BuildProject(ctx.sandbox.projectPath);
    const manifestPath = ctx.resolution?.manifestPath;
    if (manifestPath) {
      project.addManifest(relative(ctx.sandbox.root, manifestPath).split('\\').join('/'));
    }
    ctx.project = project;
  }
  return ctx.project;
}

async function runProjectHook(
  ctx: InstallContext,
  project: BuildProject,
  hook: 'pre-install' | 'post-install'
): Promise<void> {
  const { projectHooks: hooks, targets } = requireResolution(ctx);
  const context: ProjectHookContext = {
    hook,
    sandboxRoot: ctx.sandbox.root,
    project,
    targets,
    packageNames: ctx.localPackages.map(pkg => pkg.name),
    installedNames: [...ctx.installedNames]
  };

  try {
    if (hook === 'pre-install' && hooks?.preInstall) {
      await hooks.preInstall(context);
    } else if (hook === 'post-install' && hooks?.postInstall) {
      await hooks.postInstall(context);
    }
  } catch (error) {
    throw new HookError({ hook }, error);
  }
}

/**
 * Target generation phase. The order of the steps matters:
 *   1. build-file container (once per run)
 *   2. one installer per target with packages
 *   3. file references for all packages, then public header links
 *   4. pre-install hooks per (target, package), then the project's
 *   5. per target: settings and support files, acknowledgements, dummy source
 *   6. post-install hooks of each target's packages, then the project's
 *   7. container written once, after every hook had its chance to edit it
 *
 * Sets: project, targetInstallers.
 */
export const generateTargetsPhase: InstallPhase = {
  name: 'generate-targets',

  async run(ctx) {
    const resolution = requireResolution(ctx);
    ctx.output.step('Generating support files');

    const project = ensureProject(ctx);

    ctx.targetInstallers = [];
    for (const target of resolution.targets) {
      const packages = ctx.localPackagesByTarget.get(target.name) ?? [];
      if (packages.length === 0) {
        logger.debug(`Skipping target ${target.name}: no packages`);
        continue;
      }
      ctx.targetInstallers.push(new TargetInstaller(project, new TargetLibrary(target, ctx.sandbox.root), packages));
    }
    assertDistinctLibraries(ctx.targetInstallers.map(installer => installer.library));

    for (const pkg of ctx.localPackages) {
      await pkg.addFileReferencesToProject(project);
    }
    for (const pkg of ctx.localPackages) {
      for (const warning of await pkg.linkHeaders(ctx.sandbox.headersDir)) {
        logger.warn(warning);
        ctx.output.warn(warning);
        ctx.warnings.push(warning);
      }
    }

    for (const target of resolution.targets) {
      for (const pkg of ctx.localPackagesByTarget.get(target.name) ?? []) {
        await pkg.runPreInstall(target);
      }
    }
    await runProjectHook(ctx, project, 'pre-install');

    for (const installer of ctx.targetInstallers) {
      const { library } = installer;
      await installer.install();
      await writeAcknowledgements(
        library.definition,
        installer.packages,
        library.absolute(library.acknowledgementsPath)
      );
      await writeDummySource(library.dummyClassName, library.absolute(library.dummySourcePath));
      const dummy = project.newFile(library.dummySourcePath, PROJECT_GROUPS.TARGET_SUPPORT_FILES);
      installer.target.addSourceFile(dummy);
    }

    for (const installer of ctx.targetInstallers) {
      for (const pkg of installer.packages) {
        await pkg.runPostInstall(installer.library.definition, installer.library.label, installer.target);
      }
    }
    await runProjectHook(ctx, project, 'post-install');

    ctx.output.message(`- Writing build project to ${relative(ctx.projectDir, project.path)}`);
    await project.save();
  }
};
