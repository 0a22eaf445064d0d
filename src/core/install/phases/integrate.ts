import type { InstallPhase } from '../context.js';

/**
 * Host integration, only when the configuration asks for it
 */
export const integratePhase: InstallPhase = {
  name: 'integrate',

  shouldRun(ctx) {
    return ctx.config.integrateTargets;
  },

  async run(ctx) {
    ctx.output.step('Integrating client project');
    await ctx.collaborators.integrator.integrate({
      projectDir: ctx.projectDir,
      sandboxRoot: ctx.sandbox.root,
      projectPath: ctx.sandbox.projectPath,
      libraries: ctx.targetInstallers.map(installer => installer.library)
    });
  }
};
