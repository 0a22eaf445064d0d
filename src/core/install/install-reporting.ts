import pico from 'picocolors';

import type { OutputPort } from '../ports/output.js';
import type { InstallContext } from './context.js';

export interface InstallSummary {
  installed: string[];
  reused: string[];
  removed: string[];
  /** Labels of the generated targets */
  targets: string[];
  warnings: string[];
}

export function summarizeInstall(ctx: InstallContext): InstallSummary {
  const installed = new Set(ctx.installedNames);
  const reused = [...new Set(ctx.localPackages.map(pkg => pkg.name))].filter(name => !installed.has(name));
  return {
    installed: [...ctx.installedNames],
    reused,
    removed: [...ctx.removedNames],
    targets: ctx.targetInstallers.map(installer => installer.library.label),
    warnings: [...new Set(ctx.warnings)]
  };
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function displayInstallSummary(summary: InstallSummary, output: OutputPort): void {
  const parts = [
    `${plural(summary.installed.length, 'package')} installed`,
    `${summary.reused.length} reused`,
    `${summary.removed.length} removed`
  ];
  output.success(parts.join(', '));

  if (summary.targets.length > 0) {
    output.info(pico.dim(`Targets: ${summary.targets.join(', ')}`));
  }
  if (summary.warnings.length > 0) {
    output.note(summary.warnings.map(warning => `- ${warning}`).join('\n'), 'Warnings');
  }
}
