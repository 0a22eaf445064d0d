/**
 * Install hooks.
 *
 * Packages and the project may register pre/post install hooks. Hooks are
 * fire-and-forget: their return value is ignored and a thrown error aborts
 * the run. Pre-install hooks run before any target support file is written;
 * post-install hooks run before the build-file container is serialized, so
 * both may still alter what gets generated.
 */

import type { Platform, TargetDefinition } from '../../types/index.js';
import type { BuildProject, ProjectTarget } from '../generator/build-project.js';

export type PackageVariant = 'registry' | 'external' | 'path';

/**
 * Read-only view of a local package handed to hooks
 */
export interface HookPackageView {
  readonly name: string;
  readonly version: string;
  readonly variant: PackageVariant;
  readonly root: string;
  readonly platform: Platform;
}

export interface PackagePreInstallContext {
  readonly hook: 'pre-install';
  readonly package: HookPackageView;
  readonly target: TargetDefinition;
}

export interface PackagePostInstallContext {
  readonly hook: 'post-install';
  readonly package: HookPackageView;
  readonly target: TargetDefinition;
  /** Label of the generated target, e.g. Packages-App */
  readonly label: string;
  /** The generated target; its build settings may still be changed */
  readonly projectTarget: ProjectTarget;
}

export interface ProjectHookContext {
  readonly hook: 'pre-install' | 'post-install';
  readonly sandboxRoot: string;
  readonly project: BuildProject;
  readonly targets: readonly TargetDefinition[];
  /** All local packages, in install order */
  readonly packageNames: readonly string[];
  /** Packages installed (not reused) by this run */
  readonly installedNames: readonly string[];
}

export interface PackageHooks {
  preInstall?(context: PackagePreInstallContext): void | Promise<void>;
  postInstall?(context: PackagePostInstallContext): void | Promise<void>;
}

export interface ProjectHooks {
  preInstall?(context: ProjectHookContext): void | Promise<void>;
  postInstall?(context: ProjectHookContext): void | Promise<void>;
}
