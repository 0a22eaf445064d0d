import { join } from 'path';

import type {
  GitCheckout,
  InstallationRecord,
  InstallerConfig,
  ResolutionResult
} from '../../types/index.js';
import type { SourceFetcher } from '../fetch/source-fetcher.js';
import type { BuildProject } from '../generator/build-project.js';
import type { TargetInstaller } from '../generator/target-installer.js';
import type { HostIntegrator } from '../integration/host-integrator.js';
import type { OutputPort } from '../ports/output.js';
import type { DependencyResolver } from '../resolution/pinned-resolver.js';
import type { LocalPackage } from '../sandbox/local-package.js';
import type { FetchError, InstallPhaseName } from '../../utils/errors.js';
import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { resolveOutput } from '../ports/resolve.js';
import { Sandbox } from '../sandbox/sandbox.js';

/**
 * External collaborators of an install run
 */
export interface InstallCollaborators {
  resolver: DependencyResolver;
  fetcher: SourceFetcher;
  integrator: HostIntegrator;
}

export interface InstallRunOptions {
  projectDir: string;
  /** Ignore the project record and refresh head and external packages */
  updateMode: boolean;
  config: InstallerConfig;
  collaborators: InstallCollaborators;
  output?: OutputPort;
}

/**
 * State of one install run. Phases fill it in order; each phase documents
 * the fields it sets.
 */
export interface InstallContext {
  readonly projectDir: string;
  readonly sandbox: Sandbox;
  readonly lockfilePath: string;
  readonly updateMode: boolean;
  readonly config: InstallerConfig;
  readonly collaborators: InstallCollaborators;
  readonly output: OutputPort;

  // analyze
  lockfile: InstallationRecord | null;
  sandboxManifest: InstallationRecord | null;
  resolution: ResolutionResult | undefined;

  // registry
  localPackagesByTarget: Map<string, LocalPackage[]>;
  localPackages: LocalPackage[];

  // decide
  namesToInstall: Set<string>;

  // cleanup
  removedNames: string[];

  // install-packages
  installedNames: string[];
  revisions: Map<string, GitCheckout>;
  fetchFailures: FetchError[];

  // generate-targets
  project: BuildProject | undefined;
  targetInstallers: TargetInstaller[];

  // write-record
  record: InstallationRecord | undefined;

  warnings: string[];
}

/**
 * One step of the install pipeline. Phases run strictly in list order.
 */
export interface InstallPhase {
  readonly name: InstallPhaseName;
  /** Skip the phase for this run when false */
  shouldRun?(ctx: InstallContext): boolean;
  run(ctx: InstallContext): Promise<void>;
}

export function createInstallContext(options: InstallRunOptions): InstallContext {
  const sandboxRoot = join(options.projectDir, DIR_PATTERNS.SANDBOX);
  return {
    projectDir: options.projectDir,
    sandbox: new Sandbox(sandboxRoot, options.projectDir),
    lockfilePath: join(options.projectDir, FILE_PATTERNS.LOCKFILE),
    updateMode: options.updateMode,
    config: options.config,
    collaborators: options.collaborators,
    output: resolveOutput(options),

    lockfile: null,
    sandboxManifest: null,
    resolution: undefined,
    localPackagesByTarget: new Map(),
    localPackages: [],
    namesToInstall: new Set(),
    removedNames: [],
    installedNames: [],
    revisions: new Map(),
    fetchFailures: [],
    project: undefined,
    targetInstallers: [],
    record: undefined,
    warnings: []
  };
}

export function requireResolution(ctx: InstallContext): ResolutionResult {
  if (!ctx.resolution) {
    throw new ValidationError('Install context has no resolution; the analyze phase must run first');
  }
  return ctx.resolution;
}
