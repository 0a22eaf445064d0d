/**
 * Sandbox data model: what the resolver hands to the installer, and what the
 * installer persists back as an installation record.
 */

import type { PackageHooks, ProjectHooks } from '../core/install/hooks.js';

export type Platform = 'ios' | 'macos' | 'tvos' | 'watchos';

export interface GitSource {
  type: 'git';
  url: string;
  tag?: string;
  branch?: string;
  commit?: string;
}

export interface PathSource {
  type: 'path';
  /** Path to the package's source tree as declared, relative to the project directory or absolute */
  path: string;
}

export type SourceDescriptor = GitSource | PathSource;

/**
 * Glob patterns (relative to the package root) describing which files a
 * package needs at build time. Everything else is removed by the clean pass.
 */
export interface PackageLayout {
  sourceFiles: string[];
  publicHeaders: string[];
  resources: string[];
  preservePaths: string[];
}

export interface LicenseInfo {
  type?: string;
  /** Inline license text; takes precedence over `file` */
  text?: string;
  /** License file relative to the package root */
  file?: string;
}

/**
 * A package specification as produced by the resolver for one target.
 * Immutable for the duration of a run.
 */
export interface ResolvedPackage {
  readonly name: string;
  readonly version: string;
  /** Pinned to a mutable branch tip rather than an immutable version */
  readonly head: boolean;
  readonly source: SourceDescriptor;
  /** Commit a git source is held at outside update mode, from the previous record */
  readonly pinnedCommit?: string;
  /** Path-based package; never fetched, never cleaned */
  readonly locallySourced: boolean;
  /** Platform of the target this specification was resolved for */
  readonly platform: Platform;
  /** Platforms the package supports; undefined means all */
  readonly supportedPlatforms?: readonly Platform[];
  readonly summary?: string;
  readonly layout: PackageLayout;
  readonly license?: LicenseInfo;
  readonly frameworks: readonly string[];
  readonly libraries: readonly string[];
  readonly hooks?: PackageHooks;
}

export type DownloadState = 'not-fetched' | 'fetched';
export type CleanState = 'pristine' | 'cleaned';

/**
 * Classification of every known package name relative to the previous
 * installation record. The four sets are disjoint.
 */
export interface SandboxStateDiff {
  readonly added: ReadonlySet<string>;
  readonly changed: ReadonlySet<string>;
  readonly deleted: ReadonlySet<string>;
  readonly unchanged: ReadonlySet<string>;
}

export interface TargetDefinition {
  readonly name: string;
  readonly platform: Platform;
  /** Names of the packages this target requests */
  readonly packageNames: readonly string[];
}

/**
 * Everything the installer consumes from the resolver.
 */
export interface ResolutionResult {
  readonly targets: readonly TargetDefinition[];
  /** Keyed by target name, in the resolver's order */
  readonly packagesByTarget: ReadonlyMap<string, readonly ResolvedPackage[]>;
  readonly diff: SandboxStateDiff;
  /** Packages resolved from a non-registry origin */
  readonly externalSourceNames: ReadonlySet<string>;
  /** Project manifest the resolution was read from, if any */
  readonly manifestPath?: string;
  readonly projectHooks?: ProjectHooks;
}

/**
 * Exact revision a git source resolved to when it was fetched.
 */
export interface GitCheckout {
  git: string;
  commit: string;
}

export interface RecordedPackage {
  version: string;
  head?: boolean;
  /** Canonical source key, see sourceKey() */
  source: string;
}

export interface InstallationRecord {
  lockfileVersion: number;
  packages: Record<string, RecordedPackage>;
  targets: Record<string, string[]>;
  externalSources: Record<string, SourceDescriptor>;
  checkoutOptions: Record<string, GitCheckout>;
}
