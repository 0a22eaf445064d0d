import { join } from 'path';
import * as yaml from 'js-yaml';

import type { InstallationRecord, Platform, ResolvedPackage } from '../../types/index.js';
import { FILE_PATTERNS, SANDBOX_DIRS } from '../../constants/index.js';
import { ensureDir, remove, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { validatePackageName } from '../../utils/package-name.js';
import { readRecord } from '../record/installation-record.js';
import { ExternalSourcePackage, LocalPackage, PathPackage, SandboxPackage } from './local-package.js';

/**
 * The sandbox directory (Packages/) and the local packages materialized in
 * it. The sandbox owns every package root; local package instances are
 * created once per (name, platform).
 */
export class Sandbox {
  private readonly packages = new Map<string, LocalPackage>();

  constructor(
    readonly root: string,
    readonly projectDir: string
  ) {}

  get manifestPath(): string {
    return join(this.root, FILE_PATTERNS.SANDBOX_MANIFEST);
  }

  get projectPath(): string {
    return join(this.root, FILE_PATTERNS.PROJECT_FILE);
  }

  get headersDir(): string {
    return join(this.root, SANDBOX_DIRS.HEADERS);
  }

  get specificationsDir(): string {
    return join(this.root, SANDBOX_DIRS.SPECIFICATIONS);
  }

  get targetSupportFilesDir(): string {
    return join(this.root, SANDBOX_DIRS.TARGET_SUPPORT_FILES);
  }

  get documentationDir(): string {
    return join(this.root, SANDBOX_DIRS.DOCUMENTATION);
  }

  /**
   * @throws ResolutionError for a name that would leave the sandbox or
   *   collide with a generated entry
   */
  packageRoot(name: string): string {
    validatePackageName(name);
    return join(this.root, name);
  }

  /**
   * Remove the directories that every run regenerates from scratch
   */
  async prepareForInstall(): Promise<void> {
    await ensureDir(this.root);
    await remove(this.headersDir);
    await remove(this.specificationsDir);
    await remove(this.targetSupportFilesDir);
    logger.debug(`Prepared sandbox ${this.root} for install`);
  }

  async readManifest(): Promise<InstallationRecord | null> {
    return readRecord(this.manifestPath);
  }

  /**
   * Local package for a registry or external package, or undefined when the
   * package does not support the platform
   */
  localPackageFor(spec: ResolvedPackage, platform: Platform, external: boolean): LocalPackage | undefined {
    return this.memoize(spec, platform, () =>
      external
        ? new ExternalSourcePackage(spec, platform, this.root)
        : new SandboxPackage(spec, platform, this.root)
    );
  }

  locallySourcedPackageFor(spec: ResolvedPackage, platform: Platform): LocalPackage | undefined {
    return this.memoize(spec, platform, () => new PathPackage(spec, platform, this.root, this.projectDir));
  }

  private memoize(spec: ResolvedPackage, platform: Platform, create: () => LocalPackage): LocalPackage | undefined {
    if (spec.supportedPlatforms && !spec.supportedPlatforms.includes(platform)) {
      logger.warn(`Package '${spec.name}' does not support ${platform}; skipping it for this platform`);
      return undefined;
    }

    validatePackageName(spec.name);
    const key = `${spec.name}\u0000${platform}`;
    let pkg = this.packages.get(key);
    if (!pkg) {
      pkg = create();
      this.packages.set(key, pkg);
    }
    return pkg;
  }

  /**
   * Store the resolved descriptor of a package under Specifications/
   */
  async storeSpecification(spec: ResolvedPackage): Promise<string> {
    const path = join(this.specificationsDir, `${spec.name}${FILE_PATTERNS.YML_FILE}`);
    const descriptor = {
      name: spec.name,
      version: spec.version,
      ...(spec.head ? { head: true } : {}),
      source: spec.source,
      ...(spec.summary ? { summary: spec.summary } : {}),
      ...(spec.supportedPlatforms ? { platforms: [...spec.supportedPlatforms] } : {}),
      layout: spec.layout,
      ...(spec.license ? { license: spec.license } : {}),
      frameworks: [...spec.frameworks],
      libraries: [...spec.libraries]
    };
    await writeTextFile(path, yaml.dump(descriptor, { indent: 2, noArrayIndent: true, lineWidth: -1, skipInvalid: true }));
    return path;
  }
}
