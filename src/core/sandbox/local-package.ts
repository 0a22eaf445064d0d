import { randomBytes } from 'crypto';
import { basename, dirname, isAbsolute, join, relative, resolve } from 'path';
import { minimatch } from 'minimatch';

import type {
  CleanState,
  DownloadState,
  Platform,
  ResolvedPackage,
  SourceDescriptor,
  TargetDefinition
} from '../../types/index.js';
import type { FetchOptions, FetchResult, SourceFetcher } from '../fetch/source-fetcher.js';
import type { BuildProject, ProjectTarget } from '../generator/build-project.js';
import type { HookPackageView, PackageVariant } from '../install/hooks.js';
import { ALWAYS_KEPT_PATTERNS } from '../../constants/index.js';
import { FetchError, HookError, ResolutionError, describeCause } from '../../utils/errors.js';
import {
  createSymlink,
  ensureDir,
  isDirectory,
  remove,
  removeEmptyDirectories,
  renameDirectory,
  walkFiles
} from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * The pre/post install hook capability every local package variant provides.
 */
export interface InstallHookCapability {
  runPreInstall(target: TargetDefinition): Promise<void>;
  runPostInstall(target: TargetDefinition, label: string, projectTarget: ProjectTarget): Promise<void>;
}

function toPosix(path: string): string {
  return path.split('\\').join('/');
}

/**
 * A pattern naming a directory covers everything beneath it
 */
function matchesAny(file: string, patterns: readonly string[]): boolean {
  return patterns.some(
    pattern => minimatch(file, pattern, { dot: true }) || minimatch(file, `${pattern}/**`, { dot: true })
  );
}

/**
 * Sandbox-side materialization of a resolved package.
 *
 * The download state only moves to `fetched` through `download()`, and only
 * after the fetched tree is in place.
 */
export abstract class LocalPackage implements InstallHookCapability {
  abstract readonly variant: PackageVariant;

  private downloadStateValue: DownloadState;
  private cleanStateValue: CleanState = 'pristine';

  protected constructor(
    readonly spec: ResolvedPackage,
    readonly platform: Platform,
    readonly root: string,
    protected readonly sandboxRoot: string,
    initialState: DownloadState
  ) {
    this.downloadStateValue = initialState;
  }

  get name(): string {
    return this.spec.name;
  }

  get version(): string {
    return this.spec.head ? `${this.spec.version} (HEAD)` : this.spec.version;
  }

  get downloadState(): DownloadState {
    return this.downloadStateValue;
  }

  get cleanState(): CleanState {
    return this.cleanStateValue;
  }

  get locallySourced(): boolean {
    return this.spec.locallySourced;
  }

  toString(): string {
    return `${this.name} (${this.version})`;
  }

  async exists(): Promise<boolean> {
    return isDirectory(this.root);
  }

  /**
   * Remove the materialized tree
   */
  async implode(): Promise<void> {
    await remove(this.root);
  }

  /**
   * Fetch the package source into a staging directory and move it into
   * place. On failure the root is left absent and the state is unchanged.
   */
  async download(fetcher: SourceFetcher, options: FetchOptions): Promise<FetchResult> {
    const staging = `${this.root}.download-${randomBytes(4).toString('hex')}`;
    await ensureDir(dirname(this.root));

    let result: FetchResult;
    try {
      result = await fetcher.fetch(this.fetchSource(options.headMode), staging, options);
      await remove(this.root);
      await renameDirectory(staging, this.root);
    } catch (error) {
      await remove(staging);
      throw error instanceof FetchError ? error : new FetchError(this.name, describeCause(error), error);
    }

    this.downloadStateValue = 'fetched';
    this.cleanStateValue = 'pristine';
    return result;
  }

  /**
   * Source to fetch: outside head mode a git source is held at the commit
   * recorded by the previous installation, when there is one.
   */
  protected fetchSource(headMode: boolean): SourceDescriptor {
    const { source, pinnedCommit } = this.spec;
    if (source.type === 'git' && pinnedCommit && !headMode) {
      return { ...source, commit: pinnedCommit };
    }
    return source;
  }

  /**
   * Remove every file the package layout does not reference
   */
  async clean(): Promise<void> {
    const keep = this.keptPatterns();
    for await (const file of walkFiles(this.root, { skipJunk: false })) {
      if (!matchesAny(file, keep)) {
        await remove(join(this.root, file));
      }
    }
    await removeEmptyDirectories(this.root);
    this.cleanStateValue = 'cleaned';
    logger.debug(`Cleaned ${this.name}`, { root: this.root });
  }

  private keptPatterns(): string[] {
    const { layout, license } = this.spec;
    return [
      ...layout.sourceFiles,
      ...layout.publicHeaders,
      ...layout.resources,
      ...layout.preservePaths,
      ...ALWAYS_KEPT_PATTERNS,
      ...(license?.file ? [license.file] : [])
    ];
  }

  /**
   * Files of the package matching its source globs, sorted, relative to the
   * package root
   */
  async sourceFiles(): Promise<string[]> {
    return this.matchingFiles(this.spec.layout.sourceFiles);
  }

  /**
   * Public headers; without explicit patterns every header among the source
   * files is public
   */
  async publicHeaders(): Promise<string[]> {
    if (this.spec.layout.publicHeaders.length > 0) {
      return this.matchingFiles(this.spec.layout.publicHeaders);
    }
    return (await this.sourceFiles()).filter(file => file.endsWith('.h'));
  }

  private async matchingFiles(patterns: readonly string[]): Promise<string[]> {
    if (patterns.length === 0 || !(await this.exists())) {
      return [];
    }
    const files: string[] = [];
    for await (const file of walkFiles(this.root)) {
      if (matchesAny(file, patterns)) {
        files.push(file);
      }
    }
    return files.sort();
  }

  /**
   * Path of a package file relative to the sandbox root
   */
  sandboxRelative(file: string): string {
    return toPosix(relative(this.sandboxRoot, join(this.root, file)));
  }

  async addFileReferencesToProject(project: BuildProject): Promise<void> {
    const group = project.packageGroup(this.name, this.locallySourced);
    for (const file of await this.sourceFiles()) {
      group.addFile(this.sandboxRelative(file));
    }
  }

  /**
   * Symlink public headers into `<headersRoot>/<name>/`. Of two headers
   * sharing a file name the first in sorted order is linked.
   *
   * @returns a warning for every header left unlinked
   */
  async linkHeaders(headersRoot: string): Promise<string[]> {
    const headersDir = join(headersRoot, this.name);
    const linked = new Map<string, string>();
    const warnings: string[] = [];
    for (const header of await this.publicHeaders()) {
      const fileName = basename(header);
      const first = linked.get(fileName);
      if (first !== undefined) {
        warnings.push(`Public header ${header} of '${this.name}' has the same name as ${first}; only ${first} is linked`);
        continue;
      }
      linked.set(fileName, header);
      await createSymlink(join(this.root, header), join(headersDir, fileName));
    }
    return warnings;
  }

  hookView(): HookPackageView {
    return {
      name: this.name,
      version: this.spec.version,
      variant: this.variant,
      root: this.root,
      platform: this.platform
    };
  }

  async runPreInstall(target: TargetDefinition): Promise<void> {
    const hooks = this.spec.hooks;
    if (!hooks?.preInstall) return;
    try {
      await hooks.preInstall({ hook: 'pre-install', package: this.hookView(), target });
    } catch (error) {
      throw new HookError({ hook: 'pre-install', packageName: this.name, targetName: target.name }, error);
    }
  }

  async runPostInstall(target: TargetDefinition, label: string, projectTarget: ProjectTarget): Promise<void> {
    const hooks = this.spec.hooks;
    if (!hooks?.postInstall) return;
    try {
      await hooks.postInstall({ hook: 'post-install', package: this.hookView(), target, label, projectTarget });
    } catch (error) {
      throw new HookError({ hook: 'post-install', packageName: this.name, targetName: target.name }, error);
    }
  }
}

/**
 * A package from the registry, materialized under the sandbox
 */
export class SandboxPackage extends LocalPackage {
  readonly variant = 'registry';

  constructor(spec: ResolvedPackage, platform: Platform, sandboxRoot: string) {
    super(spec, platform, join(sandboxRoot, spec.name), sandboxRoot, 'not-fetched');
  }
}

/**
 * A package declared directly against a git repository
 */
export class ExternalSourcePackage extends LocalPackage {
  readonly variant = 'external';

  constructor(spec: ResolvedPackage, platform: Platform, sandboxRoot: string) {
    super(spec, platform, join(sandboxRoot, spec.name), sandboxRoot, 'not-fetched');
  }
}

/**
 * A package used in place from a directory of the user's. It is never
 * fetched, removed or cleaned.
 */
export class PathPackage extends LocalPackage {
  readonly variant = 'path';

  constructor(spec: ResolvedPackage, platform: Platform, sandboxRoot: string, projectDir: string) {
    if (spec.source.type !== 'path') {
      throw new ResolutionError(`Package '${spec.name}' is locally sourced but declares a ${spec.source.type} source`, {
        packageName: spec.name
      });
    }
    const root = isAbsolute(spec.source.path) ? spec.source.path : resolve(projectDir, spec.source.path);
    super(spec, platform, root, sandboxRoot, 'fetched');
  }

  override async implode(): Promise<void> {
    logger.debug(`Not removing locally sourced package ${this.name}`);
  }

  override async download(): Promise<FetchResult> {
    return {};
  }

  override async clean(): Promise<void> {
    logger.debug(`Not cleaning locally sourced package ${this.name}`);
  }
}
