import { createHash } from 'crypto';

import type { Platform } from '../../types/index.js';
import { PROJECT_GROUPS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * In-memory build-file container. Paths are relative to the sandbox root and
 * always use forward slashes. Object IDs are derived from paths, so the same
 * inputs always serialize to the same document.
 */

const PROJECT_FORMAT_VERSION = 1;

const COMPILED_EXTENSIONS = ['.c', '.cc', '.cpp', '.cxx', '.m', '.mm', '.swift'];

function objectId(kind: string, key: string): string {
  return createHash('sha256').update(`${kind}:${key}`).digest('hex').substring(0, 24).toUpperCase();
}

export function isCompiledSource(path: string): boolean {
  return COMPILED_EXTENSIONS.some(ext => path.endsWith(ext));
}

export interface FileReference {
  readonly id: string;
  readonly path: string;
}

export class ProjectGroup {
  readonly id: string;
  readonly files: FileReference[] = [];
  readonly children: ProjectGroup[] = [];

  constructor(
    readonly name: string,
    private readonly groupPath: string
  ) {
    this.id = objectId('group', groupPath);
  }

  /** Child group by name, created on first use */
  group(name: string): ProjectGroup {
    let child = this.children.find(g => g.name === name);
    if (!child) {
      child = new ProjectGroup(name, `${this.groupPath}/${name}`);
      this.children.push(child);
    }
    return child;
  }

  findGroup(name: string): ProjectGroup | undefined {
    return this.children.find(g => g.name === name);
  }

  /** Add a file reference; adding the same path twice returns the first one */
  addFile(path: string): FileReference {
    const existing = this.files.find(f => f.path === path);
    if (existing) {
      return existing;
    }
    const ref: FileReference = { id: objectId('file', path), path };
    this.files.push(ref);
    return ref;
  }

  toJSON(): object {
    return {
      id: this.id,
      name: this.name,
      files: this.files,
      children: this.children.map(child => child.toJSON())
    };
  }
}

export class ProjectTarget {
  readonly id: string;
  readonly buildSettings: Record<string, string> = {};
  readonly sourceBuildPhase: FileReference[] = [];

  constructor(
    readonly name: string,
    readonly platform: Platform
  ) {
    this.id = objectId('target', name);
  }

  addSourceFile(ref: FileReference): void {
    if (!this.sourceBuildPhase.some(existing => existing.id === ref.id)) {
      this.sourceBuildPhase.push(ref);
    }
  }

  toJSON(): object {
    return {
      id: this.id,
      name: this.name,
      platform: this.platform,
      buildSettings: this.buildSettings,
      sourceBuildPhase: this.sourceBuildPhase.map(ref => ref.id)
    };
  }
}

export class BuildProject {
  readonly mainGroup = new ProjectGroup('Main', '');
  readonly targets: ProjectTarget[] = [];
  private serialized = false;

  /**
   * @param path - where `save()` writes the container
   */
  constructor(readonly path: string) {
    for (const name of Object.values(PROJECT_GROUPS)) {
      this.mainGroup.group(name);
    }
  }

  get isSaved(): boolean {
    return this.serialized;
  }

  /**
   * Group holding one package's files, under `Packages` or `Local Packages`
   */
  packageGroup(packageName: string, local: boolean): ProjectGroup {
    const parent = local ? PROJECT_GROUPS.LOCAL_PACKAGES : PROJECT_GROUPS.PACKAGES;
    return this.mainGroup.group(parent).group(packageName);
  }

  /**
   * Add a file reference to a top-level group
   */
  newFile(path: string, groupName: string): FileReference {
    return this.mainGroup.group(groupName).addFile(path);
  }

  addManifest(relativePath: string): FileReference {
    return this.newFile(relativePath, PROJECT_GROUPS.MANIFEST);
  }

  addTarget(name: string, platform: Platform): ProjectTarget {
    if (this.targets.some(t => t.name === name)) {
      throw new ValidationError(`Project already has a target named '${name}'`);
    }
    const target = new ProjectTarget(name, platform);
    this.targets.push(target);
    return target;
  }

  serialize(): string {
    return JSON.stringify(
      {
        version: PROJECT_FORMAT_VERSION,
        mainGroup: this.mainGroup.toJSON(),
        targets: this.targets.map(t => t.toJSON())
      },
      null,
      2
    );
  }

  /**
   * Write the container to disk. A container is written once per run.
   */
  async save(): Promise<void> {
    if (this.serialized) {
      throw new ValidationError(`Build project ${this.path} was already written in this run`);
    }
    await writeTextFile(this.path, `${this.serialize()}\n`);
    this.serialized = true;
    logger.debug(`Wrote build project to ${this.path}`, { targets: this.targets.length });
  }
}
