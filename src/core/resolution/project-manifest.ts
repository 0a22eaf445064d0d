import * as yaml from 'js-yaml';

import type { LicenseInfo, PackageLayout, Platform, SourceDescriptor } from '../../types/index.js';
import { PLATFORMS } from '../../constants/index.js';
import { ResolutionError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { isRecordObject } from '../../utils/guards.js';
import { packageNameProblem, pathSegmentProblem } from '../../utils/package-name.js';

/**
 * Project manifest (sandkit.yml): targets and exactly pinned package
 * definitions.
 *
 * ```yaml
 * platform: ios
 * targets:
 *   App:
 *     packages: [Alamo, Networking]
 * packages:
 *   Alamo:
 *     version: 5.8.0
 *     source: { git: https://example.com/alamo.git, tag: 5.8.0 }
 *   Networking:
 *     git: https://example.com/networking.git
 *     branch: main
 *   Shared:
 *     path: ../Shared
 * ```
 */

export type ManifestPackageKind = 'registry' | 'external' | 'path';

export interface CommandHookSet {
  preInstall?: string;
  postInstall?: string;
}

export interface ManifestPackage {
  name: string;
  kind: ManifestPackageKind;
  version: string;
  head: boolean;
  source: SourceDescriptor;
  summary?: string;
  layout: PackageLayout;
  license?: LicenseInfo;
  frameworks: string[];
  libraries: string[];
  platforms?: Platform[];
  hooks?: CommandHookSet;
}

export interface ManifestTarget {
  name: string;
  platform: Platform;
  packageNames: string[];
}

export interface ProjectManifest {
  path: string;
  platform: Platform;
  targets: ManifestTarget[];
  packages: Map<string, ManifestPackage>;
  hooks?: CommandHookSet;
}

export const DEFAULT_SOURCE_FILES = ['**/*.{h,hh,c,cc,cpp,m,mm,swift}'];
const DEFAULT_VERSION = '0.0.0';

type RawMap = Record<string, unknown>;


function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && PLATFORMS.some(platform => platform === value);
}

/**
 * Reads typed fields of one mapping, naming the offending key on failure
 */
class FieldReader {
  constructor(
    private readonly raw: RawMap,
    private readonly where: string,
    private readonly manifestPath: string
  ) {}

  fail(message: string): never {
    throw new ResolutionError(`${this.where}: ${message} (in ${this.manifestPath})`);
  }

  has(key: string): boolean {
    return this.raw[key] !== undefined && this.raw[key] !== null;
  }

  string(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    // Unquoted versions such as 1.0 load as numbers
    if (typeof value === 'number') return String(value);
    if (typeof value === 'string' && value.trim() !== '') return value;
    return this.fail(`'${key}' must be a non-empty string`);
  }

  boolean(key: string): boolean {
    const value = this.raw[key];
    if (value === undefined || value === null) return false;
    if (typeof value === 'boolean') return value;
    return this.fail(`'${key}' must be true or false`);
  }

  /** A string or list of strings */
  list(key: string): string[] {
    const value = this.raw[key];
    if (value === undefined || value === null) return [];
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    return this.fail(`'${key}' must be a string or a list of strings`);
  }

  map(key: string): RawMap | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (isRecordObject(value)) return value;
    return this.fail(`'${key}' must be a mapping`);
  }

  platform(key: string): Platform | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (isPlatform(value)) return value;
    return this.fail(`'${key}' must be one of ${PLATFORMS.join(', ')}`);
  }
}

function parseHooks(raw: RawMap | undefined, where: string, manifestPath: string): CommandHookSet | undefined {
  if (!raw) return undefined;
  const fields = new FieldReader(raw, where, manifestPath);
  const preInstall = fields.string('pre_install');
  const postInstall = fields.string('post_install');
  if (!preInstall && !postInstall) return undefined;
  return {
    ...(preInstall ? { preInstall } : {}),
    ...(postInstall ? { postInstall } : {})
  };
}

function parseGitSource(fields: FieldReader, url: string): SourceDescriptor {
  const tag = fields.string('tag');
  const branch = fields.string('branch');
  const commit = fields.string('commit');
  if ([tag, branch, commit].filter(Boolean).length > 1) {
    fields.fail('choose at most one of tag, branch or commit');
  }
  return {
    type: 'git',
    url,
    ...(tag ? { tag } : {}),
    ...(branch ? { branch } : {}),
    ...(commit ? { commit } : {})
  };
}

function parseLicense(fields: FieldReader, raw: RawMap, where: string, manifestPath: string): LicenseInfo | undefined {
  const value = raw.license;
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return { file: value };
  if (!isRecordObject(value)) {
    return fields.fail("'license' must be a file name or a mapping");
  }
  const license = new FieldReader(value, `${where} license`, manifestPath);
  const type = license.string('type');
  const text = license.string('text');
  const file = license.string('file');
  return {
    ...(type ? { type } : {}),
    ...(text ? { text } : {}),
    ...(file ? { file } : {})
  };
}

function parsePackage(name: string, raw: unknown, manifestPath: string): ManifestPackage {
  const where = `package '${name}'`;
  const nameProblem = packageNameProblem(name);
  if (nameProblem) {
    throw new ResolutionError(`${where}: ${nameProblem} (in ${manifestPath})`, { packageName: name });
  }
  if (!isRecordObject(raw)) {
    throw new ResolutionError(`${where}: definition must be a mapping (in ${manifestPath})`);
  }
  const fields = new FieldReader(raw, where, manifestPath);

  const forms = ['source', 'git', 'path'].filter(key => fields.has(key));
  if (forms.length !== 1) {
    fields.fail(
      forms.length === 0
        ? 'must specify exactly one source: version with source, git, or path'
        : `has multiple sources (${forms.join(', ')}); choose exactly one`
    );
  }

  let kind: ManifestPackageKind;
  let source: SourceDescriptor;
  let version = fields.string('version');

  if (fields.has('source')) {
    kind = 'registry';
    const sourceMap = fields.map('source') ?? fields.fail("'source' must be a mapping");
    const sourceFields = new FieldReader(sourceMap, `${where} source`, manifestPath);
    const url = sourceFields.string('git') ?? sourceFields.fail("'git' is required");
    source = parseGitSource(sourceFields, url);
    if (!version) {
      fields.fail("'version' is required for a registry package");
    }
  } else if (fields.has('git')) {
    kind = 'external';
    const url = fields.string('git') ?? fields.fail("'git' is required");
    source = parseGitSource(fields, url);
    if (!version && source.type === 'git') {
      version = source.tag ?? DEFAULT_VERSION;
    }
  } else {
    kind = 'path';
    const path = fields.string('path') ?? fields.fail("'path' is required");
    source = { type: 'path', path };
    version = version ?? DEFAULT_VERSION;
  }

  const head = fields.boolean('head');
  if (head && kind === 'path') {
    fields.fail("'head' does not apply to a path package");
  }

  const platforms = fields.list('platforms');
  for (const platform of platforms) {
    if (!isPlatform(platform)) {
      fields.fail(`unknown platform '${platform}'`);
    }
  }

  const sourceFiles = fields.list('source_files');
  const summary = fields.string('summary');
  const license = parseLicense(fields, raw, where, manifestPath);
  const hooks = parseHooks(fields.map('hooks'), `${where} hooks`, manifestPath);

  return {
    name,
    kind,
    version: version ?? DEFAULT_VERSION,
    head,
    source,
    ...(summary ? { summary } : {}),
    layout: {
      sourceFiles: sourceFiles.length > 0 ? sourceFiles : [...DEFAULT_SOURCE_FILES],
      publicHeaders: fields.list('public_headers'),
      resources: fields.list('resources'),
      preservePaths: fields.list('preserve_paths')
    },
    ...(license ? { license } : {}),
    frameworks: fields.list('frameworks'),
    libraries: fields.list('libraries'),
    ...(platforms.length > 0 ? { platforms: platforms.filter(isPlatform) } : {}),
    ...(hooks ? { hooks } : {})
  };
}

/**
 * Parse and validate the project manifest
 */
export function parseProjectManifest(content: string, manifestPath: string): ProjectManifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ResolutionError(`${manifestPath} is not valid YAML`, { manifestPath, error });
  }
  if (!isRecordObject(parsed)) {
    throw new ResolutionError(`${manifestPath} must be a mapping`, { manifestPath });
  }

  const fields = new FieldReader(parsed, 'manifest', manifestPath);
  const platform = fields.platform('platform') ?? fields.fail("'platform' is required");

  const packages = new Map<string, ManifestPackage>();
  for (const [name, raw] of Object.entries(fields.map('packages') ?? {})) {
    packages.set(name, parsePackage(name, raw, manifestPath));
  }

  const targets: ManifestTarget[] = [];
  for (const [name, raw] of Object.entries(fields.map('targets') ?? fields.fail("'targets' is required"))) {
    const where = `target '${name}'`;
    const nameProblem = pathSegmentProblem(name);
    if (nameProblem) {
      throw new ResolutionError(`${where}: ${nameProblem} (in ${manifestPath})`, { targetName: name });
    }
    if (!isRecordObject(raw)) {
      throw new ResolutionError(`${where}: definition must be a mapping (in ${manifestPath})`);
    }
    const targetFields = new FieldReader(raw, where, manifestPath);
    const packageNames = targetFields.list('packages');
    for (const packageName of packageNames) {
      if (!packages.has(packageName)) {
        targetFields.fail(`references unknown package '${packageName}'`);
      }
    }
    targets.push({
      name,
      platform: targetFields.platform('platform') ?? platform,
      packageNames: [...new Set(packageNames)]
    });
  }

  const hooks = parseHooks(fields.map('hooks'), 'project hooks', manifestPath);

  return { path: manifestPath, platform, targets, packages, ...(hooks ? { hooks } : {}) };
}

export async function readProjectManifest(manifestPath: string): Promise<ProjectManifest> {
  return parseProjectManifest(await readTextFile(manifestPath), manifestPath);
}
