import * as yaml from 'js-yaml';

import type {
  GitCheckout,
  InstallationRecord,
  RecordedPackage,
  ResolutionResult,
  ResolvedPackage,
  SourceDescriptor
} from '../../types/index.js';
import { LOCKFILE_VERSION } from '../../constants/index.js';
import { PersistenceError, ValidationError } from '../../utils/errors.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { isRecordObject } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';
import { sourceKey } from '../sandbox/state-diff.js';

/**
 * Installation record: exact versions and sources of one installation,
 * stored as YAML at the project root (sandkit.lock) and inside the sandbox
 * (Packages/Manifest.lock).
 */

const RECORD_HEADER = '# This file is generated by sandkit install\n\n';

function cleanSource(source: SourceDescriptor): SourceDescriptor {
  if (source.type === 'path') {
    return { type: 'path', path: source.path };
  }
  return {
    type: 'git',
    url: source.url,
    ...(source.tag ? { tag: source.tag } : {}),
    ...(source.branch ? { branch: source.branch } : {}),
    ...(source.commit ? { commit: source.commit } : {})
  };
}

function uniquePackages(resolution: ResolutionResult): ResolvedPackage[] {
  const byName = new Map<string, ResolvedPackage>();
  for (const packages of resolution.packagesByTarget.values()) {
    for (const pkg of packages) {
      if (!byName.has(pkg.name)) {
        byName.set(pkg.name, pkg);
      }
    }
  }
  return [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Derive the record of a finished installation.
 *
 * @param revisions - commits reported by the fetcher during this run
 * @param previous - record of the previous installation, for checkouts of
 *   packages this run did not fetch
 */
export function generateRecord(
  resolution: ResolutionResult,
  revisions: ReadonlyMap<string, GitCheckout>,
  previous: InstallationRecord | null
): InstallationRecord {
  const packages: Record<string, RecordedPackage> = {};
  const externalSources: Record<string, SourceDescriptor> = {};
  const checkoutOptions: Record<string, GitCheckout> = {};

  for (const pkg of uniquePackages(resolution)) {
    packages[pkg.name] = {
      version: pkg.version,
      ...(pkg.head ? { head: true } : {}),
      source: sourceKey(pkg.source)
    };

    if (resolution.externalSourceNames.has(pkg.name) || pkg.locallySourced) {
      externalSources[pkg.name] = cleanSource(pkg.source);
    }

    if (pkg.source.type === 'git') {
      const unchangedSource = previous?.packages[pkg.name]?.source === sourceKey(pkg.source);
      const checkout =
        revisions.get(pkg.name) ??
        (pkg.pinnedCommit
          ? { git: pkg.source.url, commit: pkg.pinnedCommit }
          : unchangedSource
            ? previous?.checkoutOptions[pkg.name]
            : undefined);
      if (checkout) {
        checkoutOptions[pkg.name] = { git: checkout.git, commit: checkout.commit };
      }
    }
  }

  const targets: Record<string, string[]> = {};
  for (const target of resolution.targets) {
    const names = (resolution.packagesByTarget.get(target.name) ?? []).map(pkg => pkg.name);
    targets[target.name] = [...new Set(names)].sort();
  }

  return { lockfileVersion: LOCKFILE_VERSION, packages, targets, externalSources, checkoutOptions };
}

export function serializeRecord(record: InstallationRecord): string {
  const document = {
    'lockfile-version': record.lockfileVersion,
    packages: record.packages,
    targets: record.targets,
    'external-sources': record.externalSources,
    'checkout-options': record.checkoutOptions
  };
  return (
    RECORD_HEADER +
    yaml.dump(document, {
      indent: 2,
      noArrayIndent: true,
      sortKeys: true,
      lineWidth: -1,
      quotingType: '"'
    })
  );
}

function parseSource(name: string, value: unknown, location: string): SourceDescriptor {
  if (!isRecordObject(value)) {
    throw new ValidationError(`Invalid external source for '${name}' in ${location}`);
  }
  if (value.type === 'path' && typeof value.path === 'string') {
    return { type: 'path', path: value.path };
  }
  if (value.type === 'git' && typeof value.url === 'string') {
    const optional = (key: string): string | undefined => {
      const field = value[key];
      return typeof field === 'string' ? field : undefined;
    };
    const tag = optional('tag');
    const branch = optional('branch');
    const commit = optional('commit');
    return {
      type: 'git',
      url: value.url,
      ...(tag ? { tag } : {}),
      ...(branch ? { branch } : {}),
      ...(commit ? { commit } : {})
    };
  }
  throw new ValidationError(`Invalid external source for '${name}' in ${location}`);
}

/**
 * Parse and validate record YAML
 */
export function parseRecord(content: string, location: string): InstallationRecord {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ValidationError(`Installation record ${location} is not valid YAML`, { location, error });
  }
  if (!isRecordObject(parsed)) {
    throw new ValidationError(`Installation record ${location} must be a mapping`, { location });
  }

  const version = parsed['lockfile-version'];
  if (typeof version !== 'number') {
    throw new ValidationError(`Installation record ${location} has no lockfile-version`, { location });
  }

  const packages: Record<string, RecordedPackage> = {};
  const rawPackages = parsed.packages ?? {};
  if (!isRecordObject(rawPackages)) {
    throw new ValidationError(`'packages' must be a mapping in ${location}`);
  }
  for (const [name, entry] of Object.entries(rawPackages)) {
    if (!isRecordObject(entry) || typeof entry.source !== 'string') {
      throw new ValidationError(`Invalid entry for package '${name}' in ${location}`);
    }
    const entryVersion = entry.version;
    if (typeof entryVersion !== 'string' && typeof entryVersion !== 'number') {
      throw new ValidationError(`Package '${name}' has no version in ${location}`);
    }
    packages[name] = {
      version: String(entryVersion),
      ...(entry.head === true ? { head: true } : {}),
      source: entry.source
    };
  }

  const targets: Record<string, string[]> = {};
  const rawTargets = parsed.targets ?? {};
  if (!isRecordObject(rawTargets)) {
    throw new ValidationError(`'targets' must be a mapping in ${location}`);
  }
  for (const [name, entry] of Object.entries(rawTargets)) {
    if (!Array.isArray(entry) || !entry.every((item): item is string => typeof item === 'string')) {
      throw new ValidationError(`Target '${name}' must list package names in ${location}`);
    }
    targets[name] = entry;
  }

  const externalSources: Record<string, SourceDescriptor> = {};
  const rawExternal = parsed['external-sources'] ?? {};
  if (!isRecordObject(rawExternal)) {
    throw new ValidationError(`'external-sources' must be a mapping in ${location}`);
  }
  for (const [name, entry] of Object.entries(rawExternal)) {
    externalSources[name] = parseSource(name, entry, location);
  }

  const checkoutOptions: Record<string, GitCheckout> = {};
  const rawCheckouts = parsed['checkout-options'] ?? {};
  if (!isRecordObject(rawCheckouts)) {
    throw new ValidationError(`'checkout-options' must be a mapping in ${location}`);
  }
  for (const [name, entry] of Object.entries(rawCheckouts)) {
    if (!isRecordObject(entry) || typeof entry.git !== 'string' || typeof entry.commit !== 'string') {
      throw new ValidationError(`Invalid checkout options for '${name}' in ${location}`);
    }
    checkoutOptions[name] = { git: entry.git, commit: entry.commit };
  }

  return { lockfileVersion: version, packages, targets, externalSources, checkoutOptions };
}

/**
 * Read a record, or null when there is none at `path`
 */
export async function readRecord(path: string): Promise<InstallationRecord | null> {
  if (!(await exists(path))) {
    return null;
  }
  return parseRecord(await readTextFile(path), path);
}

/**
 * Write the same serialized record to every location, in order. Any failed
 * write is fatal and names its location.
 */
export async function writeRecord(record: InstallationRecord, locations: readonly string[]): Promise<string> {
  const content = serializeRecord(record);
  for (const location of locations) {
    try {
      await writeTextFile(location, content);
    } catch (error) {
      logger.error(`Failed to write installation record to ${location}`, { error });
      throw new PersistenceError(location, error);
    }
  }
  return content;
}
