import * as semver from 'semver';

import type {
  InstallationRecord,
  RecordedPackage,
  ResolvedPackage,
  SandboxStateDiff,
  SourceDescriptor
} from '../../types/index.js';
import { normalizeGitUrl } from '../../utils/git-url.js';

/**
 * Canonical, comparable form of a declared source. A commit pinned from the
 * previous record is not part of the key; the diff compares it with the
 * installed checkout separately.
 */
export function sourceKey(source: SourceDescriptor): string {
  if (source.type === 'path') {
    return `path:${source.path.split('\\').join('/')}`;
  }

  const url = normalizeGitUrl(source.url);
  if (source.tag) return `git:${url}#tag=${source.tag}`;
  if (source.branch) return `git:${url}#branch=${source.branch}`;
  if (source.commit) return `git:${url}#commit=${source.commit}`;
  return `git:${url}`;
}

function sameVersion(a: string, b: string): boolean {
  if (semver.valid(a) && semver.valid(b)) {
    return semver.eq(a, b);
  }
  return a === b;
}

function hasChanged(recorded: RecordedPackage, installedCommit: string | undefined, pkg: ResolvedPackage): boolean {
  return (
    !sameVersion(recorded.version, pkg.version) ||
    (recorded.head ?? false) !== pkg.head ||
    recorded.source !== sourceKey(pkg.source) ||
    (pkg.pinnedCommit !== undefined && pkg.pinnedCommit !== installedCommit)
  );
}

/**
 * Classify every package name against the previous installation record.
 * Without a record (first install) every resolved package is added.
 *
 * A package resolved for several targets is compared once, using the first
 * specification seen.
 */
export function computeSandboxStateDiff(
  record: InstallationRecord | null,
  resolved: Iterable<ResolvedPackage>
): SandboxStateDiff {
  const added = new Set<string>();
  const changed = new Set<string>();
  const unchanged = new Set<string>();
  const seen = new Set<string>();

  for (const pkg of resolved) {
    if (seen.has(pkg.name)) continue;
    seen.add(pkg.name);

    const recorded = record?.packages[pkg.name];
    if (!recorded) {
      added.add(pkg.name);
    } else if (hasChanged(recorded, record?.checkoutOptions[pkg.name]?.commit, pkg)) {
      changed.add(pkg.name);
    } else {
      unchanged.add(pkg.name);
    }
  }

  const deleted = new Set<string>();
  for (const name of Object.keys(record?.packages ?? {})) {
    if (!seen.has(name)) {
      deleted.add(name);
    }
  }

  return { added, changed, deleted, unchanged };
}
