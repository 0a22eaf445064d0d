import { createHash } from 'crypto';

/**
 * Normalize a git URL so that equivalent spellings share one cache entry:
 * scp-style `git@host:owner/repo` becomes `https://host/owner/repo`, the host
 * is lowercased and a trailing `.git` or slash is dropped.
 */
export function normalizeGitUrl(url: string): string {
  let normalized = url.trim();

  const scpLike = normalized.match(/^[\w.-]+@([\w.-]+):(.+)$/);
  if (scpLike) {
    normalized = `https://${scpLike[1]}/${scpLike[2]}`;
  }

  normalized = normalized.replace(/^(\w+:\/\/)([^/]+)/, (_match, protocol: string, host: string) =>
    `${protocol}${host.toLowerCase()}`
  );

  return normalized.replace(/\/+$/, '').replace(/\.git$/, '');
}

/**
 * Compute a hash of a git URL for cache directory naming.
 * Uses 12 hex characters (48 bits) for short but collision-resistant paths.
 */
export function computeGitUrlHash(url: string): string {
  const hash = createHash('sha256').update(normalizeGitUrl(url)).digest('hex');
  return hash.substring(0, 12);
}

/**
 * True for a full or abbreviated commit SHA
 */
export function isSha(ref: string): boolean {
  return /^[0-9a-f]{7,40}$/i.test(ref);
}
