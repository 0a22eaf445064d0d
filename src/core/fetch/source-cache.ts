import { join } from 'path';
import { randomBytes } from 'crypto';
import { readdir } from 'fs/promises';
import {
  exists,
  readTextFile,
  writeTextFile,
  copyDirectory,
  renameDirectory,
  remove,
  getDirectorySize
} from '../../utils/fs.js';
import { computeGitUrlHash, normalizeGitUrl } from '../../utils/git-url.js';
import { logger } from '../../utils/logger.js';
import { isRecordObject } from '../../utils/guards.js';

/**
 * Metadata stored next to each cached source tree.
 */
export interface SourceCacheMetadata {
  url: string;
  commit: string;
  ref?: string;
  cachedAt: string;
  lastAccessed: string;
}

export interface CachedRefEntry {
  commit: string;
  fetchedAt: string;
}

interface RefCacheFile {
  refs: Record<string, CachedRefEntry>;
}

export interface SourceCacheEntry {
  path: string;
  metadataPath: string;
  metadata: SourceCacheMetadata;
}

const EXCLUDED_FROM_CACHE = ['.git'];
const REFS_FILE = 'refs.json';
const BYTES_PER_MB = 1024 * 1024;

/**
 * Local cache of fetched source trees.
 *
 * Layout:
 *   <root>/<url-hash>/<commit-sha-7>/       source tree without VCS metadata
 *   <root>/<url-hash>/<commit-sha-7>.json   SourceCacheMetadata
 *   <root>/<url-hash>/refs.json             tag -> commit mappings
 *
 * Entries are keyed by URL and commit only; the cache is never consulted
 * for anything that is not already pinned to a commit.
 */
export class SourceCache {
  constructor(
    private readonly root: string,
    private readonly maxSizeMB: number
  ) {}

  private repoDir(url: string): string {
    return join(this.root, computeGitUrlHash(url));
  }

  entryDir(url: string, commit: string): string {
    return join(this.repoDir(url), commit.substring(0, 7));
  }

  private metadataPath(url: string, commit: string): string {
    return `${this.entryDir(url, commit)}.json`;
  }

  private async readMetadata(metadataPath: string): Promise<SourceCacheMetadata | null> {
    if (!(await exists(metadataPath))) {
      return null;
    }
    try {
      return parseMetadata(JSON.parse(await readTextFile(metadataPath)));
    } catch (error) {
      logger.warn(`Failed to read source cache metadata at ${metadataPath}`, { error });
      return null;
    }
  }

  /**
   * Return the cached tree for an exact commit, or null. A hit refreshes the
   * entry's last-access time.
   */
  async lookup(url: string, commit: string): Promise<string | null> {
    const dir = this.entryDir(url, commit);
    const metadataPath = this.metadataPath(url, commit);
    const metadata = await this.readMetadata(metadataPath);

    // The short directory name may collide; the metadata holds the full SHA
    if (!metadata || (!metadata.commit.startsWith(commit) && !commit.startsWith(metadata.commit))) {
      return null;
    }
    if (!(await exists(dir))) {
      return null;
    }

    metadata.lastAccessed = new Date().toISOString();
    await writeTextFile(metadataPath, JSON.stringify(metadata, null, 2));
    logger.debug(`Source cache hit for ${url}@${commit.substring(0, 7)}`);
    return dir;
  }

  /**
   * Copy a fetched tree into the cache. The copy is staged and renamed into
   * place so a concurrent reader never sees a partial entry.
   */
  async store(url: string, commit: string, sourceDir: string, ref?: string): Promise<string> {
    const dir = this.entryDir(url, commit);
    if (await exists(dir)) {
      await remove(dir);
    }

    const staging = `${dir}.tmp-${randomBytes(4).toString('hex')}`;
    try {
      await copyDirectory(sourceDir, staging, EXCLUDED_FROM_CACHE);
      await renameDirectory(staging, dir);
    } finally {
      await remove(staging);
    }

    const now = new Date().toISOString();
    const metadata: SourceCacheMetadata = {
      url: normalizeGitUrl(url),
      commit,
      ...(ref ? { ref } : {}),
      cachedAt: now,
      lastAccessed: now
    };
    await writeTextFile(this.metadataPath(url, commit), JSON.stringify(metadata, null, 2));
    logger.debug(`Cached source ${url}@${commit.substring(0, 7)}`, { dir });
    return dir;
  }

  /**
   * Copy a cached tree to `destination`
   */
  async materialize(cachedDir: string, destination: string): Promise<void> {
    await copyDirectory(cachedDir, destination);
  }

  async getCommitForRef(url: string, ref: string): Promise<string | null> {
    const refs = await this.readRefs(url);
    return refs.refs[ref]?.commit ?? null;
  }

  async cacheRefCommit(url: string, ref: string, commit: string): Promise<void> {
    const refs = await this.readRefs(url);
    refs.refs[ref] = { commit, fetchedAt: new Date().toISOString() };
    await writeTextFile(join(this.repoDir(url), REFS_FILE), JSON.stringify(refs, null, 2));
    logger.debug(`Cached git ref ${ref} -> ${commit.substring(0, 7)}`, { url });
  }

  private async readRefs(url: string): Promise<RefCacheFile> {
    const refsPath = join(this.repoDir(url), REFS_FILE);
    if (!(await exists(refsPath))) {
      return { refs: {} };
    }
    try {
      const parsed: unknown = JSON.parse(await readTextFile(refsPath));
      return parseRefs(parsed);
    } catch (error) {
      logger.warn(`Failed to read ref cache at ${refsPath}`, { error });
      return { refs: {} };
    }
  }

  /**
   * List every cached entry across all repositories
   */
  async listEntries(): Promise<SourceCacheEntry[]> {
    if (!(await exists(this.root))) {
      return [];
    }

    const entries: SourceCacheEntry[] = [];
    for (const repoHash of await readdir(this.root)) {
      const repoDir = join(this.root, repoHash);
      let items: string[];
      try {
        items = await readdir(repoDir);
      } catch {
        // not a directory
        continue;
      }
      for (const item of items) {
        if (!item.endsWith('.json') || item === REFS_FILE) {
          continue;
        }
        const metadataPath = join(repoDir, item);
        const metadata = await this.readMetadata(metadataPath);
        if (metadata) {
          entries.push({ path: metadataPath.slice(0, -'.json'.length), metadataPath, metadata });
        }
      }
    }
    return entries;
  }

  /**
   * Evict least recently accessed entries until the cache fits in its size
   * budget. `keep` is never evicted.
   */
  async prune(keep?: string): Promise<string[]> {
    const entries = await this.listEntries();
    const sized = await Promise.all(
      entries.map(async entry => ({ entry, size: await getDirectorySize(entry.path) }))
    );

    let total = sized.reduce((sum, item) => sum + item.size, 0);
    const budget = this.maxSizeMB * BYTES_PER_MB;
    const evicted: string[] = [];

    const candidates = sized
      .filter(item => item.entry.path !== keep)
      .sort((a, b) => a.entry.metadata.lastAccessed.localeCompare(b.entry.metadata.lastAccessed));

    for (const { entry, size } of candidates) {
      if (total <= budget) {
        break;
      }
      await remove(entry.path);
      await remove(entry.metadataPath);
      total -= size;
      evicted.push(entry.path);
      logger.debug(`Evicted cached source ${entry.metadata.url}@${entry.metadata.commit.substring(0, 7)}`);
    }

    return evicted;
  }
}

function parseMetadata(data: unknown): SourceCacheMetadata | null {
  if (!isRecordObject(data)) return null;
  const { url, commit, ref, cachedAt, lastAccessed } = data;
  if (typeof url !== 'string' || typeof commit !== 'string' || typeof cachedAt !== 'string' || typeof lastAccessed !== 'string') {
    return null;
  }
  return { url, commit, ...(typeof ref === 'string' ? { ref } : {}), cachedAt, lastAccessed };
}

function parseRefs(data: unknown): RefCacheFile {
  const result: RefCacheFile = { refs: {} };
  if (!isRecordObject(data) || !isRecordObject(data.refs)) return result;

  for (const [ref, entry] of Object.entries(data.refs)) {
    if (!isRecordObject(entry)) continue;
    const { commit, fetchedAt } = entry;
    if (typeof commit === 'string' && typeof fetchedAt === 'string') {
      result.refs[ref] = { commit, fetchedAt };
    }
  }
  return result;
}
