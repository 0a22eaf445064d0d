import { execFile } from 'child_process';
import { join } from 'path';
import { promisify } from 'util';

import type { FetchOptions, FetchResult, SourceFetcher } from './source-fetcher.js';
import type { GitSource, SourceDescriptor } from '../../types/index.js';
import { SourceCache } from './source-cache.js';
import { ValidationError, describeCause } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { isSha } from '../../utils/git-url.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

/**
 * Runs one git command and resolves with its trimmed stdout
 */
export type GitRunner = (args: string[], cwd?: string) => Promise<string>;

export const runGitCommand: GitRunner = async (args, cwd) => {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd });
    return stdout.toString().trim();
  } catch (error) {
    const stderr = typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
    throw new ValidationError(`Git command failed: git ${args.join(' ')}: ${stderr || describeCause(error)}`);
  }
};

/**
 * Fetches git sources with the git CLI, consulting and populating the local
 * source cache.
 */
export class GitFetcher implements SourceFetcher {
  constructor(private readonly runGit: GitRunner = runGitCommand) {}

  async fetch(source: SourceDescriptor, destinationRoot: string, options: FetchOptions): Promise<FetchResult> {
    if (source.type !== 'git') {
      throw new ValidationError(`GitFetcher cannot fetch a ${source.type} source`);
    }

    const cache = new SourceCache(options.cacheRoot, options.maxCacheSizeMB);

    const knownCommit = await this.knownCommit(source, cache, options);
    if (knownCommit) {
      const cached = await withCache(`look up ${source.url}@${knownCommit.substring(0, 7)}`, () =>
        cache.lookup(source.url, knownCommit)
      );
      if (cached) {
        const materialized = await withCache(`copy ${cached}`, async () => {
          await cache.materialize(cached, destinationRoot);
          return true;
        });
        if (materialized) {
          logger.debug(`Materialized ${source.url}@${knownCommit.substring(0, 7)} from the source cache`);
          return {};
        }
        await remove(destinationRoot);
      }
    }

    try {
      await this.clone(source, destinationRoot, options.headMode);
      const commit = await this.runGit(['rev-parse', 'HEAD'], destinationRoot);

      await withCache(`store ${source.url}@${commit.substring(0, 7)}`, async () => {
        const entry = await cache.store(source.url, commit, destinationRoot, source.tag ?? source.branch);
        if (source.tag) {
          await cache.cacheRefCommit(source.url, source.tag, commit);
        }
        await cache.prune(entry);
      });

      await remove(join(destinationRoot, '.git'));

      return isSpecificRequest(source, options.headMode)
        ? {}
        : { resolvedRevision: { git: source.url, commit } };
    } catch (error) {
      await remove(destinationRoot);
      throw error;
    }
  }

  /**
   * The commit this request is pinned to, if it can be known without
   * contacting the remote
   */
  private async knownCommit(source: GitSource, cache: SourceCache, options: FetchOptions): Promise<string | null> {
    if (options.headMode) {
      return null;
    }
    if (source.commit) {
      return source.commit;
    }
    if (source.tag && options.aggressiveCache) {
      const tag = source.tag;
      return (await withCache(`read cached ref ${tag}`, () => cache.getCommitForRef(source.url, tag))) ?? null;
    }
    return null;
  }

  private async clone(source: GitSource, destinationRoot: string, headMode: boolean): Promise<void> {
    const { url } = source;

    if (headMode) {
      const branchArgs = source.branch ? ['--branch', source.branch] : [];
      await this.runGit(['clone', '--depth', '1', ...branchArgs, url, destinationRoot]);
    } else if (source.commit && isSha(source.commit)) {
      // SHA: shallow clone default branch, then fetch the sha
      await this.runGit(['clone', '--depth', '1', url, destinationRoot]);
      await this.runGit(['fetch', '--depth', '1', 'origin', source.commit], destinationRoot);
      await this.runGit(['checkout', source.commit], destinationRoot);
    } else if (source.tag ?? source.branch) {
      const ref = source.tag ?? source.branch;
      await this.runGit(['clone', '--depth', '1', '--branch', String(ref), url, destinationRoot]);
    } else {
      await this.runGit(['clone', '--depth', '1', url, destinationRoot]);
    }

    logger.debug(`Cloned ${url} to ${destinationRoot}`, { headMode });
  }
}

/**
 * Run a source cache operation; a failure is logged and yields undefined
 */
async function withCache<T>(action: string, operation: () => Promise<T>): Promise<T | undefined> {
  try {
    return await operation();
  } catch (error) {
    logger.warn(`Source cache: failed to ${action}; continuing without the cache`, { error });
    return undefined;
  }
}

/**
 * A commit or tag request is already exact; anything else (a branch, the
 * default branch, a head fetch) resolves to a more specific commit.
 */
function isSpecificRequest(source: GitSource, headMode: boolean): boolean {
  return !headMode && Boolean(source.commit ?? source.tag);
}
