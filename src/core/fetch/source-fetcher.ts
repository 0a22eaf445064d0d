import type { GitCheckout, SourceDescriptor } from '../../types/index.js';

export interface FetchOptions {
  /** Fetch the branch tip instead of a pinned revision */
  headMode: boolean;
  cacheRoot: string;
  maxCacheSizeMB: number;
  /** Trust cached tag -> commit mappings and skip the network when possible */
  aggressiveCache: boolean;
}

export interface FetchResult {
  /**
   * Set when the fetch resolved to a more specific revision than requested
   * (a branch or head fetch resolved to a commit)
   */
  resolvedRevision?: GitCheckout;
}

/**
 * Retrieves a package's source tree into `destinationRoot`, which does not
 * exist yet when `fetch` is called. Implementations must leave nothing behind
 * on failure.
 */
export interface SourceFetcher {
  fetch(source: SourceDescriptor, destinationRoot: string, options: FetchOptions): Promise<FetchResult>;
}
