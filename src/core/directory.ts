import * as os from 'os';
import * as path from 'path';
import { SandkitDirectories } from '../types/index.js';
import { DIR_PATTERNS, SANDKIT_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Get sandkit directories using the dotfile convention (~/.sandkit on all
 * platforms). SANDKIT_HOME overrides the location.
 */
export function getSandkitDirectories(): SandkitDirectories {
  const sandkitDir = process.env.SANDKIT_HOME ?? path.join(os.homedir(), DIR_PATTERNS.SANDKIT);

  return {
    config: sandkitDir,
    data: sandkitDir,
    cache: path.join(sandkitDir, SANDKIT_DIRS.CACHE),
    runtime: path.join(os.tmpdir(), 'sandkit')
  };
}

/**
 * Default root of the remote source cache: ~/.sandkit/cache/sources
 */
export function getDefaultSourceCacheDir(): string {
  return path.join(getSandkitDirectories().cache, SANDKIT_DIRS.SOURCES);
}

/**
 * Default root for installed documentation: ~/.sandkit/docs
 */
export function getDefaultDocsDir(): string {
  return path.join(getSandkitDirectories().data, SANDKIT_DIRS.DOCS);
}

/**
 * Ensure all sandkit directories exist
 */
export async function ensureSandkitDirectories(): Promise<SandkitDirectories> {
  const dirs = getSandkitDirectories();

  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.data),
      ensureDir(dirs.cache),
      ensureDir(dirs.runtime)
    ]);

    logger.debug('sandkit directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create sandkit directories', { error, directories: dirs });
    throw error;
  }
}
