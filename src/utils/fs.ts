import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname, relative } from 'path';
import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Copy a directory tree. Entries whose name is in `exclude` are skipped at
 * every level.
 */
export async function copyDirectory(src: string, dest: string, exclude: string[] = []): Promise<void> {
  try {
    await fs.cp(src, dest, {
      recursive: true,
      filter: (source: string) => !exclude.some(name => source.split(/[\\/]/).includes(name))
    });
    logger.debug(`Copied directory: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy directory: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Create (or replace) a symbolic link at `linkPath` pointing to `target`
 */
export async function createSymlink(target: string, linkPath: string): Promise<void> {
  try {
    await ensureDir(dirname(linkPath));
    await fs.rm(linkPath, { force: true });
    await fs.symlink(target, linkPath);
    logger.debug(`Linked: ${linkPath} -> ${target}`);
  } catch (error) {
    throw new FileSystemError(`Failed to link ${linkPath} -> ${target}`, { target, linkPath, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.lstat(path);
    if (stats.isDirectory()) {
      await fs.rm(path, { recursive: true });
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Recursively remove empty directories under a root (but not the root itself)
 */
export async function removeEmptyDirectories(root: string): Promise<void> {
  async function recurse(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await recurse(join(dir, entry.name));
      }
    }
    const remaining = await fs.readdir(dir);
    if (remaining.length === 0 && dir !== root) {
      await remove(dir);
    }
  }

  try {
    await recurse(root);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to prune empty directories under: ${root}`, { root, error });
  }
}

export interface WalkOptions {
  /** Skip OS junk files such as .DS_Store (default: true) */
  skipJunk?: boolean;
}

/**
 * Recursively walk through a directory and yield every file as a path
 * relative to `dirPath`, using forward slashes
 */
export async function* walkFiles(dirPath: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const skipJunk = options.skipJunk ?? true;

  async function* walk(current: string): AsyncGenerator<string> {
    let entries;
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      throw new FileSystemError(`Failed to walk directory: ${current}`, { dirPath: current, error });
    }

    for (const entry of entries) {
      if (skipJunk && isJunk(entry.name)) {
        continue;
      }

      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        yield* walk(fullPath);
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        yield relative(dirPath, fullPath).split('\\').join('/');
      }
    }
  }

  yield* walk(dirPath);
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  const content = JSON.stringify(data, null, indent);
  await writeTextFile(path, content + '\n');
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it.
 * The caller is responsible for validating the shape of the result.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (result === undefined || errors.length > 0) {
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, errors });
  }
  return result;
}

/**
 * Rename a directory (or file) from source path to destination path.
 * Ensures the destination parent directory exists and wraps errors consistently.
 */
export async function renameDirectory(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

/**
 * Get the total size of a directory recursively
 */
export async function getDirectorySize(dirPath: string): Promise<number> {
  let totalSize = 0;

  for await (const relPath of walkFiles(dirPath, { skipJunk: false })) {
    try {
      const stats = await fs.lstat(join(dirPath, relPath));
      totalSize += stats.size;
    } catch (error) {
      // Skip files that can't be accessed
      logger.debug(`Failed to get size for file: ${relPath}`, { error });
    }
  }

  return totalSize;
}
