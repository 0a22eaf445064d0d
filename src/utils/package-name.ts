import { DUMMY_CLASS_PREFIX, FILE_PATTERNS, SANDBOX_DIRS } from '../constants/index.js';
import { ResolutionError } from './errors.js';

/**
 * Entries of the sandbox root that sandkit generates, lowercased
 */
const RESERVED_SANDBOX_ENTRIES = new Set(
  [...Object.values(SANDBOX_DIRS), FILE_PATTERNS.SANDBOX_MANIFEST, FILE_PATTERNS.PROJECT_FILE].map(entry =>
    entry.toLowerCase()
  )
);

/**
 * Why `name` cannot be used as a single path segment, or undefined when it
 * can
 */
export function pathSegmentProblem(name: string): string | undefined {
  if (name.length === 0) {
    return 'name cannot be empty';
  }
  if (name.trim() !== name) {
    return 'name cannot have leading or trailing spaces';
  }
  if (name === '.' || name === '..') {
    return `'${name}' is not a directory name`;
  }
  if (/[\/\\\u0000]/.test(name)) {
    return 'name cannot contain path separators or NUL';
  }
  return undefined;
}

/**
 * Why `name` cannot name a package directory in the sandbox, or undefined
 * when it can
 */
export function packageNameProblem(name: string): string | undefined {
  const segmentProblem = pathSegmentProblem(name);
  if (segmentProblem) {
    return segmentProblem;
  }
  if (RESERVED_SANDBOX_ENTRIES.has(name.toLowerCase())) {
    return `'${name}' is reserved for generated sandbox files`;
  }
  if (name.startsWith(DUMMY_CLASS_PREFIX)) {
    return `names starting with ${DUMMY_CLASS_PREFIX} are reserved for generated sources`;
  }
  return undefined;
}

/**
 * @throws ResolutionError when the name cannot be used for a package
 */
export function validatePackageName(name: string): void {
  const problem = packageNameProblem(name);
  if (problem) {
    throw new ResolutionError(`Invalid package name '${name}': ${problem}`, { packageName: name });
  }
}
