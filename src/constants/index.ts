/**
 * Shared constants for sandkit
 * Single source of truth for directory names, file names and other
 * constants used throughout the application.
 */

export const DIR_PATTERNS = {
  SANDKIT: '.sandkit',
  SANDBOX: 'Packages'
} as const;

export const FILE_PATTERNS = {
  PROJECT_MANIFEST: 'sandkit.yml',
  LOCKFILE: 'sandkit.lock',
  SANDBOX_MANIFEST: 'Manifest.lock',
  PROJECT_FILE: 'Packages.project.json',
  INTEGRATION_FILE: 'sandkit-integration.json',
  YML_FILE: '.yml'
} as const;

/**
 * Directories inside the sandbox root.
 */
export const SANDBOX_DIRS = {
  HEADERS: 'Headers',
  SPECIFICATIONS: 'Specifications',
  TARGET_SUPPORT_FILES: 'Target Support Files',
  DOCUMENTATION: 'Documentation'
} as const;

export const SANDKIT_DIRS = {
  CACHE: 'cache',
  SOURCES: 'sources',
  DOCS: 'docs'
} as const;

/**
 * Groups of the build-file container.
 */
export const PROJECT_GROUPS = {
  PACKAGES: 'Packages',
  LOCAL_PACKAGES: 'Local Packages',
  TARGET_SUPPORT_FILES: 'Targets Support Files',
  MANIFEST: 'Manifest'
} as const;

export const LOCKFILE_VERSION = 1 as const;

export const DEFAULT_MAX_CACHE_SIZE_MB = 500 as const;

export const TARGET_LABEL_PREFIX = 'Packages' as const;

export const DUMMY_CLASS_PREFIX = 'PackagesDummy_' as const;

export const PLATFORMS = ['ios', 'macos', 'tvos', 'watchos'] as const;

/**
 * Files the clean pass always keeps, whatever the package layout says.
 */
export const ALWAYS_KEPT_PATTERNS = ['LICENSE*', 'LICENCE*', 'README*'] as const;
