import { SandkitError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure kinds of an install run.
 * Every fatal error carries the phase and the package and/or target it
 * belongs to in `details`.
 */

export type InstallPhaseName =
  | 'analyze'
  | 'registry'
  | 'decide'
  | 'cleanup'
  | 'install-packages'
  | 'generate-targets'
  | 'write-record'
  | 'integrate';

export class ResolutionError extends SandkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Resolution error: ${message}`, ErrorCodes.RESOLUTION_ERROR, details);
    this.name = 'ResolutionError';
  }
}

export class FetchError extends SandkitError {
  readonly packageName: string;

  constructor(packageName: string, message: string, cause?: unknown) {
    super(`Failed to fetch '${packageName}': ${message}`, ErrorCodes.FETCH_ERROR, {
      phase: 'install-packages',
      packageName,
      cause
    });
    this.name = 'FetchError';
    this.packageName = packageName;
  }
}

export class AggregateFetchError extends SandkitError {
  readonly failures: FetchError[];

  constructor(failures: FetchError[]) {
    const names = failures.map(f => f.packageName).join(', ');
    super(`Failed to fetch ${failures.length} package(s): ${names}`, ErrorCodes.FETCH_ERROR, {
      phase: 'install-packages',
      packageNames: failures.map(f => f.packageName)
    });
    this.name = 'AggregateFetchError';
    this.failures = failures;
  }
}

export interface HookErrorIdentity {
  hook: 'pre-install' | 'post-install';
  packageName?: string;
  targetName?: string;
}

export class HookError extends SandkitError {
  constructor(identity: HookErrorIdentity, cause: unknown) {
    const owner = identity.packageName
      ? `'${identity.packageName}'${identity.targetName ? ` (target '${identity.targetName}')` : ''}`
      : 'project';
    super(`The ${identity.hook} hook of ${owner} failed: ${describeCause(cause)}`, ErrorCodes.HOOK_ERROR, {
      phase: 'generate-targets',
      ...identity,
      cause
    });
    this.name = 'HookError';
  }
}

export class PersistenceError extends SandkitError {
  constructor(location: string, cause: unknown) {
    super(
      `Failed to write installation record to ${location}: ${describeCause(cause)}. ` +
        'Generated files are in place but the record is inconsistent; the next run will not see this installation.',
      ErrorCodes.PERSISTENCE_ERROR,
      { phase: 'write-record', location, cause }
    );
    this.name = 'PersistenceError';
  }
}

/**
 * Non-fatal: raised per removed package and reported as a warning.
 */
export class CleanupError extends SandkitError {
  constructor(packageName: string, path: string, cause: unknown) {
    super(`Failed to remove '${packageName}' at ${path}: ${describeCause(cause)}`, ErrorCodes.CLEANUP_ERROR, {
      phase: 'cleanup',
      packageName,
      path,
      cause
    });
    this.name = 'CleanupError';
  }
}

/**
 * Wraps any non-sandkit error escaping a pipeline phase.
 */
export class PhaseError extends SandkitError {
  constructor(phase: InstallPhaseName, cause: unknown) {
    super(`Install phase '${phase}' failed: ${describeCause(cause)}`, ErrorCodes.PHASE_ERROR, { phase, cause });
    this.name = 'PhaseError';
  }
}

export class FileSystemError extends SandkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends SandkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends SandkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof SandkitError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
