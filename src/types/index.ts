/**
 * Common types and interfaces for the sandkit application
 */

export * from './sandbox.js';

// Core application types
export interface SandkitDirectories {
  config: string;
  data: string;
  cache: string;
  runtime: string;
}

/**
 * Shape of ~/.sandkit/config.jsonc. Every key is optional; missing keys fall
 * back to the installer defaults.
 */
export interface SandkitConfig {
  clean?: boolean;
  generateDocs?: boolean;
  docInstall?: boolean;
  aggressiveCache?: boolean;
  integrateTargets?: boolean;
  maxCacheSizeMB?: number;
  keepGoing?: boolean;
  cacheRoot?: string;
  docsRoot?: string;
}

/**
 * Configuration for a single pipeline run. Built once at command entry and
 * never mutated afterwards.
 */
export interface InstallerConfig {
  readonly clean: boolean;
  readonly generateDocs: boolean;
  readonly docInstall: boolean;
  readonly aggressiveCache: boolean;
  readonly integrateTargets: boolean;
  readonly maxCacheSizeMB: number;
  readonly keepGoing: boolean;
  readonly cacheRoot: string;
  readonly docsRoot: string;
}

// Command option types

export interface InstallOptions {
  projectDir?: string;
  clean?: boolean;
  docs?: boolean;
  integrate?: boolean;
  keepGoing?: boolean;
  verbose?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class SandkitError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SandkitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  FETCH_ERROR = 'FETCH_ERROR',
  HOOK_ERROR = 'HOOK_ERROR',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  CLEANUP_ERROR = 'CLEANUP_ERROR',
  PHASE_ERROR = 'PHASE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
