import { join } from 'path';
import { SandkitConfig, SandkitDirectories, InstallerConfig } from '../types/index.js';
import { DEFAULT_MAX_CACHE_SIZE_MB } from '../constants/index.js';
import { readJsonOrJsoncFile, writeJsonFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { isRecordObject } from '../utils/guards.js';
import { getSandkitDirectories, getDefaultSourceCacheDir, getDefaultDocsDir } from './directory.js';

/**
 * Configuration management for sandkit
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];
const DEFAULT_CONFIG_FILE = 'config.jsonc';

const BOOLEAN_KEYS = ['clean', 'generateDocs', 'docInstall', 'aggressiveCache', 'integrateTargets', 'keepGoing'] as const;
const STRING_KEYS = ['cacheRoot', 'docsRoot'] as const;

// Default configuration values written on first use
const DEFAULT_CONFIG: SandkitConfig = {
  clean: true,
  generateDocs: false,
  docInstall: false,
  aggressiveCache: false,
  integrateTargets: true,
  maxCacheSizeMB: DEFAULT_MAX_CACHE_SIZE_MB,
  keepGoing: false
};

/**
 * Validate a parsed config document, keeping only known keys
 */
export function sanitizeConfig(data: unknown, source: string): SandkitConfig {
  if (!isRecordObject(data)) {
    throw new ConfigError(`Invalid configuration structure in ${source}`);
  }

  const raw = data;
  const config: SandkitConfig = {};

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new ConfigError(`Configuration key '${key}' must be a boolean (in ${source})`);
    }
    config[key] = value;
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new ConfigError(`Configuration key '${key}' must be a non-empty string (in ${source})`);
    }
    config[key] = value;
  }

  const maxCache = raw.maxCacheSizeMB;
  if (maxCache !== undefined) {
    if (typeof maxCache !== 'number' || !Number.isFinite(maxCache) || maxCache < 0) {
      throw new ConfigError(`Configuration key 'maxCacheSizeMB' must be a non-negative number (in ${source})`);
    }
    config.maxCacheSizeMB = maxCache;
  }

  return config;
}

class ConfigManager {
  private config: SandkitConfig | null = null;
  private configPath: string | null = null;
  private sandkitDirs: SandkitDirectories;

  constructor(directories: SandkitDirectories = getSandkitDirectories()) {
    this.sandkitDirs = directories;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.sandkitDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<SandkitConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      let parsed: unknown;
      try {
        parsed = await readJsonOrJsoncFile(configPath);
      } catch (error) {
        logger.error('Failed to load configuration', { error });
        throw new ConfigError(`Failed to load configuration from ${configPath}`, { error });
      }
      this.configPath = configPath;
      this.config = { ...DEFAULT_CONFIG, ...sanitizeConfig(parsed, configPath) };
    } else {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      await this.save();
    }

    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = this.configPath ?? join(this.sandkitDirs.config, DEFAULT_CONFIG_FILE);
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsonFile(configPath, this.config);
      this.configPath = configPath;
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration to ${configPath}`, { error });
    }
  }
}

/**
 * Per-run overrides coming from the command line
 */
export type InstallerConfigOverrides = Partial<Omit<InstallerConfig, 'cacheRoot' | 'docsRoot'>>;

/**
 * Merge the file configuration with command-line overrides into the
 * immutable configuration of one pipeline run
 */
export function resolveInstallerConfig(
  fileConfig: SandkitConfig = {},
  overrides: InstallerConfigOverrides = {}
): InstallerConfig {
  return Object.freeze({
    clean: overrides.clean ?? fileConfig.clean ?? true,
    generateDocs: overrides.generateDocs ?? fileConfig.generateDocs ?? false,
    docInstall: overrides.docInstall ?? fileConfig.docInstall ?? false,
    aggressiveCache: overrides.aggressiveCache ?? fileConfig.aggressiveCache ?? false,
    integrateTargets: overrides.integrateTargets ?? fileConfig.integrateTargets ?? true,
    keepGoing: overrides.keepGoing ?? fileConfig.keepGoing ?? false,
    maxCacheSizeMB: overrides.maxCacheSizeMB ?? fileConfig.maxCacheSizeMB ?? DEFAULT_MAX_CACHE_SIZE_MB,
    cacheRoot: fileConfig.cacheRoot ?? getDefaultSourceCacheDir(),
    docsRoot: fileConfig.docsRoot ?? getDefaultDocsDir()
  });
}

export const configManager = new ConfigManager();
