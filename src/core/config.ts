import { join } from 'path';
import type {
  CachePolicy,
  DepweaveConfig,
  DepweaveDirectories,
  ResolutionConfiguration,
  ResolutionDefaults
} from '../types/index.js';
import { readJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getDepweaveDirectories, getArtifactCacheDir, getGlobalBaseDir } from './directory.js';
import {
  FILE_PATTERNS,
  DEFAULT_PLATFORM_ORGANIZATION,
  DEFAULT_TOOLCHAIN_PLATFORM_VERSION,
  TOOL_BINARY_VERSION,
  FAST_REPOSITORY_PREFIXES,
  SLOW_REPOSITORY_PREFIXES,
  DEFAULT_CHECKSUMS,
  METADATA_TTL_MS,
  DEFAULT_PARALLEL_DOWNLOADS,
  DEFAULT_MAX_ITERATIONS
} from '../constants/index.js';

/**
 * Configuration management for depweave
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const CACHE_POLICIES: ReadonlyArray<CachePolicy> = [
  'local-only',
  'local-update-changing',
  'local-update',
  'update-changing',
  'update',
  'fetch-missing',
  'force-download'
];

export const DEFAULT_CACHE_POLICIES: ReadonlyArray<CachePolicy> = ['local-update-changing', 'fetch-missing'];

// Default configuration values
const DEFAULT_CONFIG: DepweaveConfig = {
  parallelDownloads: DEFAULT_PARALLEL_DOWNLOADS,
  maxIterations: DEFAULT_MAX_ITERATIONS,
  reorderResolvers: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isCachePolicy(value: unknown): value is CachePolicy {
  return typeof value === 'string' && CACHE_POLICIES.some(policy => policy === value);
}

function optionalPositiveInt(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Config field '${key}' must be a positive integer`);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config field '${key}' must be a string`);
  }
  return value;
}

function parseDefaultsSection(raw: unknown): DepweaveConfig['defaults'] {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    throw new ConfigError(`Config field 'defaults' must be an object`);
  }

  const defaults: NonNullable<DepweaveConfig['defaults']> = {};

  const ttl = raw.ttlMs;
  if (ttl === null) {
    defaults.ttlMs = null;
  } else if (typeof ttl === 'number' && ttl >= 0) {
    defaults.ttlMs = ttl;
  } else if (ttl !== undefined) {
    throw new ConfigError(`Config field 'defaults.ttlMs' must be a non-negative number or null`);
  }

  for (const key of ['checksums', 'fastRepositoryPrefixes', 'slowRepositoryPrefixes'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isStringArray(value)) {
      throw new ConfigError(`Config field 'defaults.${key}' must be an array of strings`);
    }
    defaults[key] = value;
  }

  if (raw.cachePolicies !== undefined) {
    const policies = raw.cachePolicies;
    if (!Array.isArray(policies) || !policies.every(isCachePolicy)) {
      throw new ConfigError(`Config field 'defaults.cachePolicies' must list known cache policies: ${CACHE_POLICIES.join(', ')}`);
    }
    defaults.cachePolicies = policies;
  }

  for (const key of ['platformOrganization', 'toolchainPlatformVersion', 'toolBinaryVersion', 'globalBase'] as const) {
    const value = optionalString(raw, key);
    if (value !== undefined) {
      defaults[key] = value;
    }
  }

  return defaults;
}

/**
 * Validate a parsed config document
 */
export function parseConfig(raw: unknown): DepweaveConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration structure');
  }

  const reorder = raw.reorderResolvers;
  if (reorder !== undefined && typeof reorder !== 'boolean') {
    throw new ConfigError(`Config field 'reorderResolvers' must be a boolean`);
  }

  return {
    defaults: parseDefaultsSection(raw.defaults),
    cacheDir: optionalString(raw, 'cacheDir'),
    parallelDownloads: optionalPositiveInt(raw, 'parallelDownloads'),
    maxIterations: optionalPositiveInt(raw, 'maxIterations'),
    reorderResolvers: reorder
  };
}

export class ConfigManager {
  private config: DepweaveConfig | null = null;
  private configPath: string | null = null;
  private readonly dirs: DepweaveDirectories;

  constructor(dirs: DepweaveDirectories = getDepweaveDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<DepweaveConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      this.configPath = join(this.dirs.config, FILE_PATTERNS.CONFIG_JSONC);
      await writeJsoncFile(this.configPath, this.config);
      return this.config;
    }

    try {
      logger.debug(`Loading config from: ${configPath}`);
      const fileConfig = parseConfig(await readJsoncFile(configPath));
      this.configPath = configPath;
      this.config = {
        ...DEFAULT_CONFIG,
        ...stripUndefined(fileConfig),
        defaults: {
          ...DEFAULT_CONFIG.defaults,
          ...(fileConfig.defaults ?? {})
        }
      };
      return this.config;
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Get the configuration file path in use, once loaded
   */
  getConfigFilePath(): string | null {
    return this.configPath;
  }

  getDirectories(): DepweaveDirectories {
    return this.dirs;
  }
}

function stripUndefined(config: DepweaveConfig): DepweaveConfig {
  const result: DepweaveConfig = {};
  if (config.cacheDir !== undefined) result.cacheDir = config.cacheDir;
  if (config.parallelDownloads !== undefined) result.parallelDownloads = config.parallelDownloads;
  if (config.maxIterations !== undefined) result.maxIterations = config.maxIterations;
  if (config.reorderResolvers !== undefined) result.reorderResolvers = config.reorderResolvers;
  return result;
}

/**
 * Build the explicit defaults object resolution runs against.
 */
export function createResolutionDefaults(
  dirs: DepweaveDirectories,
  config: DepweaveConfig = {}
): ResolutionDefaults {
  const overrides = config.defaults ?? {};
  return {
    cacheDir: config.cacheDir ?? getArtifactCacheDir(dirs.cache),
    ttlMs: overrides.ttlMs !== undefined ? overrides.ttlMs : METADATA_TTL_MS,
    checksums: overrides.checksums ?? [...DEFAULT_CHECKSUMS],
    cachePolicies: overrides.cachePolicies ?? [...DEFAULT_CACHE_POLICIES],
    platformOrganization: overrides.platformOrganization ?? DEFAULT_PLATFORM_ORGANIZATION,
    toolchainPlatformVersion: overrides.toolchainPlatformVersion ?? DEFAULT_TOOLCHAIN_PLATFORM_VERSION,
    toolBinaryVersion: overrides.toolBinaryVersion ?? TOOL_BINARY_VERSION,
    globalBase: overrides.globalBase ?? getGlobalBaseDir(dirs),
    fastRepositoryPrefixes: overrides.fastRepositoryPrefixes ?? [...FAST_REPOSITORY_PREFIXES],
    slowRepositoryPrefixes: overrides.slowRepositoryPrefixes ?? [...SLOW_REPOSITORY_PREFIXES]
  };
}

/**
 * Fill in a resolution configuration from partial caller input.
 */
export function createResolutionConfiguration(
  overrides: Partial<ResolutionConfiguration> = {}
): ResolutionConfiguration {
  return {
    resolvers: [],
    reorderResolvers: true,
    parallelDownloads: DEFAULT_PARALLEL_DOWNLOADS,
    maxIterations: DEFAULT_MAX_ITERATIONS,
    toolPlatformJars: {},
    interProjectDependencies: [],
    excludeDependencies: [],
    fallbackDependencies: [],
    autoPlatformLibrary: true,
    hasClassifiers: false,
    classifiers: [],
    mavenProfiles: [],
    authenticationByRepositoryId: {},
    authenticationByHost: {},
    ...overrides
  };
}
