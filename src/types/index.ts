/**
 * Core types shared across the depweave CLI and resolution core
 */

export * from './module.js';
export * from './repository.js';
export * from './resolution.js';
export * from './result.js';

import type { CachePolicy } from './resolution.js';

export interface DepweaveDirectories {
  config: string;
  data: string;
  cache: string;
  runtime: string;
}

/**
 * Process-wide fallbacks, supplied once at construction and passed down.
 * Resolution reads no ambient state beyond this object.
 */
export interface ResolutionDefaults {
  cacheDir: string;
  ttlMs: number | null;
  checksums: string[];
  cachePolicies: CachePolicy[];
  platformOrganization: string;
  toolchainPlatformVersion: string;
  toolBinaryVersion: string;
  /** Base directory of globally installed build plugins */
  globalBase: string;
  fastRepositoryPrefixes: string[];
  slowRepositoryPrefixes: string[];
}

export interface DepweaveConfig {
  defaults?: Partial<Omit<ResolutionDefaults, 'cacheDir'>>;
  cacheDir?: string;
  parallelDownloads?: number;
  maxIterations?: number;
  reorderResolvers?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DepweaveError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'DepweaveError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNSUPPORTED_DESCRIPTOR = 'UNSUPPORTED_DESCRIPTOR',
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  UNRESOLVED_DEPENDENCIES = 'UNRESOLVED_DEPENDENCIES',
  INVALID_MODULE_FILE = 'INVALID_MODULE_FILE',
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
