/**
 * depweave - programmatic API
 *
 * Resolution has no terminal dependencies: engines, fetchers and report
 * builders are injected, and all logging goes through the Logger passed in.
 * The CLI in index.ts is one consumer of this surface.
 */

// ============================================================================
// Ports
// ============================================================================

export type { OutputPort, UnifiedSpinner, ResolverEngine, ArtifactFetcher, ReportBuilder } from './core/ports/index.js';
export { consoleOutput, resolveOutput } from './core/ports/index.js';

// ============================================================================
// Resolution
// ============================================================================

export * from './core/resolution/index.js';
export { createResolutionConfiguration, createResolutionDefaults, ConfigManager } from './core/config.js';
export { resolutionConfigurationFor, warningConfigurationFor } from './core/module-request.js';
export type { ResolveOverrides } from './core/module-request.js';

// ============================================================================
// Default engine and fetcher
// ============================================================================

export * from './core/engine/index.js';

// ============================================================================
// Types, errors, utilities
// ============================================================================

export * from './types/index.js';
export {
  UnsupportedDescriptorError,
  ResolveException,
  ResolutionFailedError,
  InvalidModuleFileError,
  ConfigError
} from './utils/errors.js';
export { parseModuleFile, parseModuleFileContent } from './utils/module-yml.js';
export type { ModuleFile } from './utils/module-yml.js';
export { ConsoleLogger, silentLogger } from './utils/logger.js';
