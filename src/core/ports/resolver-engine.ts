/**
 * Resolver Engine Port
 *
 * Turns the dependencies of one configuration set into a resolved graph.
 * Conflict solving, metadata caching and repository access all live behind
 * this interface; the pipeline only supplies parameters and reads results.
 *
 * Implementations:
 *   - DirectoryResolverEngine: local directory repositories + inter-project modules
 *   - test doubles recording calls
 */

import type {
  ConfigurationSetRequest,
  Logger,
  ResolutionError,
  ResolvedGraph,
  Result
} from '../../types/index.js';

export interface ResolverEngine {
  /**
   * Resolve one configuration set. Expected failures come back as a
   * ResolutionError; a thrown error is reported as an unknown exception.
   */
  resolve(request: ConfigurationSetRequest, logger: Logger): Promise<Result<ResolvedGraph, ResolutionError>>;
}
