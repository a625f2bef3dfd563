import type {
  MetadataDownloadError,
  ResolutionError,
  ResolvedConfigurationSet,
  Result
} from '../../../types/index.js';
import { err, ok } from '../../../types/index.js';
import { runWithConcurrency } from '../../../utils/concurrency-pool.js';
import { configurationSetKey, dependenciesForSet } from '../config-graph.js';
import type { ResolutionPipelineContext } from '../context.js';

/**
 * Combine the failures of several configuration sets into one error.
 * Metadata download bundles merge; any other kind is kept as the failure.
 */
export function combineResolutionErrors(errors: ReadonlyArray<ResolutionError>): ResolutionError {
  const terminal = errors.find(e => e.type !== 'metadata-download-errors');
  if (terminal) {
    return terminal;
  }

  const merged = new Map<string, MetadataDownloadError>();
  for (const error of errors) {
    if (error.type !== 'metadata-download-errors') continue;
    for (const failure of error.errors) {
      const key = `${failure.module.organization}:${failure.module.name}:${failure.version}`;
      if (!merged.has(key)) {
        merged.set(key, failure);
      }
    }
  }
  return { type: 'metadata-download-errors', errors: Array.from(merged.values()) };
}

/**
 * Resolve phase: one engine call per configuration set, bounded by the
 * parallelism setting. Waits for every set before reporting.
 */
export async function resolvePhase(
  ctx: ResolutionPipelineContext
): Promise<Result<ResolvedConfigurationSet[], ResolutionError>> {
  const { params, logger } = ctx;
  const { engine } = ctx.collaborators;

  const tasks = params.configGraphs.map(configurations => async () => {
    logger.debug(`Resolving configuration set [${configurationSetKey(configurations)}]`);
    return engine.resolve(
      {
        params,
        configurations,
        dependencies: dependenciesForSet(params.dependencies, configurations)
      },
      logger
    );
  });

  const { results } = await runWithConcurrency(tasks, params.parallelDownloads);

  const resolved: ResolvedConfigurationSet[] = [];
  const errors: ResolutionError[] = [];

  results.forEach((outcome, index) => {
    const configurations = params.configGraphs[index];
    if (outcome.status === 'rejected') {
      logger.debug(`Engine threw for [${configurationSetKey(configurations)}]`, outcome.error);
      errors.push({ type: 'unknown-exception', cause: outcome.error });
    } else if (!outcome.value.ok) {
      errors.push(outcome.value.error);
    } else {
      resolved.push({ configurations, graph: outcome.value.data });
    }
  });

  if (errors.length > 0) {
    return err(combineResolutionErrors(errors));
  }
  return ok(resolved);
}
