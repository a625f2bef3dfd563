import type { ResolutionError, Result, UpdateReport } from '../../types/index.js';
import { err, ok } from '../../types/index.js';
import type { ResolutionPipelineContext } from './context.js';
import { transition } from './context.js';
import { assemblePhase } from './phases/assemble.js';
import { fetchPhase } from './phases/fetch.js';
import { resolvePhase } from './phases/resolve.js';

/**
 * Run resolve -> fetch -> assemble once. Only a resolve failure stops the
 * pipeline; fetch failures travel inside the report.
 */
export async function runResolutionPipeline(
  ctx: ResolutionPipelineContext
): Promise<Result<UpdateReport, ResolutionError>> {
  const { logger } = ctx;

  transition(ctx, 'resolving');
  let started = Date.now();
  const resolved = await resolvePhase(ctx);
  logger.debug(`Resolve phase took ${Date.now() - started}ms`);

  if (!resolved.ok) {
    transition(ctx, 'failed');
    return err(resolved.error);
  }

  transition(ctx, 'fetching');
  started = Date.now();
  const artifacts = await fetchPhase(ctx, resolved.data);
  logger.debug(`Fetch phase took ${Date.now() - started}ms (${artifacts.size} artifacts)`);

  transition(ctx, 'assembling');
  const report = assemblePhase(ctx, resolved.data, artifacts);

  transition(ctx, 'done');
  return ok(report);
}
