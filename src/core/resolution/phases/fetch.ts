import type { ArtifactMap, ArtifactsParams, FileError, ResolvedConfigurationSet, Result } from '../../../types/index.js';
import { collectArtifacts } from '../artifacts.js';
import type { ResolutionPipelineContext } from '../context.js';

export function artifactsParams(
  ctx: ResolutionPipelineContext,
  resolutions: ReadonlyArray<ResolvedConfigurationSet>
): ArtifactsParams {
  const { params } = ctx;
  return {
    graphs: resolutions.map(r => r.graph),
    classifiers: params.classifiers,
    parallelDownloads: params.parallelDownloads,
    cacheDir: params.cacheDir,
    cachePolicies: params.cachePolicies,
    ttlMs: params.ttlMs,
    checksums: params.checksums
  };
}

/**
 * Fetch phase: a single fetcher call over every resolved graph. A fetcher
 * that throws marks every selected artifact as failed instead of aborting.
 */
export async function fetchPhase(
  ctx: ResolutionPipelineContext,
  resolutions: ReadonlyArray<ResolvedConfigurationSet>
): Promise<ArtifactMap> {
  const fetchParams = artifactsParams(ctx, resolutions);

  try {
    return await ctx.collaborators.fetcher.fetch(fetchParams, ctx.logger);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    ctx.logger.error(`Artifact fetcher failed: ${reason}`);
    const failed = new Map<string, Result<string, FileError>>();
    for (const artifact of collectArtifacts(fetchParams.graphs, fetchParams.classifiers)) {
      failed.set(artifact.url, { ok: false, error: { type: 'download-error', reason } });
    }
    return failed;
  }
}
