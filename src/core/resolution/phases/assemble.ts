import type { ArtifactMap, ResolvedConfigurationSet, UpdateReport } from '../../../types/index.js';
import type { ResolutionPipelineContext } from '../context.js';

/**
 * Assemble phase: hand everything gathered so far to the report builder.
 */
export function assemblePhase(
  ctx: ResolutionPipelineContext,
  resolutions: ReadonlyArray<ResolvedConfigurationSet>,
  artifacts: ArtifactMap
): UpdateReport {
  const { params } = ctx;
  return ctx.collaborators.reportBuilder.build(
    {
      dependencies: params.dependencies,
      configs: ctx.configs,
      resolutions,
      artifacts,
      classifiers: params.classifiers,
      platformJarOverrides: ctx.platformJarOverrides,
      cacheDir: params.cacheDir
    },
    ctx.logger
  );
}
