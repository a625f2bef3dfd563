/**
 * Default report builder
 *
 * Builds one configuration report per configuration: the modules reachable
 * from the dependencies declared in the configuration's extends closure,
 * taken from the graph of the configuration set that contains it. Fetch
 * failures stay attached to the artifact they belong to.
 */

import type {
  Artifact,
  ArtifactReport,
  ConfigurationReport,
  Logger,
  ModuleReport,
  PlatformJarOverrides,
  ResolvedGraph,
  ResolvedModule,
  UpdateParams,
  UpdateReport
} from '../../types/index.js';
import type { ReportBuilder } from '../ports/report-builder.js';
import { moduleIdOf } from './failure-translator.js';
import { moduleKey, requestedClassifiers, selectArtifacts } from './artifacts.js';

/**
 * Modules reachable from the given root keys, in graph order.
 */
export function reachableModules(graph: ResolvedGraph, rootKeys: Iterable<string>): ResolvedModule[] {
  const byKey = new Map(graph.modules.map(m => [moduleKey(m.module), m] as const));
  const visited = new Set<string>();
  const pending = Array.from(rootKeys);

  while (pending.length > 0) {
    const key = pending.shift();
    if (key === undefined || visited.has(key)) continue;
    const module = byKey.get(key);
    if (!module) continue;
    visited.add(key);
    pending.push(...module.dependencies);
  }

  return graph.modules.filter(m => visited.has(moduleKey(m.module)));
}

function overrideFile(
  module: ResolvedModule,
  artifact: Artifact,
  overrides: PlatformJarOverrides
): string | null {
  if (artifact.classifier !== '') return null;
  if (module.module.organization !== overrides.organization || module.version !== overrides.version) {
    return null;
  }
  return overrides.jars[module.module.name] ?? null;
}

function artifactReport(
  module: ResolvedModule,
  artifact: Artifact,
  params: UpdateParams,
  logger: Logger
): ArtifactReport {
  const override = overrideFile(module, artifact, params.platformJarOverrides);
  if (override) {
    return { status: 'fetched', artifact, file: override };
  }

  const outcome = params.artifacts.get(artifact.url);
  if (!outcome) {
    logger.debug(`No fetch outcome recorded for ${artifact.url}`);
    return { status: 'failed', artifact, error: { type: 'not-found', file: artifact.url, permanent: false } };
  }
  return outcome.ok
    ? { status: 'fetched', artifact, file: outcome.data }
    : { status: 'failed', artifact, error: outcome.error };
}

export function buildUpdateReport(params: UpdateParams, logger: Logger): UpdateReport {
  const configurations: ConfigurationReport[] = [];
  const moduleKeys = new Set<string>();
  const artifactUrls = new Set<string>();
  const failedUrls = new Set<string>();

  for (const [configuration, closure] of params.configs) {
    const resolution = params.resolutions.find(r => r.configurations.includes(configuration));
    if (!resolution) {
      logger.debug(`Configuration '${configuration}' has no resolution`);
      configurations.push({ configuration, modules: [] });
      continue;
    }

    // Declared roots plus the roots the engine rewrote or added
    const rootKeys = [...params.dependencies, ...resolution.graph.rootDependencies]
      .filter(entry => closure.has(entry.configuration))
      .map(entry => moduleKey(entry.dependency.module));
    const requested = requestedClassifiers(resolution.graph);

    const modules: ModuleReport[] = reachableModules(resolution.graph, rootKeys).map(module => {
      const key = moduleKey(module.module);
      moduleKeys.add(`${key}:${module.version}`);

      const artifacts = selectArtifacts(module, params.classifiers, requested.get(key))
        .map(artifact => artifactReport(module, artifact, params, logger));
      for (const report of artifacts) {
        artifactUrls.add(report.artifact.url);
        if (report.status === 'failed') failedUrls.add(report.artifact.url);
      }

      return {
        module: moduleIdOf(module.module, module.version),
        repositoryId: module.repositoryId,
        artifacts
      };
    });

    configurations.push({ configuration, modules });
  }

  return {
    cacheDir: params.cacheDir,
    configurations,
    stats: {
      modules: moduleKeys.size,
      artifacts: artifactUrls.size,
      failedArtifacts: failedUrls.size
    }
  };
}

export const defaultReportBuilder: ReportBuilder = {
  build: buildUpdateReport
};
