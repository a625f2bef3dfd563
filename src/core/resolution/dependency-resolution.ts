/**
 * Dependency resolution entry point
 *
 * Normalizes a module descriptor into frozen resolution parameters, runs the
 * resolve/fetch/assemble pipeline against the injected engine and fetcher,
 * and translates a resolve failure into an UnresolvedWarning (or throws it).
 */

import type {
  ConfigurationDef,
  Logger,
  ModuleDescriptor,
  ModuleSettings,
  PlatformJarOverrides,
  ResolutionConfiguration,
  ResolutionDefaults,
  ResolutionParams,
  Result,
  UnresolvedWarning,
  UnresolvedWarningConfiguration,
  UpdateConfiguration,
  UpdateReport
} from '../../types/index.js';
import { err, ok } from '../../types/index.js';
import type { ArtifactFetcher } from '../ports/artifact-fetcher.js';
import type { ReportBuilder } from '../ports/report-builder.js';
import type { ResolverEngine } from '../ports/resolver-engine.js';
import { configExtends, configurationClosures, configurationGraphs } from './config-graph.js';
import { createPipelineContext } from './context.js';
import { unresolvedWarningOrThrow } from './failure-translator.js';
import { normalizeInputs } from './normalizer.js';
import { runResolutionPipeline } from './pipeline.js';
import { defaultReportBuilder } from './report-builder.js';
import { assembleRepositories } from './repositories.js';

export interface DependencyResolutionOptions {
  engine: ResolverEngine;
  fetcher: ArtifactFetcher;
  reportBuilder?: ReportBuilder;
}

export interface PreparedRequest {
  params: ResolutionParams;
  configs: Map<string, Set<string>>;
  platformJarOverrides: PlatformJarOverrides;
}

/**
 * Declared configurations plus any configuration a dependency is scoped to
 * without being declared.
 */
function effectiveConfigurations(settings: ModuleSettings, scopes: Iterable<string>): ConfigurationDef[] {
  const declared = new Set(settings.configurations.map(c => c.name));
  const extra: ConfigurationDef[] = [];
  for (const scope of scopes) {
    if (!declared.has(scope)) {
      declared.add(scope);
      extra.push({ name: scope, extends: [] });
    }
  }
  return [...settings.configurations, ...extra];
}

export class DependencyResolution {
  private readonly conf: ResolutionConfiguration;
  private readonly defaults: ResolutionDefaults;
  private readonly engine: ResolverEngine;
  private readonly fetcher: ArtifactFetcher;
  private readonly reportBuilder: ReportBuilder;

  constructor(conf: ResolutionConfiguration, defaults: ResolutionDefaults, options: DependencyResolutionOptions) {
    this.conf = conf;
    this.defaults = defaults;
    this.engine = options.engine;
    this.fetcher = options.fetcher;
    this.reportBuilder = options.reportBuilder ?? defaultReportBuilder;
  }

  describe(settings: ModuleSettings): ModuleDescriptor {
    return { kind: 'native', settings };
  }

  /**
   * Build the immutable request for one update call.
   */
  prepareRequest(descriptor: ModuleDescriptor, updateConfig: UpdateConfiguration, logger: Logger): PreparedRequest {
    const { conf, defaults } = this;
    const inputs = normalizeInputs(descriptor, conf, defaults);

    const extendsMap = configExtends(
      effectiveConfigurations(inputs.settings, inputs.dependencies.map(entry => entry.configuration)),
      logger
    );

    const repositories = assembleRepositories(
      {
        resolvers: inputs.resolvers,
        authenticationByRepositoryId: conf.authenticationByRepositoryId,
        authenticationByHost: conf.authenticationByHost,
        toolBinaryVersion: defaults.toolBinaryVersion,
        globalBase: defaults.globalBase,
        interProjectDependencies: conf.interProjectDependencies
      },
      logger
    );

    const { forced, ...platform } = inputs.platform;

    const params: ResolutionParams = Object.freeze({
      dependencies: Object.freeze(inputs.dependencies),
      fallbackDependencies: Object.freeze([...conf.fallbackDependencies]),
      configGraphs: Object.freeze(configurationGraphs(extendsMap)),
      autoPlatformLibrary: conf.autoPlatformLibrary,
      mainRepositories: Object.freeze(repositories.main),
      internalRepositories: Object.freeze(repositories.internal),
      interProjectDependencies: Object.freeze([...conf.interProjectDependencies]),
      userEnabledProfiles: Object.freeze([...conf.mavenProfiles]),
      forcedPlatformOrganization: forced,
      defaultPlatformOrganization: defaults.platformOrganization,
      platform: Object.freeze(platform),
      exclusions: Object.freeze(inputs.exclusions),
      classifiers: inputs.classifiers === null ? null : Object.freeze(inputs.classifiers),
      parallelDownloads: conf.parallelDownloads,
      maxIterations: conf.maxIterations,
      cacheDir: conf.cacheDir ?? defaults.cacheDir,
      cachePolicies: Object.freeze(updateConfig.offline ? ['local-only' as const] : [...defaults.cachePolicies]),
      ttlMs: defaults.ttlMs,
      checksums: Object.freeze([...defaults.checksums])
    });

    return {
      params,
      configs: configurationClosures(extendsMap),
      platformJarOverrides: {
        organization: conf.toolPlatformOrganization ?? defaults.platformOrganization,
        version: conf.toolPlatformVersion ?? platform.version,
        jars: { ...conf.toolPlatformJars }
      }
    };
  }

  /**
   * Resolve, fetch and report. A metadata download failure comes back as a
   * warning; any other resolution failure is thrown.
   */
  async update(
    descriptor: ModuleDescriptor,
    updateConfig: UpdateConfiguration,
    warningConfig: UnresolvedWarningConfiguration,
    logger: Logger
  ): Promise<Result<UpdateReport, UnresolvedWarning>> {
    const prepared = this.prepareRequest(descriptor, updateConfig, logger);
    logger.debug(
      `Resolving ${prepared.params.dependencies.length} dependency entries in ${prepared.params.configGraphs.length} configuration set(s)`
    );

    const ctx = createPipelineContext({
      ...prepared,
      collaborators: {
        engine: this.engine,
        fetcher: this.fetcher,
        reportBuilder: this.reportBuilder
      },
      logger
    });

    const outcome = await runResolutionPipeline(ctx);
    if (outcome.ok) {
      return ok(outcome.data);
    }
    return err(unresolvedWarningOrThrow(warningConfig, outcome.error));
  }
}
