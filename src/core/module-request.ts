/**
 * Builds resolution inputs from a parsed module file and CLI overrides.
 */

import type {
  DepweaveConfig,
  InterProjectModule,
  ModuleSettings,
  PlatformVersion,
  ResolutionConfiguration,
  ResolutionDefaults,
  SourcePosition,
  UnresolvedWarningConfiguration
} from '../types/index.js';
import type { ModuleFile } from '../utils/module-yml.js';
import { createResolutionConfiguration } from './config.js';
import { crossVersionedName, normalizeDependencies, selectPlatform } from './resolution/normalizer.js';
import { moduleIdKey } from './resolution/failure-translator.js';

export interface ResolveOverrides {
  offline?: boolean;
  classifiers?: string[];
  parallelDownloads?: number;
  maxIterations?: number;
  cacheDir?: string;
  reorderResolvers?: boolean;
}

/**
 * Other projects of the build, with their dependencies normalized the same
 * way the root module's are.
 */
export function interProjectModules(
  projects: ReadonlyArray<ModuleSettings>,
  platform: PlatformVersion
): InterProjectModule[] {
  return projects.map(project => ({
    module: { organization: project.module.organization, name: project.module.name, attributes: {} },
    version: project.module.revision,
    dependencies: normalizeDependencies(project.dependencies, platform, []),
    configurations: project.configurations
  }));
}

/**
 * Resolution configuration for a module file. CLI overrides win over the
 * module file, which wins over the user config.
 */
export function resolutionConfigurationFor(
  moduleFile: ModuleFile,
  config: DepweaveConfig,
  defaults: ResolutionDefaults,
  overrides: ResolveOverrides = {}
): ResolutionConfiguration {
  const classifiers = overrides.classifiers ?? moduleFile.classifiers;
  const base = createResolutionConfiguration({
    resolvers: moduleFile.resolvers,
    reorderResolvers: overrides.reorderResolvers ?? config.reorderResolvers ?? true,
    excludeDependencies: moduleFile.excludeDependencies,
    fallbackDependencies: moduleFile.fallbackDependencies,
    hasClassifiers: classifiers !== undefined,
    classifiers: classifiers ?? [],
    mavenProfiles: moduleFile.profiles ?? [],
    authenticationByRepositoryId: moduleFile.authenticationByRepositoryId,
    authenticationByHost: moduleFile.authenticationByHost
  });

  if (moduleFile.autoPlatformLibrary !== undefined) base.autoPlatformLibrary = moduleFile.autoPlatformLibrary;
  const parallelDownloads = overrides.parallelDownloads ?? config.parallelDownloads;
  if (parallelDownloads !== undefined) base.parallelDownloads = parallelDownloads;
  const maxIterations = overrides.maxIterations ?? config.maxIterations;
  if (maxIterations !== undefined) base.maxIterations = maxIterations;
  if (overrides.cacheDir !== undefined) base.cacheDir = overrides.cacheDir;

  const platform = selectPlatform(moduleFile.settings, base, defaults);
  base.interProjectDependencies = interProjectModules(moduleFile.projects, platform);
  return base;
}

/**
 * Where each declared dependency lives in the module file, keyed by the
 * module id the engine reports failures under.
 */
export function warningConfigurationFor(
  moduleFile: ModuleFile,
  platform: PlatformVersion
): UnresolvedWarningConfiguration {
  const modulePositions = new Map<string, SourcePosition>();

  moduleFile.settings.dependencies.forEach((dependency, index) => {
    const line = moduleFile.dependencyLines[index];
    const key = moduleIdKey({
      organization: dependency.organization,
      name: crossVersionedName(dependency, platform),
      revision: dependency.revision
    });
    if (!modulePositions.has(key)) {
      modulePositions.set(key, line !== undefined ? { path: moduleFile.path, line } : { path: moduleFile.path });
    }
  });

  return { modulePositions };
}
