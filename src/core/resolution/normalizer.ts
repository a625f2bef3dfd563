/**
 * Configuration normalizer
 *
 * Derives the canonical resolution inputs from a module descriptor and the
 * resolution configuration: platform triple, dependency entries with
 * cross-versioning applied and exclusions merged, classifier selection and
 * the (optionally reordered) resolver list. Pure; throws only on descriptors
 * it cannot use.
 */

import type {
  DeclaredDependency,
  DependencyEntry,
  ExclusionRule,
  ModuleDescriptor,
  ModuleSettings,
  PlatformVersion,
  ResolutionConfiguration,
  ResolutionDefaults,
  Resolver
} from '../../types/index.js';
import {
  DEFAULT_ARTIFACT_TYPE,
  DEFAULT_CONFIGURATION,
  DEFAULT_TARGET_CONFIGURATION
} from '../../constants/index.js';
import { UnsupportedDescriptorError } from '../../utils/errors.js';
import { reorderResolvers } from './repositories.js';

export interface PlatformSelection extends PlatformVersion {
  /** The organization differs from the default platform organization */
  forced: boolean;
}

export interface NormalizedInputs {
  settings: ModuleSettings;
  platform: PlatformSelection;
  dependencies: DependencyEntry[];
  exclusions: ExclusionRule[];
  classifiers: string[] | null;
  resolvers: Resolver[];
}

function unrecognized(value: never, what: string): never {
  let rendered: string;
  try {
    rendered = JSON.stringify(value) ?? String(value);
  } catch {
    rendered = String(value);
  }
  throw new UnsupportedDescriptorError(`${what} ${rendered}`);
}

/**
 * Extract module settings from a descriptor. Only native descriptors and
 * foreign ones carrying inline settings are usable.
 */
export function unwrapDescriptor(descriptor: ModuleDescriptor): ModuleSettings {
  switch (descriptor.kind) {
    case 'native':
      return descriptor.settings;
    case 'foreign': {
      const moduleSettings = descriptor.moduleSettings;
      switch (moduleSettings.kind) {
        case 'inline':
          return moduleSettings.settings;
        case 'pom-file':
        case 'ivy-file':
          throw new UnsupportedDescriptorError(`${moduleSettings.kind} settings (${moduleSettings.path})`);
        default:
          return unrecognized(moduleSettings, 'module settings');
      }
    }
    default:
      return unrecognized(descriptor, 'descriptor');
  }
}

/**
 * First two dot-separated components of a version: "2.13.12" -> "2.13"
 */
export function binaryVersionOf(fullVersion: string): string {
  return fullVersion.split('.').slice(0, 2).join('.');
}

export function selectPlatform(
  settings: ModuleSettings,
  conf: Pick<ResolutionConfiguration, 'platformOrganization' | 'platformVersion'>,
  defaults: Pick<ResolutionDefaults, 'platformOrganization' | 'toolchainPlatformVersion'>
): PlatformSelection {
  const info = settings.platformInfo;
  const organization = conf.platformOrganization ?? info?.organization ?? defaults.platformOrganization;
  const version = conf.platformVersion ?? info?.fullVersion ?? defaults.toolchainPlatformVersion;
  const binaryVersion = info?.binaryVersion ?? binaryVersionOf(version);

  return {
    organization,
    version,
    binaryVersion,
    forced: organization !== defaults.platformOrganization
  };
}

export function crossVersionedName(dependency: DeclaredDependency, platform: PlatformVersion): string {
  switch (dependency.crossVersion ?? 'disabled') {
    case 'binary':
      return `${dependency.name}_${platform.binaryVersion}`;
    case 'full':
      return `${dependency.name}_${platform.version}`;
    case 'disabled':
      return dependency.name;
  }
}

/**
 * Expand a configuration mapping into (from, to) pairs.
 *
 *   undefined / ""            -> [compile, default(compile)]
 *   "test"                    -> [test, default(compile)]
 *   "test->default"           -> [test, default]
 *   "compile,test->runtime"   -> [compile, runtime], [test, runtime]
 *   "compile;test->test"      -> [compile, default(compile)], [test, test]
 */
export function parseConfigurationMapping(mapping: string | undefined): Array<[string, string]> {
  const parts = (mapping ?? '')
    .split(';')
    .map(part => part.trim())
    .filter(part => part.length > 0);

  if (parts.length === 0) {
    return [[DEFAULT_CONFIGURATION, DEFAULT_TARGET_CONFIGURATION]];
  }

  const pairs: Array<[string, string]> = [];
  for (const part of parts) {
    const arrow = part.indexOf('->');
    const fromPart = arrow >= 0 ? part.slice(0, arrow) : part;
    const toPart = arrow >= 0 ? part.slice(arrow + 2).trim() : '';
    const target = toPart.length > 0 ? toPart : DEFAULT_TARGET_CONFIGURATION;

    for (const from of fromPart.split(',')) {
      const name = from.trim();
      if (name.length > 0) {
        pairs.push([name, target]);
      }
    }
  }
  return pairs;
}

export function exclusionKey(rule: ExclusionRule): string {
  return `${rule.organization}:${rule.name}`;
}

/**
 * Set union of dependency-local and global exclusion rules.
 */
export function mergeExclusions(
  local: ReadonlyArray<ExclusionRule>,
  global: ReadonlyArray<ExclusionRule>
): ExclusionRule[] {
  const merged = new Map<string, ExclusionRule>();
  for (const rule of [...local, ...global]) {
    const key = exclusionKey(rule);
    if (!merged.has(key)) {
      merged.set(key, { organization: rule.organization, name: rule.name });
    }
  }
  return Array.from(merged.values());
}

export function normalizeDependencies(
  declared: ReadonlyArray<DeclaredDependency>,
  platform: PlatformVersion,
  globalExclusions: ReadonlyArray<ExclusionRule>
): DependencyEntry[] {
  const entries: DependencyEntry[] = [];

  for (const dep of declared) {
    const module = {
      organization: dep.organization,
      name: crossVersionedName(dep, platform),
      attributes: { ...(dep.extraAttributes ?? {}) }
    };
    const exclusions = mergeExclusions(dep.exclusions ?? [], globalExclusions);

    for (const [from, to] of parseConfigurationMapping(dep.configurations)) {
      entries.push({
        configuration: from,
        dependency: {
          module,
          version: dep.revision,
          configuration: to,
          exclusions,
          attributes: {
            type: dep.type ?? DEFAULT_ARTIFACT_TYPE,
            classifier: dep.classifier ?? ''
          },
          optional: dep.optional ?? false,
          transitive: dep.transitive ?? true
        }
      });
    }
  }

  return entries;
}

export function selectClassifiers(conf: Pick<ResolutionConfiguration, 'hasClassifiers' | 'classifiers'>): string[] | null {
  return conf.hasClassifiers ? [...conf.classifiers] : null;
}

export function normalizeInputs(
  descriptor: ModuleDescriptor,
  conf: ResolutionConfiguration,
  defaults: ResolutionDefaults
): NormalizedInputs {
  const settings = unwrapDescriptor(descriptor);
  const platform = selectPlatform(settings, conf, defaults);
  const exclusions = mergeExclusions([], conf.excludeDependencies);

  const resolvers = conf.reorderResolvers
    ? reorderResolvers(conf.resolvers, {
        fastPrefixes: defaults.fastRepositoryPrefixes,
        slowPrefixes: defaults.slowRepositoryPrefixes
      })
    : [...conf.resolvers];

  return {
    settings,
    platform,
    dependencies: normalizeDependencies(settings.dependencies, platform, exclusions),
    exclusions,
    classifiers: selectClassifiers(conf),
    resolvers
  };
}
