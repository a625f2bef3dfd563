/**
 * Directory resolver engine
 *
 * Resolves one configuration set against local directory repositories and
 * the build's other projects, breadth-first in waves. Metadata for a wave is
 * read in parallel; constraints gathered during a pass are solved at the end
 * of it, and the pass is repeated with the solved versions until they stop
 * changing or the iteration cap is hit.
 */

import { fileURLToPath } from 'url';
import type {
  Artifact,
  ConfigurationSetRequest,
  Dependency,
  DependencyEntry,
  ExclusionRule,
  FallbackDependency,
  InterProjectModule,
  Logger,
  MetadataDownloadError,
  ModuleCoordinate,
  Repository,
  ResolutionError,
  ResolutionParams,
  ResolvedGraph,
  ResolvedModule,
  Result
} from '../../types/index.js';
import { err, ok } from '../../types/index.js';
import {
  DEFAULT_ARTIFACT_TYPE,
  DEFAULT_CONFIGURATION,
  DEFAULT_TARGET_CONFIGURATION,
  PLATFORM_LIBRARY_NAME
} from '../../constants/index.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import type { ResolverEngine } from '../ports/resolver-engine.js';
import { mergeExclusions } from '../resolution/normalizer.js';
import { DirectoryRepository } from './directory-repository.js';
import { ModuleVersionSolver, highestSatisfying, satisfiesConstraint } from './version-solver.js';
import type { VersionConflict } from './version-solver.js';

/** Scopes of repository modules and what each one includes */
const REPOSITORY_SCOPE_EXTENDS: ReadonlyMap<string, ReadonlyArray<string>> = new Map([
  ['default', ['runtime']],
  ['runtime', ['compile']]
]);

const FALLBACK_REPOSITORY_ID = 'fallback';

interface ChildDependency {
  module: ModuleCoordinate;
  version: string;
  scope: string;
  optional: boolean;
  transitive: boolean;
  exclusions: ReadonlyArray<ExclusionRule>;
}

interface ModuleNode {
  repositoryId: string;
  dependencies: ChildDependency[];
  artifacts: Artifact[];
  /** Configuration -> configurations it extends, for scope expansion */
  scopeExtends: ReadonlyMap<string, ReadonlyArray<string>>;
}

interface ModuleCandidate {
  repositoryId: string;
  versions: string[];
  read(version: string): Promise<ModuleNode | null>;
}

interface PendingModule {
  module: ModuleCoordinate;
  version: string;
  configuration: string;
  transitive: boolean;
  exclusions: ReadonlyArray<ExclusionRule>;
  /** Modules leading here, root first */
  path: ReadonlyArray<{ module: ModuleCoordinate; version: string }>;
  requestedBy: string;
}

interface TraversalPass {
  selected: Map<string, string>;
  solver: ModuleVersionSolver;
  modules: ResolvedModule[];
  errors: MetadataDownloadError[];
}

type LoadOutcome =
  | { kind: 'resolved'; version: string; node: ModuleNode }
  | { kind: 'missing'; messages: string[] };

function keyOf(module: { organization: string; name: string }): string {
  return `${module.organization}:${module.name}`;
}

export function matchesExclusion(module: { organization: string; name: string }, rule: ExclusionRule): boolean {
  return (
    (rule.organization === '*' || rule.organization === module.organization) &&
    (rule.name === '*' || rule.name === module.name)
  );
}

/**
 * Scopes a dependency configuration pulls in: "default(compile)" reads as
 * default with compile as fallback, then each scope's extends are added.
 */
export function expandScopes(
  configuration: string,
  scopeExtends: ReadonlyMap<string, ReadonlyArray<string>>
): Set<string> {
  const match = /^([^(]+)(?:\(([^)]*)\))?$/.exec(configuration.trim());
  const seeds = match ? [match[1], ...(match[2] ? [match[2]] : [])] : [configuration];
  const scopes = new Set<string>();
  const pending = seeds.map(seed => seed.trim()).filter(seed => seed.length > 0);

  while (pending.length > 0) {
    const scope = pending.pop();
    if (scope === undefined || scopes.has(scope)) continue;
    scopes.add(scope);
    pending.push(...(scopeExtends.get(scope) ?? []));
  }
  return scopes;
}

function extensionOf(url: string): string {
  const last = url.split('/').pop() ?? '';
  const dot = last.lastIndexOf('.');
  return dot > 0 ? last.slice(dot + 1) : DEFAULT_ARTIFACT_TYPE;
}

function sameSelection(a: ReadonlyMap<string, string>, b: ReadonlyMap<string, string>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, version] of a) {
    if (b.get(key) !== version) return false;
  }
  return true;
}

function projectCandidate(repositoryId: string, project: InterProjectModule): ModuleCandidate {
  const scopeExtends = new Map(project.configurations.map(c => [c.name, c.extends] as const));
  return {
    repositoryId,
    versions: [project.version],
    read: async version => {
      if (version !== project.version) return null;
      return {
        repositoryId,
        scopeExtends,
        artifacts: [],
        dependencies: project.dependencies.map(entry => ({
          module: entry.dependency.module,
          version: entry.dependency.version,
          scope: entry.configuration,
          optional: entry.dependency.optional,
          transitive: entry.dependency.transitive,
          exclusions: entry.dependency.exclusions
        }))
      };
    }
  };
}

function fallbackCandidate(fallback: FallbackDependency): ModuleCandidate {
  return {
    repositoryId: FALLBACK_REPOSITORY_ID,
    versions: [fallback.version],
    read: async version => {
      if (version !== fallback.version) return null;
      return {
        repositoryId: FALLBACK_REPOSITORY_ID,
        scopeExtends: REPOSITORY_SCOPE_EXTENDS,
        dependencies: [],
        artifacts: [
          {
            url: fallback.url,
            type: DEFAULT_ARTIFACT_TYPE,
            extension: extensionOf(fallback.url),
            classifier: '',
            changing: fallback.changing,
            optional: false
          }
        ]
      };
    }
  };
}

function directoryCandidate(repository: DirectoryRepository, organization: string, name: string, versions: string[]): ModuleCandidate {
  return {
    repositoryId: repository.id,
    versions,
    read: async version => {
      const module = await repository.readModule(organization, name, version);
      if (!module) return null;
      return {
        repositoryId: repository.id,
        scopeExtends: REPOSITORY_SCOPE_EXTENDS,
        dependencies: module.dependencies.map(dep => ({
          module: { organization: dep.organization, name: dep.name, attributes: {} },
          version: dep.version,
          scope: dep.scope,
          optional: dep.optional,
          transitive: dep.transitive,
          exclusions: dep.exclusions
        })),
        artifacts: module.artifacts.map(artifact => ({
          url: repository.artifactUrl(module, artifact),
          type: artifact.type,
          extension: artifact.extension,
          classifier: artifact.classifier,
          changing: artifact.changing,
          optional: false
        }))
      };
    }
  };
}

/**
 * Directory repositories usable by this engine, in list order. Remote
 * repositories are skipped.
 */
export function directoryRepositories(repositories: ReadonlyArray<Repository>, logger: Logger): DirectoryRepository[] {
  const usable: DirectoryRepository[] = [];
  for (const repository of repositories) {
    switch (repository.kind) {
      case 'directory':
        usable.push(new DirectoryRepository(repository.id, repository.root));
        break;
      case 'maven':
        if (repository.root.startsWith('file:')) {
          usable.push(new DirectoryRepository(repository.id, fileURLToPath(repository.root)));
        } else {
          logger.debug(`Skipping remote repository '${repository.id}' (${repository.root})`);
        }
        break;
      case 'pattern':
        logger.debug(`Skipping pattern repository '${repository.id}'`);
        break;
      case 'inter-project':
        break;
    }
  }
  return usable;
}

class ResolutionRun {
  private readonly params: ResolutionParams;
  private readonly logger: Logger;
  private readonly projects = new Map<string, { repositoryId: string; project: InterProjectModule }>();
  private readonly repositories: DirectoryRepository[];
  private readonly candidates = new Map<string, ModuleCandidate | null>();

  constructor(params: ResolutionParams, logger: Logger) {
    this.params = params;
    this.logger = logger;

    const all = [...params.mainRepositories, ...params.internalRepositories];
    for (const repository of all) {
      if (repository.kind !== 'inter-project') continue;
      for (const project of repository.projects) {
        const key = keyOf(project.module);
        if (!this.projects.has(key)) {
          this.projects.set(key, { repositoryId: repository.id, project });
        }
      }
    }
    this.repositories = directoryRepositories(all, logger);
  }

  /**
   * Rewrite dependencies on the default platform organization when another
   * platform organization is in force.
   */
  withPlatform<T extends { module: ModuleCoordinate; version: string }>(dependency: T): T {
    const { params } = this;
    if (!params.forcedPlatformOrganization || dependency.module.organization !== params.defaultPlatformOrganization) {
      return dependency;
    }
    return {
      ...dependency,
      module: { ...dependency.module, organization: params.platform.organization },
      version: params.platform.version
    };
  }

  /**
   * Declared roots after platform rewriting, plus the platform library under
   * compile when it is added automatically.
   */
  rootDependencies(request: ConfigurationSetRequest): DependencyEntry[] {
    const { params } = this;
    const roots = request.dependencies.map(entry => ({
      configuration: entry.configuration,
      dependency: this.withPlatform(entry.dependency)
    }));

    const platformLibrary = { organization: params.platform.organization, name: PLATFORM_LIBRARY_NAME };
    const wantsLibrary = params.autoPlatformLibrary && request.configurations.includes(DEFAULT_CONFIGURATION);
    if (wantsLibrary && !roots.some(root => keyOf(root.dependency.module) === keyOf(platformLibrary))) {
      roots.push({
        configuration: DEFAULT_CONFIGURATION,
        dependency: {
          module: { ...platformLibrary, attributes: {} },
          version: params.platform.version,
          configuration: DEFAULT_TARGET_CONFIGURATION,
          exclusions: [],
          attributes: { type: DEFAULT_ARTIFACT_TYPE, classifier: '' },
          optional: false,
          transitive: true
        }
      });
    }
    return roots;
  }

  private async candidate(module: ModuleCoordinate, constraint: string): Promise<ModuleCandidate | null> {
    const key = keyOf(module);
    if (this.candidates.has(key)) {
      return this.candidates.get(key) ?? null;
    }

    let found: ModuleCandidate | null = null;
    const project = this.projects.get(key);
    if (project) {
      found = projectCandidate(project.repositoryId, project.project);
    } else {
      for (const repository of this.repositories) {
        const versions = await repository.listVersions(module.organization, module.name);
        if (versions.length > 0) {
          found = directoryCandidate(repository, module.organization, module.name, versions);
          break;
        }
      }
    }

    if (!found) {
      const fallback = this.params.fallbackDependencies.find(
        fb => keyOf(fb.module) === key && satisfiesConstraint(fb.version, constraint)
      );
      if (fallback) {
        this.logger.debug(`Using fallback location for ${key}:${fallback.version}`);
        found = fallbackCandidate(fallback);
      }
    }

    this.candidates.set(key, found);
    return found;
  }

  private notFound(item: PendingModule): LoadOutcome {
    const searched = this.repositories.map(r => r.id).join(', ') || 'no local repositories';
    return {
      kind: 'missing',
      messages: [`not found: ${keyOf(item.module)}:${item.version} (searched ${searched})`]
    };
  }

  private async load(
    item: PendingModule,
    preferred: ReadonlyMap<string, string>,
    solver: ModuleVersionSolver
  ): Promise<LoadOutcome> {
    const key = keyOf(item.module);
    const candidate = await this.candidate(item.module, item.version);
    if (!candidate) {
      return this.notFound(item);
    }

    solver.addAvailableVersions(key, candidate.versions);
    const version =
      preferred.get(key) ?? solver.pick(key) ?? highestSatisfying(candidate.versions, [item.version]);
    if (version === null) {
      return this.notFound(item);
    }

    const node = await candidate.read(version);
    if (!node) {
      return { kind: 'missing', messages: [`missing metadata: ${key}:${version} in ${candidate.repositoryId}`] };
    }
    return { kind: 'resolved', version, node };
  }

  private children(item: PendingModule, version: string, node: ModuleNode): PendingModule[] {
    if (!item.transitive) return [];

    const scopes = expandScopes(item.configuration, node.scopeExtends);
    const path = [...item.path, { module: item.module, version }];
    const children: PendingModule[] = [];

    for (const raw of node.dependencies) {
      if (raw.optional || !scopes.has(raw.scope)) continue;
      const child = this.withPlatform(raw);
      if (item.exclusions.some(rule => matchesExclusion(child.module, rule))) {
        this.logger.debug(`Excluding ${keyOf(child.module)} (required by ${keyOf(item.module)})`);
        continue;
      }
      children.push({
        module: child.module,
        version: child.version,
        configuration: DEFAULT_TARGET_CONFIGURATION,
        transitive: child.transitive,
        exclusions: mergeExclusions(item.exclusions, child.exclusions),
        path,
        requestedBy: `${keyOf(item.module)}:${version}`
      });
    }
    return children;
  }

  /**
   * One breadth-first pass over the graph using the preferred versions where
   * known. Returns an error only for failures reading metadata.
   */
  async traverse(
    roots: ReadonlyArray<Dependency>,
    preferred: ReadonlyMap<string, string>
  ): Promise<Result<TraversalPass, ResolutionError>> {
    const solver = new ModuleVersionSolver();
    const selected = new Map<string, string>();
    const modules: ResolvedModule[] = [];
    const errors = new Map<string, MetadataDownloadError>();
    const visited = new Set<string>();

    let wave: PendingModule[] = roots.map(dep => ({
      module: dep.module,
      version: dep.version,
      configuration: dep.configuration,
      transitive: dep.transitive,
      exclusions: dep.exclusions,
      path: [],
      requestedBy: 'root'
    }));
    let waveNumber = 0;

    while (wave.length > 0) {
      waveNumber++;
      const fresh: PendingModule[] = [];
      for (const item of wave) {
        const key = keyOf(item.module);
        solver.addConstraint(key, item.version, item.requestedBy);
        if (!visited.has(key)) {
          visited.add(key);
          fresh.push(item);
        }
      }
      this.logger.debug(`Wave ${waveNumber}: ${fresh.length} new module(s)`);

      const { results } = await runWithConcurrency(
        fresh.map(item => () => this.load(item, preferred, solver)),
        this.params.parallelDownloads
      );

      const next: PendingModule[] = [];
      for (let index = 0; index < results.length; index++) {
        const outcome = results[index];
        const item = fresh[index];
        if (outcome.status === 'rejected') {
          return err({ type: 'unknown-download-exception', cause: outcome.error });
        }

        const loaded = outcome.value;
        if (loaded.kind === 'missing') {
          errors.set(`${keyOf(item.module)}:${item.version}`, {
            module: item.module,
            version: item.version,
            messages: loaded.messages,
            path: item.path
          });
          continue;
        }

        const children = this.children(item, loaded.version, loaded.node);
        selected.set(keyOf(item.module), loaded.version);
        modules.push({
          module: item.module,
          version: loaded.version,
          repositoryId: loaded.node.repositoryId,
          dependencies: Array.from(new Set(children.map(child => keyOf(child.module)))),
          artifacts: loaded.node.artifacts
        });
        next.push(...children);
      }
      wave = next;
    }

    return ok({ selected, solver, modules, errors: Array.from(errors.values()) });
  }
}

function describeConflicts(conflicts: ReadonlyArray<VersionConflict>): string {
  return conflicts
    .map(conflict => {
      const requests = conflict.ranges.map((range, i) => `${range} from ${conflict.requestedBy[i]}`);
      return `${conflict.moduleKey} (${requests.join(', ')})`;
    })
    .join('; ');
}

export class DirectoryResolverEngine implements ResolverEngine {
  async resolve(request: ConfigurationSetRequest, logger: Logger): Promise<Result<ResolvedGraph, ResolutionError>> {
    const run = new ResolutionRun(request.params, logger);
    const rootDependencies = run.rootDependencies(request);
    let preferred: ReadonlyMap<string, string> = new Map();

    for (let iteration = 1; iteration <= request.params.maxIterations; iteration++) {
      const pass = await run.traverse(rootDependencies.map(root => root.dependency), preferred);
      if (!pass.ok) {
        return err(pass.error);
      }
      if (pass.data.errors.length > 0) {
        return err({ type: 'metadata-download-errors', errors: pass.data.errors });
      }

      const solution = pass.data.solver.solve();
      if (solution.conflicts.length > 0) {
        return err({ type: 'conflicts', description: describeConflicts(solution.conflicts) });
      }
      if (sameSelection(pass.data.selected, solution.resolved)) {
        logger.debug(`Resolved [${request.configurations.join(',')}] in ${iteration} iteration(s)`);
        return ok({ rootDependencies, modules: pass.data.modules });
      }
      preferred = solution.resolved;
    }

    return err({ type: 'maximum-iterations-reached', iterations: request.params.maxIterations });
  }
}
