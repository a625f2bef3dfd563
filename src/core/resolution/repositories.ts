/**
 * Repository assembler
 *
 * Converts declared resolvers into engine repositories, attaches
 * credentials (by repository id first, by host otherwise) and appends the
 * internal repositories: metadata-only plugin pattern repositories, then the
 * inter-project repository. The engine is expected to consult inter-project
 * coordinates before anything else even though it comes last in the list.
 */

import { resolve as resolvePath } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import type {
  Authentication,
  InterProjectModule,
  Logger,
  Repository,
  Resolver
} from '../../types/index.js';
import { GLOBAL_PLUGIN_PATTERNS, INTER_PROJECT_REPOSITORY_ID } from '../../constants/index.js';

export interface ReorderPolicy {
  fastPrefixes: ReadonlyArray<string>;
  slowPrefixes: ReadonlyArray<string>;
}

export interface RepositoryAssemblyInput {
  resolvers: ReadonlyArray<Resolver>;
  authenticationByRepositoryId: Readonly<Record<string, Authentication>>;
  authenticationByHost: Readonly<Record<string, Authentication>>;
  toolBinaryVersion: string;
  globalBase: string;
  interProjectDependencies: ReadonlyArray<InterProjectModule>;
}

export interface AssembledRepositories {
  main: Repository[];
  internal: Repository[];
}

function resolverUrl(resolver: Resolver): string | null {
  switch (resolver.kind) {
    case 'maven':
      return resolver.root;
    case 'pattern':
      return resolver.pattern;
    case 'url':
      return resolver.url;
    case 'directory':
      return null;
  }
}

function startsWithAny(url: string | null, prefixes: ReadonlyArray<string>): boolean {
  return url !== null && prefixes.some(prefix => url.startsWith(prefix));
}

/**
 * Move slow repositories behind the others, but only when a fast one is
 * also declared. Relative order within each group is preserved.
 */
export function reorderResolvers(resolvers: ReadonlyArray<Resolver>, policy: ReorderPolicy): Resolver[] {
  const isSlow = (resolver: Resolver) => startsWithAny(resolverUrl(resolver), policy.slowPrefixes);
  const isFast = (resolver: Resolver) => startsWithAny(resolverUrl(resolver), policy.fastPrefixes);

  if (!resolvers.some(isFast) || !resolvers.some(isSlow)) {
    return [...resolvers];
  }

  return [...resolvers.filter(r => !isSlow(r)), ...resolvers.filter(isSlow)];
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Convert a declared resolver to its engine representation. Returns null for
 * resolvers the engine cannot use.
 */
export function toRepository(
  resolver: Resolver,
  authenticationByRepositoryId: Readonly<Record<string, Authentication>>,
  logger: Logger
): Repository | null {
  const authentication = authenticationByRepositoryId[resolver.name];

  switch (resolver.kind) {
    case 'maven':
      return {
        kind: 'maven',
        id: resolver.name,
        root: withTrailingSlash(resolver.root),
        ...(authentication ? { authentication } : {})
      };
    case 'pattern':
      return {
        kind: 'pattern',
        id: resolver.name,
        pattern: resolver.pattern,
        withChecksums: true,
        withSignatures: true,
        withArtifacts: true,
        changing: resolver.changing ?? false,
        ...(authentication ? { authentication } : {})
      };
    case 'directory':
      return { kind: 'directory', id: resolver.name, root: resolvePath(resolver.path) };
    case 'url': {
      let parsed: URL;
      try {
        parsed = new URL(resolver.url);
      } catch {
        logger.warn(`Ignoring resolver '${resolver.name}': invalid URL ${resolver.url}`);
        return null;
      }
      if (parsed.protocol === 'file:') {
        return { kind: 'directory', id: resolver.name, root: fileURLToPath(parsed) };
      }
      if (parsed.protocol === 'http:' || parsed.protocol === 'https:') {
        return {
          kind: 'maven',
          id: resolver.name,
          root: withTrailingSlash(resolver.url),
          ...(authentication ? { authentication } : {})
        };
      }
      logger.warn(`Ignoring resolver '${resolver.name}': unsupported protocol ${parsed.protocol}`);
      return null;
    }
  }
}

export function repositoryHost(repository: Repository): string | null {
  let url: string;
  switch (repository.kind) {
    case 'maven':
      url = repository.root;
      break;
    case 'pattern':
      url = repository.pattern;
      break;
    case 'directory':
    case 'inter-project':
      return null;
  }
  try {
    const host = new URL(url).hostname;
    return host.length > 0 ? host : null;
  } catch {
    return null;
  }
}

/**
 * Attach host-based credentials to a repository that has none yet.
 */
export function withAuthenticationByHost(
  repository: Repository,
  authenticationByHost: Readonly<Record<string, Authentication>>
): Repository {
  if (repository.kind !== 'maven' && repository.kind !== 'pattern') {
    return repository;
  }
  if (repository.authentication) {
    return repository;
  }
  const host = repositoryHost(repository);
  const authentication = host ? authenticationByHost[host] : undefined;
  return authentication ? { ...repository, authentication } : repository;
}

/**
 * Metadata-only repositories over the global plugin resolution cache.
 */
export function globalPluginRepositories(toolBinaryVersion: string, globalBase: string): Repository[] {
  const base = pathToFileURL(globalBase).href.replace(/\/$/, '');
  return GLOBAL_PLUGIN_PATTERNS.map((template, index) => ({
    kind: 'pattern' as const,
    id: `global-plugins-${index}`,
    pattern: template.replace('{base}', base).replace('{toolBinaryVersion}', toolBinaryVersion),
    withChecksums: false,
    withSignatures: false,
    withArtifacts: false
  }));
}

export function interProjectRepository(projects: ReadonlyArray<InterProjectModule>): Repository {
  return { kind: 'inter-project', id: INTER_PROJECT_REPOSITORY_ID, projects };
}

export function assembleRepositories(input: RepositoryAssemblyInput, logger: Logger): AssembledRepositories {
  const main: Repository[] = [];
  const seen = new Set<string>();

  for (const resolver of input.resolvers) {
    const repository = toRepository(resolver, input.authenticationByRepositoryId, logger);
    if (!repository) continue;
    if (seen.has(repository.id)) {
      logger.debug(`Skipping duplicate repository '${repository.id}'`);
      continue;
    }
    seen.add(repository.id);
    main.push(withAuthenticationByHost(repository, input.authenticationByHost));
  }

  const internal = [
    ...globalPluginRepositories(input.toolBinaryVersion, input.globalBase),
    interProjectRepository(input.interProjectDependencies)
  ];

  return { main, internal };
}
