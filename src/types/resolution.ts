/**
 * Resolution request, engine contract and report types
 */

import type {
  DependencyEntry,
  ExclusionRule,
  FallbackDependency,
  InterProjectModule,
  ModuleCoordinate,
  ModuleId
} from './module.js';
import type { Authentication, Repository, Resolver } from './repository.js';
import type { Result } from './result.js';
import type { ResolveException } from '../utils/errors.js';

export type CachePolicy =
  | 'local-only'
  | 'local-update-changing'
  | 'local-update'
  | 'update-changing'
  | 'update'
  | 'fetch-missing'
  | 'force-download';

/**
 * Caller-supplied settings for a DependencyResolution instance.
 */
export interface ResolutionConfiguration {
  resolvers: Resolver[];
  reorderResolvers: boolean;
  parallelDownloads: number;
  maxIterations: number;
  platformOrganization?: string;
  platformVersion?: string;
  /** Platform library the build tool itself runs on */
  toolPlatformOrganization?: string;
  toolPlatformVersion?: string;
  /** Module name -> local jar of the build tool's own platform library */
  toolPlatformJars: Record<string, string>;
  interProjectDependencies: InterProjectModule[];
  excludeDependencies: ExclusionRule[];
  fallbackDependencies: FallbackDependency[];
  autoPlatformLibrary: boolean;
  hasClassifiers: boolean;
  classifiers: string[];
  mavenProfiles: string[];
  authenticationByRepositoryId: Record<string, Authentication>;
  authenticationByHost: Record<string, Authentication>;
  cacheDir?: string;
}

export interface UpdateConfiguration {
  /** Only use what is already in the cache */
  offline?: boolean;
}

export interface SourcePosition {
  readonly path: string;
  readonly line?: number;
}

export interface UnresolvedWarningConfiguration {
  /** Keyed by `organization:name:revision` */
  readonly modulePositions: ReadonlyMap<string, SourcePosition>;
}

export interface FailedPathEntry {
  readonly module: ModuleId;
  readonly position?: SourcePosition;
}

export interface UnresolvedWarning {
  readonly resolveException: ResolveException;
  readonly failedPaths: ReadonlyArray<ReadonlyArray<FailedPathEntry>>;
  readonly config: UnresolvedWarningConfiguration;
}

export interface PlatformVersion {
  readonly organization: string;
  readonly version: string;
  readonly binaryVersion: string;
}

/**
 * Sorted configuration names resolved together.
 */
export type ConfigurationSet = ReadonlyArray<string>;

export interface ResolutionParams {
  readonly dependencies: ReadonlyArray<DependencyEntry>;
  readonly fallbackDependencies: ReadonlyArray<FallbackDependency>;
  readonly configGraphs: ReadonlyArray<ConfigurationSet>;
  readonly autoPlatformLibrary: boolean;
  readonly mainRepositories: ReadonlyArray<Repository>;
  readonly internalRepositories: ReadonlyArray<Repository>;
  readonly interProjectDependencies: ReadonlyArray<InterProjectModule>;
  /** Maven profiles; engines without maven repositories ignore them */
  readonly userEnabledProfiles: ReadonlyArray<string>;
  /** Platform organization was overridden away from the default one */
  readonly forcedPlatformOrganization: boolean;
  readonly defaultPlatformOrganization: string;
  readonly platform: PlatformVersion;
  readonly exclusions: ReadonlyArray<ExclusionRule>;
  readonly classifiers: ReadonlyArray<string> | null;
  readonly parallelDownloads: number;
  readonly maxIterations: number;
  readonly cacheDir: string;
  readonly cachePolicies: ReadonlyArray<CachePolicy>;
  readonly ttlMs: number | null;
  readonly checksums: ReadonlyArray<string>;
}

export interface ConfigurationSetRequest {
  readonly params: ResolutionParams;
  readonly configurations: ConfigurationSet;
  readonly dependencies: ReadonlyArray<DependencyEntry>;
}

export interface Artifact {
  /** Identity of the artifact */
  readonly url: string;
  readonly type: string;
  readonly extension: string;
  /** Empty for the default artifact */
  readonly classifier: string;
  readonly changing: boolean;
  readonly optional: boolean;
}

export interface ResolvedModule {
  readonly module: ModuleCoordinate;
  readonly version: string;
  readonly repositoryId: string;
  /** Keys (`organization:name`) of the modules this one depends on */
  readonly dependencies: ReadonlyArray<string>;
  readonly artifacts: ReadonlyArray<Artifact>;
}

export interface ResolvedGraph {
  /**
   * Roots as the engine resolved them, each under the configuration it was
   * declared in. Engines may rewrite declared roots or add their own.
   */
  readonly rootDependencies: ReadonlyArray<DependencyEntry>;
  readonly modules: ReadonlyArray<ResolvedModule>;
}

export interface ResolvedConfigurationSet {
  readonly configurations: ConfigurationSet;
  readonly graph: ResolvedGraph;
}

export interface MetadataDownloadError {
  readonly module: ModuleCoordinate;
  readonly version: string;
  readonly messages: ReadonlyArray<string>;
  /** Dependency chain leading to the module, root first */
  readonly path?: ReadonlyArray<{ readonly module: ModuleCoordinate; readonly version: string }>;
}

export type ResolutionError =
  | { readonly type: 'maximum-iterations-reached'; readonly iterations: number }
  | { readonly type: 'conflicts'; readonly description: string }
  | { readonly type: 'unknown-exception'; readonly cause: unknown }
  | { readonly type: 'unknown-download-exception'; readonly cause: unknown }
  | { readonly type: 'metadata-download-errors'; readonly errors: ReadonlyArray<MetadataDownloadError> }
  | { readonly type: 'download-errors'; readonly errors: ReadonlyArray<FileError> };

export type FileError =
  | { readonly type: 'not-found'; readonly file: string; readonly permanent: boolean }
  | { readonly type: 'unauthorized'; readonly file: string; readonly realm?: string }
  | { readonly type: 'download-error'; readonly reason: string }
  | { readonly type: 'locked'; readonly file: string };

/**
 * Artifact url -> fetched file, or the error that prevented it.
 */
export type ArtifactMap = ReadonlyMap<string, Result<string, FileError>>;

export interface ArtifactsParams {
  readonly graphs: ReadonlyArray<ResolvedGraph>;
  readonly classifiers: ReadonlyArray<string> | null;
  readonly parallelDownloads: number;
  readonly cacheDir: string;
  readonly cachePolicies: ReadonlyArray<CachePolicy>;
  readonly ttlMs: number | null;
  readonly checksums: ReadonlyArray<string>;
}

/**
 * Local jars that replace the build tool's own platform library artifacts.
 */
export interface PlatformJarOverrides {
  readonly organization: string;
  readonly version: string;
  readonly jars: Readonly<Record<string, string>>;
}

export interface UpdateParams {
  readonly dependencies: ReadonlyArray<DependencyEntry>;
  /** Configuration -> its transitive extends closure, itself included */
  readonly configs: ReadonlyMap<string, ReadonlySet<string>>;
  readonly resolutions: ReadonlyArray<ResolvedConfigurationSet>;
  readonly artifacts: ArtifactMap;
  readonly classifiers: ReadonlyArray<string> | null;
  readonly platformJarOverrides: PlatformJarOverrides;
  readonly cacheDir: string;
}

export type ArtifactReport =
  | { readonly status: 'fetched'; readonly artifact: Artifact; readonly file: string }
  | { readonly status: 'failed'; readonly artifact: Artifact; readonly error: FileError };

export interface ModuleReport {
  readonly module: ModuleId;
  readonly repositoryId: string;
  readonly artifacts: ReadonlyArray<ArtifactReport>;
}

export interface ConfigurationReport {
  readonly configuration: string;
  readonly modules: ReadonlyArray<ModuleReport>;
}

export interface UpdateStats {
  readonly modules: number;
  readonly artifacts: number;
  readonly failedArtifacts: number;
}

export interface UpdateReport {
  readonly cacheDir: string;
  readonly configurations: ReadonlyArray<ConfigurationReport>;
  readonly stats: UpdateStats;
}
