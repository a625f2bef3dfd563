/**
 * Module, dependency and descriptor types
 */

export type ExtraAttributes = Readonly<Record<string, string>>;

/**
 * Organization + name (+ extra attributes), independent of version.
 */
export interface ModuleCoordinate {
  readonly organization: string;
  readonly name: string;
  readonly attributes: ExtraAttributes;
}

/**
 * Fully versioned module identity, as reported back to callers.
 */
export interface ModuleId {
  readonly organization: string;
  readonly name: string;
  readonly revision: string;
  readonly extraAttributes: ExtraAttributes;
}

export type CrossVersion = 'disabled' | 'binary' | 'full';

/**
 * An (organization, name) exclusion pair. '*' matches any value.
 */
export interface ExclusionRule {
  readonly organization: string;
  readonly name: string;
}

/**
 * A dependency as declared by the build tool, before normalization.
 */
export interface DeclaredDependency {
  organization: string;
  name: string;
  revision: string;
  /** Configuration mapping, e.g. "compile", "test->default", "compile;runtime->runtime" */
  configurations?: string;
  crossVersion?: CrossVersion;
  exclusions?: ExclusionRule[];
  classifier?: string;
  type?: string;
  transitive?: boolean;
  optional?: boolean;
  extraAttributes?: Record<string, string>;
}

export interface ConfigurationDef {
  name: string;
  extends: string[];
  description?: string;
}

export interface PlatformModuleInfo {
  organization: string;
  fullVersion: string;
  binaryVersion: string;
}

export interface ModuleSettings {
  module: {
    organization: string;
    name: string;
    revision: string;
  };
  dependencies: DeclaredDependency[];
  configurations: ConfigurationDef[];
  platformInfo?: PlatformModuleInfo;
}

/**
 * Settings carried by descriptors built outside depweave. Only inline
 * settings can be resolved; file-backed ones are rejected.
 */
export type ForeignModuleSettings =
  | { readonly kind: 'inline'; readonly settings: ModuleSettings }
  | { readonly kind: 'pom-file'; readonly path: string }
  | { readonly kind: 'ivy-file'; readonly path: string };

export type ModuleDescriptor =
  | { readonly kind: 'native'; readonly settings: ModuleSettings }
  | { readonly kind: 'foreign'; readonly moduleSettings: ForeignModuleSettings };

export interface DependencyAttributes {
  readonly type: string;
  readonly classifier: string;
}

/**
 * A normalized dependency: cross-versioning applied, global exclusions merged.
 */
export interface Dependency {
  readonly module: ModuleCoordinate;
  readonly version: string;
  /** Configuration on the dependency side, e.g. "default(compile)" */
  readonly configuration: string;
  readonly exclusions: ReadonlyArray<ExclusionRule>;
  readonly attributes: DependencyAttributes;
  readonly optional: boolean;
  readonly transitive: boolean;
}

export interface DependencyEntry {
  /** Configuration scope of the depending module */
  readonly configuration: string;
  readonly dependency: Dependency;
}

/**
 * Another module of the same multi-module build.
 */
export interface InterProjectModule {
  readonly module: ModuleCoordinate;
  readonly version: string;
  readonly dependencies: ReadonlyArray<DependencyEntry>;
  readonly configurations: ReadonlyArray<ConfigurationDef>;
}

export interface FallbackDependency {
  readonly module: ModuleCoordinate;
  readonly version: string;
  readonly url: string;
  readonly changing: boolean;
}
