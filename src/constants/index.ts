/**
 * Shared constants for depweave
 * Single source of truth for directory names, file names and resolution defaults.
 */

export const DIR_PATTERNS = {
  DEPWEAVE: '.depweave'
} as const;

export const FILE_PATTERNS = {
  MODULE_YML: 'depweave.yml',
  REPOSITORY_MODULE_YML: 'module.yml',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json'
} as const;

export const DEPWEAVE_DIRS = {
  CACHE: 'cache',
  ARTIFACTS: 'artifacts',
  RUNTIME: 'runtime',
  GLOBAL: 'global'
} as const;

export const DEFAULT_PLATFORM_ORGANIZATION = 'org.platform-lang';

/** Platform library version used when neither the config nor the module names one */
export const DEFAULT_TOOLCHAIN_PLATFORM_VERSION = '1.8.0';

/** Binary version of the build tool, used to locate globally installed plugins */
export const TOOL_BINARY_VERSION = '1.0';

/** Name of the platform's standard library module, added automatically when enabled */
export const PLATFORM_LIBRARY_NAME = 'platform-library';

export const DEFAULT_CONFIGURATION = 'compile';
export const DEFAULT_TARGET_CONFIGURATION = 'default(compile)';
export const DEFAULT_ARTIFACT_TYPE = 'jar';

export const INTER_PROJECT_REPOSITORY_ID = 'inter-project';

/**
 * Ivy-style patterns of the plugin resolution cache under the global base.
 * `{base}` and `{toolBinaryVersion}` are substituted before use.
 */
export const GLOBAL_PLUGIN_PATTERNS = [
  '{base}/{toolBinaryVersion}/plugins/target/resolution-cache/[organization]/[module](/platform_[platformVersion])(/tool_[toolVersion])/[revision]/resolved.xml.[ext]',
  '{base}/{toolBinaryVersion}/plugins/target/streams/update/[organization]/[module]/[revision]/[type]s/[artifact](-[classifier]).[ext]'
] as const;

export const FAST_REPOSITORY_PREFIXES = [
  'https://repo1.maven.org/',
  'http://repo1.maven.org/'
] as const;

export const SLOW_REPOSITORY_PREFIXES = [
  'https://repo.typesafe.com/',
  'http://repo.typesafe.com/',
  'https://jcenter.bintray.com/',
  'http://jcenter.bintray.com/'
] as const;

export const DEFAULT_CHECKSUMS = ['SHA-1', 'MD5'] as const;

export const METADATA_TTL_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_PARALLEL_DOWNLOADS = 6;
export const DEFAULT_MAX_ITERATIONS = 100;
