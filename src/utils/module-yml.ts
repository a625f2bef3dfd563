import { dirname, isAbsolute, resolve } from 'path';
import type {
  Authentication,
  ConfigurationDef,
  CrossVersion,
  DeclaredDependency,
  ExclusionRule,
  FallbackDependency,
  ModuleSettings,
  PlatformModuleInfo,
  Resolver
} from '../types/index.js';
import { InvalidModuleFileError } from './errors.js';
import { readTextFile } from './fs.js';
import { FieldReader, loadYamlRecord } from './yaml-fields.js';

/**
 * Parsed depweave.yml
 */
export interface ModuleFile {
  path: string;
  settings: ModuleSettings;
  /** 1-based line of each dependency in settings.dependencies, when found */
  dependencyLines: Array<number | undefined>;
  resolvers: Resolver[];
  excludeDependencies: ExclusionRule[];
  fallbackDependencies: FallbackDependency[];
  /** Other modules of the same build */
  projects: ModuleSettings[];
  classifiers?: string[];
  /** Maven profiles to enable; passed through to the engine */
  profiles?: string[];
  autoPlatformLibrary?: boolean;
  authenticationByRepositoryId: Record<string, Authentication>;
  authenticationByHost: Record<string, Authentication>;
}

const CROSS_VERSIONS: ReadonlyArray<CrossVersion> = ['disabled', 'binary', 'full'];

function readExclusions(reader: FieldReader, key: string): ExclusionRule[] {
  return reader.records(key).map(rule => ({
    organization: rule.optionalString('organization') ?? '*',
    name: rule.optionalString('name') ?? '*'
  }));
}

function readCrossVersion(reader: FieldReader): CrossVersion | undefined {
  const value = reader.optionalString('crossVersion');
  if (value === undefined) return undefined;
  const match = CROSS_VERSIONS.find(cv => cv === value);
  if (!match) {
    throw new InvalidModuleFileError(`crossVersion must be one of ${CROSS_VERSIONS.join(', ')}, got '${value}'`);
  }
  return match;
}

function readDependency(reader: FieldReader): DeclaredDependency {
  const dependency: DeclaredDependency = {
    organization: reader.string('organization'),
    name: reader.string('name'),
    revision: reader.string('version'),
    exclusions: readExclusions(reader, 'exclusions'),
    extraAttributes: reader.stringRecord('attributes')
  };

  const configurations = reader.optionalString('configurations');
  if (configurations !== undefined) dependency.configurations = configurations;
  const crossVersion = readCrossVersion(reader);
  if (crossVersion !== undefined) dependency.crossVersion = crossVersion;
  const classifier = reader.optionalString('classifier');
  if (classifier !== undefined) dependency.classifier = classifier;
  const type = reader.optionalString('type');
  if (type !== undefined) dependency.type = type;
  const transitive = reader.optionalBoolean('transitive');
  if (transitive !== undefined) dependency.transitive = transitive;
  const optional = reader.optionalBoolean('optional');
  if (optional !== undefined) dependency.optional = optional;

  return dependency;
}

function readConfigurations(reader: FieldReader): ConfigurationDef[] {
  return reader.records('configurations').map(config => {
    const def: ConfigurationDef = {
      name: config.string('name'),
      extends: config.stringArray('extends')
    };
    const description = config.optionalString('description');
    if (description !== undefined) def.description = description;
    return def;
  });
}

function readPlatform(reader: FieldReader): PlatformModuleInfo | undefined {
  const platform = reader.optionalRecord('platform');
  if (!platform) return undefined;
  const fullVersion = platform.string('version');
  return {
    organization: platform.string('organization'),
    fullVersion,
    binaryVersion: platform.optionalString('binaryVersion') ?? fullVersion.split('.').slice(0, 2).join('.')
  };
}

function readSettings(reader: FieldReader): ModuleSettings {
  const settings: ModuleSettings = {
    module: {
      organization: reader.string('organization'),
      name: reader.string('name'),
      revision: reader.string('version')
    },
    dependencies: reader.records('dependencies').map(readDependency),
    configurations: readConfigurations(reader)
  };
  const platformInfo = readPlatform(reader);
  if (platformInfo) settings.platformInfo = platformInfo;
  return settings;
}

function readResolver(reader: FieldReader, baseDir: string): Resolver {
  const kind = reader.string('kind');
  const name = reader.string('name');
  switch (kind) {
    case 'maven':
      return { kind, name, root: reader.string('root') };
    case 'pattern': {
      const changing = reader.optionalBoolean('changing');
      return changing === undefined
        ? { kind, name, pattern: reader.string('pattern') }
        : { kind, name, pattern: reader.string('pattern'), changing };
    }
    case 'directory': {
      const path = reader.string('path');
      return { kind, name, path: isAbsolute(path) ? path : resolve(baseDir, path) };
    }
    case 'url':
      return { kind, name, url: reader.string('url') };
    default:
      throw new InvalidModuleFileError(`resolver '${name}' has unknown kind '${kind}'`);
  }
}

function readAuthentication(reader: FieldReader | undefined, key: string): Record<string, Authentication> {
  const result: Record<string, Authentication> = {};
  if (!reader) return result;
  for (const [id, entry] of reader.recordEntries(key)) {
    const realm = entry.optionalString('realm');
    result[id] = {
      user: entry.string('user'),
      password: entry.string('password'),
      ...(realm !== undefined ? { realm } : {})
    };
  }
  return result;
}

function readFallback(reader: FieldReader): FallbackDependency {
  return {
    module: {
      organization: reader.string('organization'),
      name: reader.string('name'),
      attributes: {}
    },
    version: reader.string('version'),
    url: reader.string('url'),
    changing: reader.optionalBoolean('changing') ?? false
  };
}

/**
 * Best-effort line numbers of the entries under the top-level
 * `dependencies:` key, matched by their name field in order.
 */
export function findDependencyLines(content: string, names: ReadonlyArray<string>): Array<number | undefined> {
  const lines = content.split(/\r?\n/);
  let cursor = lines.findIndex(line => /^dependencies\s*:/.test(line));
  if (cursor < 0) return names.map(() => undefined);

  return names.map(name => {
    const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const pattern = new RegExp(`^\\s*-?\\s*name\\s*:\\s*['"]?${escaped}['"]?\\s*$`);
    for (let i = cursor + 1; i < lines.length; i++) {
      if (/^\S/.test(lines[i])) break;
      if (pattern.test(lines[i])) {
        cursor = i;
        return i + 1;
      }
    }
    return undefined;
  });
}

export function parseModuleFileContent(content: string, path: string): ModuleFile {
  const reader = new FieldReader(loadYamlRecord(content, path), path);
  const baseDir = dirname(path);
  const settings = readSettings(reader);
  const authentication = reader.optionalRecord('authentication');

  const moduleFile: ModuleFile = {
    path,
    settings,
    dependencyLines: findDependencyLines(content, settings.dependencies.map(d => d.name)),
    resolvers: reader.records('resolvers').map(resolver => readResolver(resolver, baseDir)),
    excludeDependencies: readExclusions(reader, 'excludeDependencies'),
    fallbackDependencies: reader.records('fallbackDependencies').map(readFallback),
    projects: reader.records('projects').map(readSettings),
    authenticationByRepositoryId: readAuthentication(authentication, 'byRepositoryId'),
    authenticationByHost: readAuthentication(authentication, 'byHost')
  };

  if (reader.has('classifiers')) moduleFile.classifiers = reader.stringArray('classifiers');
  if (reader.has('profiles')) moduleFile.profiles = reader.stringArray('profiles');
  const autoPlatformLibrary = reader.optionalBoolean('autoPlatformLibrary');
  if (autoPlatformLibrary !== undefined) moduleFile.autoPlatformLibrary = autoPlatformLibrary;

  return moduleFile;
}

/**
 * Read and validate a depweave.yml file
 */
export async function parseModuleFile(path: string): Promise<ModuleFile> {
  return parseModuleFileContent(await readTextFile(path), path);
}
