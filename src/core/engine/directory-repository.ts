/**
 * Local directory repository
 *
 * Layout: <root>/<organization>/<name>/<version>/module.yml, with the
 * artifact files next to the descriptor.
 */

import { join } from 'path';
import { pathToFileURL } from 'url';
import type { ExclusionRule } from '../../types/index.js';
import { DEFAULT_ARTIFACT_TYPE, FILE_PATTERNS } from '../../constants/index.js';
import { exists, listDirectories, readTextFile } from '../../utils/fs.js';
import { FieldReader, loadYamlRecord } from '../../utils/yaml-fields.js';

export interface RepositoryDependency {
  organization: string;
  name: string;
  version: string;
  /** Configuration the dependency belongs to on the declaring side */
  scope: string;
  optional: boolean;
  transitive: boolean;
  exclusions: ExclusionRule[];
}

export interface RepositoryArtifact {
  file: string;
  type: string;
  extension: string;
  classifier: string;
  changing: boolean;
}

export interface RepositoryModule {
  organization: string;
  name: string;
  version: string;
  /** Directory holding module.yml */
  directory: string;
  dependencies: RepositoryDependency[];
  artifacts: RepositoryArtifact[];
}

function extensionOf(file: string, fallback: string): string {
  const dot = file.lastIndexOf('.');
  return dot > 0 ? file.slice(dot + 1) : fallback;
}

export function parseRepositoryModule(
  content: string,
  source: string,
  coordinates: { organization: string; name: string; version: string; directory: string }
): RepositoryModule {
  const reader = new FieldReader(loadYamlRecord(content, source), source);

  const dependencies = reader.records('dependencies').map(dep => ({
    organization: dep.string('organization'),
    name: dep.string('name'),
    version: dep.string('version'),
    scope: dep.optionalString('scope') ?? 'compile',
    optional: dep.optionalBoolean('optional') ?? false,
    transitive: dep.optionalBoolean('transitive') ?? true,
    exclusions: dep.records('exclusions').map(rule => ({
      organization: rule.optionalString('organization') ?? '*',
      name: rule.optionalString('name') ?? '*'
    }))
  }));

  const artifacts = reader.has('artifacts')
    ? reader.records('artifacts').map(artifact => {
        const file = artifact.string('file');
        const type = artifact.optionalString('type') ?? DEFAULT_ARTIFACT_TYPE;
        return {
          file,
          type,
          extension: artifact.optionalString('extension') ?? extensionOf(file, type),
          classifier: artifact.optionalString('classifier') ?? '',
          changing: artifact.optionalBoolean('changing') ?? false
        };
      })
    : [
        {
          file: `${coordinates.name}-${coordinates.version}.${DEFAULT_ARTIFACT_TYPE}`,
          type: DEFAULT_ARTIFACT_TYPE,
          extension: DEFAULT_ARTIFACT_TYPE,
          classifier: '',
          changing: false
        }
      ];

  return { ...coordinates, dependencies, artifacts };
}

export class DirectoryRepository {
  private readonly versionCache = new Map<string, string[]>();
  private readonly moduleCache = new Map<string, RepositoryModule | null>();

  constructor(
    readonly id: string,
    readonly root: string
  ) {}

  private moduleDir(organization: string, name: string): string {
    return join(this.root, organization, name);
  }

  /**
   * Versions that carry a module.yml, unsorted.
   */
  async listVersions(organization: string, name: string): Promise<string[]> {
    const key = `${organization}:${name}`;
    const cached = this.versionCache.get(key);
    if (cached) return cached;

    const dir = this.moduleDir(organization, name);
    const versions: string[] = [];
    for (const version of await listDirectories(dir)) {
      if (await exists(join(dir, version, FILE_PATTERNS.REPOSITORY_MODULE_YML))) {
        versions.push(version);
      }
    }
    this.versionCache.set(key, versions);
    return versions;
  }

  async readModule(organization: string, name: string, version: string): Promise<RepositoryModule | null> {
    const key = `${organization}:${name}:${version}`;
    const cached = this.moduleCache.get(key);
    if (cached !== undefined) return cached;

    const directory = join(this.moduleDir(organization, name), version);
    const descriptor = join(directory, FILE_PATTERNS.REPOSITORY_MODULE_YML);
    if (!(await exists(descriptor))) {
      this.moduleCache.set(key, null);
      return null;
    }

    const module = parseRepositoryModule(await readTextFile(descriptor), descriptor, {
      organization,
      name,
      version,
      directory
    });
    this.moduleCache.set(key, module);
    return module;
  }

  artifactUrl(module: RepositoryModule, artifact: RepositoryArtifact): string {
    return pathToFileURL(join(module.directory, artifact.file)).href;
  }
}
