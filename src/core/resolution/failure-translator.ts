/**
 * Failure translator
 *
 * Metadata download failures become an UnresolvedWarning handed back to the
 * caller; every other resolution error is terminal. An error the engine
 * threw is rethrown as it was, the rest as ResolutionFailedError.
 */

import type {
  FailedPathEntry,
  MetadataDownloadError,
  ModuleCoordinate,
  ModuleId,
  ResolutionError,
  Result,
  UnresolvedWarning,
  UnresolvedWarningConfiguration
} from '../../types/index.js';
import { err, ok } from '../../types/index.js';
import { ResolveException, ResolutionFailedError } from '../../utils/errors.js';

export function moduleIdOf(module: ModuleCoordinate, revision: string): ModuleId {
  return {
    organization: module.organization,
    name: module.name,
    revision,
    extraAttributes: { ...module.attributes }
  };
}

export function moduleIdKey(id: Pick<ModuleId, 'organization' | 'name' | 'revision'>): string {
  return `${id.organization}:${id.name}:${id.revision}`;
}

/**
 * ok: a recoverable ResolveException; error: the terminal failure to raise.
 */
export function toResolveException(error: ResolutionError): Result<ResolveException, ResolutionFailedError> {
  switch (error.type) {
    case 'metadata-download-errors':
      return ok(
        new ResolveException(
          error.errors.flatMap(e => e.messages),
          error.errors.map(e => moduleIdOf(e.module, e.version))
        )
      );
    case 'maximum-iterations-reached':
    case 'conflicts':
    case 'unknown-exception':
    case 'unknown-download-exception':
    case 'download-errors':
      return err(new ResolutionFailedError(error));
    default: {
      const unknownError: never = error;
      return err(new ResolutionFailedError({ type: 'unknown-exception', cause: unknownError }));
    }
  }
}

function failedPath(
  failure: MetadataDownloadError,
  config: UnresolvedWarningConfiguration
): FailedPathEntry[] {
  const chain = [...(failure.path ?? []), { module: failure.module, version: failure.version }];
  // Failed module first, then whoever pulled it in
  return chain.reverse().map(({ module, version }) => {
    const id = moduleIdOf(module, version);
    const position = config.modulePositions.get(moduleIdKey(id));
    return position ? { module: id, position } : { module: id };
  });
}

export function unresolvedWarningOrThrow(
  config: UnresolvedWarningConfiguration,
  error: ResolutionError
): UnresolvedWarning {
  const translated = toResolveException(error);
  if (!translated.ok) {
    if (error.type === 'unknown-exception' && error.cause instanceof Error) {
      throw error.cause;
    }
    throw translated.error;
  }

  const failedPaths = error.type === 'metadata-download-errors'
    ? error.errors.map(failure => failedPath(failure, config))
    : [];

  return {
    resolveException: translated.data,
    failedPaths,
    config
  };
}

function renderEntry(entry: FailedPathEntry): string {
  const { organization, name, revision } = entry.module;
  const base = `${organization}:${name}:${revision}`;
  if (!entry.position) return base;
  const line = entry.position.line !== undefined ? `#L${entry.position.line}` : '';
  return `${base} (${entry.position.path}${line})`;
}

/**
 * Human-readable lines describing an unresolved warning.
 */
export function formatUnresolvedWarningLines(warning: UnresolvedWarning): string[] {
  const lines: string[] = [];

  for (const id of warning.resolveException.failed) {
    lines.push(`unresolved dependency: ${id.organization}#${id.name};${id.revision}`);
  }
  for (const message of warning.resolveException.messages) {
    lines.push(`  ${message}`);
  }

  const paths = warning.failedPaths.filter(path => path.length > 1 || path.some(entry => entry.position));
  if (paths.length > 0) {
    lines.push('');
    lines.push('Unresolved dependencies path:');
    for (const path of paths) {
      path.forEach((entry, index) => {
        lines.push(index === 0 ? `  ${renderEntry(entry)}` : `    +- ${renderEntry(entry)}`);
      });
    }
  }

  return lines;
}
