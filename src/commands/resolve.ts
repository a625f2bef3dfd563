import { Command } from 'commander';
import * as path from 'path';

import type { ConfigurationReport, Logger, Result, UpdateReport, UnresolvedWarning } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { withErrorHandling, ValidationError, describeFileError } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { parseModuleFile } from '../utils/module-yml.js';
import { exists } from '../utils/fs.js';
import { ConfigManager, createResolutionDefaults } from '../core/config.js';
import { ensureDepweaveDirectories, getDepweaveDirectories } from '../core/directory.js';
import { resolutionConfigurationFor, warningConfigurationFor, type ResolveOverrides } from '../core/module-request.js';
import { DependencyResolution } from '../core/resolution/dependency-resolution.js';
import { formatUnresolvedWarningLines } from '../core/resolution/failure-translator.js';
import { selectPlatform } from '../core/resolution/normalizer.js';
import { DirectoryResolverEngine } from '../core/engine/directory-engine.js';
import { FileSystemArtifactFetcher } from '../core/engine/file-fetcher.js';
import type { ArtifactFetcher } from '../core/ports/artifact-fetcher.js';
import type { ResolverEngine } from '../core/ports/resolver-engine.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';
import { createCliContext, type CommandContext } from '../cli/context.js';

export interface ResolveOptions {
  json?: boolean;
  offline?: boolean;
  classifiers?: string;
  parallel?: string;
  maxIterations?: string;
  cache?: string;
  reorder?: boolean;
}

export interface ResolveCommandContext extends CommandContext {
  /** Home directory holding .depweave; defaults to the user's */
  homeDir?: string;
  engine?: ResolverEngine;
  fetcher?: ArtifactFetcher;
  logger?: Logger;
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function toOverrides(options: ResolveOptions, cwd: string): ResolveOverrides {
  const overrides: ResolveOverrides = {};
  if (options.offline) overrides.offline = true;
  if (options.classifiers !== undefined) {
    overrides.classifiers = options.classifiers
      .split(',')
      .map(c => c.trim())
      .filter(c => c.length > 0);
  }
  const parallel = parsePositiveInt(options.parallel, '--parallel');
  if (parallel !== undefined) overrides.parallelDownloads = parallel;
  const maxIterations = parsePositiveInt(options.maxIterations, '--max-iterations');
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;
  if (options.cache !== undefined) overrides.cacheDir = path.resolve(cwd, options.cache);
  if (options.reorder === false) overrides.reorderResolvers = false;
  return overrides;
}

/**
 * Summary lines for a report: one header per configuration, one line per
 * module, and one line per artifact that failed.
 */
export function formatReportLines(report: UpdateReport): string[] {
  const lines: string[] = [];
  const renderConfiguration = (configuration: ConfigurationReport) => {
    lines.push(`[${configuration.configuration}] ${configuration.modules.length} module(s)`);
    for (const module of configuration.modules) {
      const { organization, name, revision } = module.module;
      lines.push(`  ${organization}:${name}:${revision} (${module.repositoryId})`);
      for (const artifact of module.artifacts) {
        if (artifact.status === 'failed') {
          lines.push(`    ✗ ${artifact.artifact.url}: ${describeFileError(artifact.error)}`);
        }
      }
    }
  };
  report.configurations.forEach(renderConfiguration);
  return lines;
}

function warningJson(warning: UnresolvedWarning) {
  return {
    unresolved: warning.resolveException.failed,
    messages: warning.resolveException.messages,
    failedPaths: warning.failedPaths
  };
}

function printOutcome(
  out: OutputPort,
  options: ResolveOptions,
  outcome: Result<UpdateReport, UnresolvedWarning>
): void {
  if (options.json) {
    console.log(JSON.stringify(outcome.ok ? outcome.data : warningJson(outcome.error), null, 2));
    return;
  }

  if (!outcome.ok) {
    out.warn(formatUnresolvedWarningLines(outcome.error).join('\n'));
    return;
  }

  const { stats } = outcome.data;
  out.note(formatReportLines(outcome.data).join('\n'), 'Resolution report');
  const summary = `${stats.modules} module(s), ${stats.artifacts} artifact(s)`;
  if (stats.failedArtifacts > 0) {
    out.warn(`${summary}, ${stats.failedArtifacts} failed to download`);
  } else {
    out.success(summary);
  }
}

/**
 * Resolve the module file's dependencies and fetch their artifacts.
 * Returns true when everything resolved and every artifact was fetched.
 */
export async function resolveCommand(
  moduleFileArg: string | undefined,
  options: ResolveOptions,
  ctx: ResolveCommandContext
): Promise<boolean> {
  const out = resolveOutput(ctx);
  const log = ctx.logger ?? defaultLogger;
  const moduleFilePath = path.resolve(ctx.cwd, moduleFileArg ?? FILE_PATTERNS.MODULE_YML);

  if (!(await exists(moduleFilePath))) {
    throw new ValidationError(`No ${FILE_PATTERNS.MODULE_YML} found at ${moduleFilePath}`);
  }

  const moduleFile = await parseModuleFile(moduleFilePath);
  const dirs = await ensureDepweaveDirectories(getDepweaveDirectories(ctx.homeDir));
  const config = await new ConfigManager(dirs).load();
  const defaults = createResolutionDefaults(dirs, config);
  const overrides = toOverrides(options, ctx.cwd);
  const conf = resolutionConfigurationFor(moduleFile, config, defaults, overrides);

  const resolution = new DependencyResolution(conf, defaults, {
    engine: ctx.engine ?? new DirectoryResolverEngine(),
    fetcher: ctx.fetcher ?? new FileSystemArtifactFetcher()
  });
  const platform = selectPlatform(moduleFile.settings, conf, defaults);

  const { organization, name, revision } = moduleFile.settings.module;
  const spinner = options.json ? null : out.spinner();
  spinner?.start(`Resolving ${organization}:${name}:${revision}`);

  let outcome: Result<UpdateReport, UnresolvedWarning>;
  try {
    outcome = await resolution.update(
      resolution.describe(moduleFile.settings),
      { offline: overrides.offline ?? false },
      warningConfigurationFor(moduleFile, platform),
      log
    );
  } finally {
    spinner?.stop();
  }

  printOutcome(out, options, outcome);
  return outcome.ok && outcome.data.stats.failedArtifacts === 0;
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve dependencies and fetch artifacts for a module file')
    .argument('[module-file]', `module file to resolve (default: ${FILE_PATTERNS.MODULE_YML})`)
    .option('--json', 'print the full report as JSON')
    .option('--offline', 'use cached artifacts only')
    .option('--classifiers <list>', 'comma-separated classifiers to fetch (e.g. sources,javadoc)')
    .option('--parallel <n>', 'maximum parallel resolutions and downloads')
    .option('--max-iterations <n>', 'maximum resolution iterations')
    .option('--cache <dir>', 'artifact cache directory')
    .option('--no-reorder', 'keep resolvers in declaration order')
    .action(withErrorHandling(async (moduleFile: string | undefined, options: ResolveOptions, command: Command) => {
      const ctx = createCliContext(command, { json: options.json });
      const success = await resolveCommand(moduleFile, options, ctx);
      if (!success) {
        process.exitCode = 1;
      }
    }));
}
