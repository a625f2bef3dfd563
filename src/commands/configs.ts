import { Command } from 'commander';
import * as path from 'path';

import { FILE_PATTERNS } from '../constants/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { parseModuleFile } from '../utils/module-yml.js';
import { exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { configExtends, configurationClosures, configurationGraphs } from '../core/resolution/config-graph.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { createCliContext, type CommandContext } from '../cli/context.js';

interface ConfigsOptions {
  json?: boolean;
}

export interface ConfigurationOverview {
  sets: string[][];
  closures: Record<string, string[]>;
}

/**
 * Configuration sets and closures for a module file, sorted.
 */
export async function describeConfigurations(moduleFilePath: string): Promise<ConfigurationOverview> {
  const moduleFile = await parseModuleFile(moduleFilePath);
  const extendsMap = configExtends(moduleFile.settings.configurations, logger);

  const closures: Record<string, string[]> = {};
  for (const [name, closure] of configurationClosures(extendsMap)) {
    closures[name] = Array.from(closure).sort();
  }

  return {
    sets: configurationGraphs(extendsMap).map(set => [...set]),
    closures
  };
}

export async function configsCommand(
  moduleFileArg: string | undefined,
  options: ConfigsOptions,
  ctx: CommandContext
): Promise<void> {
  const moduleFilePath = path.resolve(ctx.cwd, moduleFileArg ?? FILE_PATTERNS.MODULE_YML);
  if (!(await exists(moduleFilePath))) {
    throw new ValidationError(`No ${FILE_PATTERNS.MODULE_YML} found at ${moduleFilePath}`);
  }

  const overview = await describeConfigurations(moduleFilePath);
  if (options.json) {
    console.log(JSON.stringify(overview, null, 2));
    return;
  }

  const out = resolveOutput(ctx);
  out.note(overview.sets.map(set => `{${set.join(', ')}}`).join('\n'), 'Configuration sets');
  for (const [name, closure] of Object.entries(overview.closures)) {
    out.message(`${name} -> ${closure.join(', ')}`);
  }
}

export function setupConfigsCommand(program: Command): void {
  program
    .command('configs')
    .description('Show how configurations group into resolution sets')
    .argument('[module-file]', `module file to inspect (default: ${FILE_PATTERNS.MODULE_YML})`)
    .option('--json', 'print as JSON')
    .action(withErrorHandling(async (moduleFile: string | undefined, options: ConfigsOptions, command: Command) => {
      await configsCommand(moduleFile, options, createCliContext(command, { json: options.json }));
    }));
}
