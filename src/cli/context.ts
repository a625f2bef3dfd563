/**
 * CLI Context Factory
 *
 * Picks the OutputPort for a command run: Clack in interactive terminals,
 * plain console output in CI, when piped, or when --json is requested.
 */

import * as path from 'path';
import type { Command } from 'commander';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

export interface CommandContext {
  cwd: string;
  output?: OutputPort;
}

export interface CliContextOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  json?: boolean;
}

/** Cached port singleton for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Build the context a command handler runs with, from the global options.
 */
export function createCliContext(command: Command, options: CliContextOptions = {}): CommandContext {
  const globals: { cwd?: unknown } = command.optsWithGlobals();
  const cwd = typeof globals.cwd === 'string' ? path.resolve(process.cwd(), globals.cwd) : process.cwd();

  if (options.json || !detectInteractive(options.interactive)) {
    return { cwd, output: consoleOutput };
  }
  cachedClackOutput ??= createClackOutput();
  return { cwd, output: cachedClackOutput };
}
