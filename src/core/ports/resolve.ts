/**
 * Port Resolution Helpers
 *
 * Resolve the OutputPort from a command context, falling back to plain
 * console output when none is provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
