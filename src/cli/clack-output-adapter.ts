/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for rich interactive terminal UI.
 *
 * This is the CLI's implementation of the OutputPort interface defined
 * in core/ports/output.ts.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            if (finalMessage) {
              s.stop(finalMessage);
            } else {
              s.stop();
            }
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}
