/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for rich interactive terminal UI.
 */

import { log, note as clackNote } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

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
    }
  };
}

/**
 * Clack output on a terminal, plain console output otherwise (CI, pipes)
 */
export function createCliOutput(): OutputPort {
  return process.stdout.isTTY ? createClackOutput() : consoleOutput;
}
