/**
 * Progress spinner
 *
 * - Automatic TTY detection
 * - JSON mode support
 * - Consistent braille frames
 *
 * SIGINT is deliberately not handled here: the survey's cancellation scope
 * owns it, so Ctrl-C stops the running query rather than the process.
 */

import ora, { type Ora } from 'ora';
import { getOutputOptions } from './output.js';
import { isInteractiveTTY, isPowerShellHost } from './platform.js';

/** Braille spinner frames (consistent across the app) */
export const BRAILLE_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface SpinnerOptions {
  /** Initial text to display */
  text: string;
  /** Stream to output to (default: stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Check if spinner should be shown
 *
 * 1. --json mode → false
 * 2. Not interactive TTY → false
 * 3. PowerShell host → false
 */
function shouldShowSpinner(): boolean {
  if (getOutputOptions().json) {
    return false;
  }
  if (!isInteractiveTTY()) {
    return false;
  }
  return !isPowerShellHost();
}

/**
 * Create and start a spinner
 *
 * @returns Ora spinner instance or null if spinner disabled
 */
export function createSpinner(options: SpinnerOptions): Ora | null {
  if (!shouldShowSpinner()) {
    return null;
  }

  const spinner = ora({
    text: options.text,
    stream: options.stream || process.stderr,
    spinner: {
      frames: BRAILLE_FRAMES,
      interval: 80,
    },
  });

  spinner.start();
  return spinner;
}

/**
 * Run an async operation with a spinner
 *
 * @example
 * ```typescript
 * const results = await withSpinner('Searching...', () => search(query));
 * ```
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  successText?: string,
  failText?: string
): Promise<T> {
  const spinner = createSpinner({ text });

  try {
    const result = await fn();
    if (spinner) {
      if (successText) {
        spinner.succeed(successText);
      } else {
        spinner.stop();
      }
    }
    return result;
  } catch (error) {
    if (spinner) {
      spinner.fail(failText);
    }
    throw error;
  }
}
