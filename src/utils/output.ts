/**
 * Output utilities for CLI
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

/**
 * Print progress or a result to stdout.
 * In JSON mode only structured data is printed; plain progress lines are dropped
 * so stdout stays parseable.
 */
export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    if (typeof data !== 'string') {
      console.log(JSON.stringify(data, null, 2));
    }
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: Error): void {
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      details: error?.message,
    }));
  } else {
    console.error(`Error: ${message}`);
    if (error && globalOptions.verbose) {
      console.error(error.stack);
    }
  }
}

/**
 * Mask sensitive values for display
 */
export function maskSecret(value: string, showChars: number = 4): string {
  if (value.length <= showChars * 2) {
    return '****';
  }
  return value.slice(0, showChars) + '****' + value.slice(-showChars);
}
