/**
 * Invalid or conflicting command-line input. Always raised before the output
 * file is opened and before any network call.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}
