/**
 * Raised when a source file cannot be turned into a signature tree.
 * The linter records it for that file and moves on to the next one.
 */
export class UnanalyzableUnitError extends Error {
  readonly filePath: string;
  readonly reason: string;

  constructor(filePath: string, reason: string) {
    super(`Cannot analyze ${filePath}: ${reason}`);
    this.name = 'UnanalyzableUnitError';
    this.filePath = filePath;
    this.reason = reason;
  }
}
