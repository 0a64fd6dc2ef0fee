/**
 * Error types for devstrip
 *
 * Filesystem problems during a scan are not errors: they become warnings.
 * These classes cover the fatal cases only.
 */

/**
 * Invalid scan configuration. Raised before any traversal begins.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A structural invariant of the plan was broken (a bug in the walker).
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * Read the `code` of a Node.js filesystem error, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
