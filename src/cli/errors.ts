/**
 * Mapping thrown errors to process exit codes
 */

import { InternalError, UsageError } from '../errors.js';
import { EXIT_CODES } from '../events/index.js';

function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) return EXIT_CODES.usage;
  if (error instanceof InternalError) return EXIT_CODES.internal;
  if (isSystemError(error)) return EXIT_CODES.io;
  return EXIT_CODES.usage;
}

/**
 * Print an error the way every command does and return its exit code.
 */
export function reportError(error: unknown): number {
  const label = error instanceof InternalError ? 'Internal error:' : 'Error:';
  console.error(label, error instanceof Error ? error.message : error);
  return exitCodeFor(error);
}
