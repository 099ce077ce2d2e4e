import { CliError } from '../../src/lib/errors.js';

/**
 * Run fn and return the CliError it throws
 */
export function captureCliError(fn: () => unknown): CliError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CliError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a CliError to be thrown');
}
