/**
 * Exception wrapper for callers that treat a Theta error as fatal.
 *
 * @packageDocumentation
 */

import { renderError } from './render.js';
import type { Result, ThetaError } from './types.js';

/**
 * Error class carrying a structured {@link ThetaError}.
 */
export class ThetaException extends Error {
  /** The structured error. */
  public readonly error: ThetaError;

  /**
   * Creates a new ThetaException whose message is the rendered error.
   *
   * @param error - The structured error.
   */
  constructor(error: ThetaError) {
    super(renderError(error));
    this.name = 'ThetaException';
    this.error = error;
  }
}

/**
 * Extracts the value of a result, throwing a {@link ThetaException} on failure.
 *
 * Meant for inputs that are known to be valid, where a failure is a bug
 * rather than a problem with the input.
 *
 * @throws ThetaException if the result is a failure.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw new ThetaException(result.error);
  }
  return result.value;
}
