/**
 * Error taxonomy for termpost, built on the contracts error classes.
 *
 * Per-node rendering problems never throw: the renderer degrades them to
 * plain text and logs. Everything here is fatal for the operation that
 * raised it, and the CLI turns it into a message and a non-zero exit.
 */

import { NotFoundError, ValidationError } from "@outfitter/contracts";

export { NotFoundError, ValidationError };

export type ErrorCategory =
  | "malformed_input"
  | "invalid_configuration"
  | "date_parse"
  | "not_found"
  | "validation";

/** A document, feed or record is missing data the operation needs. */
export class MalformedInputError extends ValidationError {
  constructor(message: string) {
    super({ message });
  }
}

/** A setting is out of range or a required resource cannot be read. */
export class InvalidConfigurationError extends ValidationError {
  constructor(message: string) {
    super({ message });
  }
}

/** A post date does not match DD/MM/YYYY or names an impossible day. */
export class DateParseError extends ValidationError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super({ message: `Invalid post date '${input}': ${reason}` });
    this.input = input;
  }
}

/**
 * Category of a termpost error, for structured log context.
 */
export function errorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MalformedInputError) return "malformed_input";
  if (error instanceof InvalidConfigurationError) return "invalid_configuration";
  if (error instanceof DateParseError) return "date_parse";
  if (error instanceof NotFoundError) return "not_found";
  if (error instanceof ValidationError) return "validation";
  return undefined;
}

/** Message of an underlying failure, for wrapping into a typed error. */
export function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format an error and its cause chain for a one-line user message.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}
