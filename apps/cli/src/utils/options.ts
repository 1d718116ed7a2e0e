import { type Logger, type LogLevel, createLogger } from "@termpost/shared";
import { type Command, InvalidArgumentError } from "commander";

export interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
  color?: boolean;
}

/** Commander parser for counts and widths. */
export function parseNonNegativeInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/** Commander parser for ISO 8601 timestamps. */
export function parseTimestamp(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError("Expected an ISO 8601 timestamp.");
  }
  return date;
}

function levelFor(options: GlobalOptions): LogLevel {
  if (options.debug) {
    return "debug";
  }
  return options.verbose ? "info" : "warn";
}

/**
 * Logger for a command run. Everything goes to stderr so stdout only
 * carries artifacts and command output.
 */
export function commandLogger(command: Command): Logger {
  const options = command.optsWithGlobals<GlobalOptions>();
  return createLogger({
    level: levelFor(options),
    stderrOnly: true,
    context: { command: command.name() },
  });
}
