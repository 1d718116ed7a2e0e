/**
 * Message-of-the-day assembly.
 *
 * A post is shown while it is fresh; afterwards the pre-formatted fallback
 * is published as-is. The decision is made once per call from the injected
 * `now`, so repeated runs may differ as the clock moves.
 */

import { type Logger, silentLogger } from "@termpost/shared";

import { InvalidConfigurationError } from "../errors";
import { stripEscapes, wrap } from "../render/wrap";
import { HOUR_MS, postAgeMs } from "./date";

export type MotdState = "fresh" | "stale";

export interface AssembleOptions {
  /** Rendered post body (already reduced to a briefing upstream if wanted). */
  renderedBody: string;
  postDate: Date;
  now: Date;
  /** Hours a post stays fresh. 0 keeps it fresh forever. */
  lifespanHours: number;
  /** Published verbatim once the post is stale. */
  fallbackBody: string;
  headerBody?: string;
  footerBody?: string;
  /** Link shown between body and footer. */
  footerLink?: string;
  /** Column width for wrapping. 0 disables wrapping. */
  wrapWidth: number;
  /** Spaces in front of every non-blank line of a fresh MOTD. */
  indent?: number;
  logger?: Logger;
}

export interface MotdResult {
  state: MotdState;
  ageMs: number;
  text: string;
}

const URL_PATTERN = /https?:\/\/\S+/g;

function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidConfigurationError(
      `${name} must be a non-negative integer, got ${value}`
    );
  }
}

function trimTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, "");
}

/**
 * Decide between the post and the fallback.
 */
export function selectState(ageMs: number, lifespanHours: number): MotdState {
  if (lifespanHours === 0) {
    return "fresh";
  }
  return ageMs < lifespanHours * HOUR_MS ? "fresh" : "stale";
}

/**
 * Join header, body, link block and footer into one block of text.
 */
export function composeParts(
  body: string,
  parts: { header?: string; footer?: string; link?: string } = {}
): string {
  const linkBlock = parts.link ? `\nMore information in\n${parts.link}` : "";
  return [parts.header, body, linkBlock, parts.footer]
    .filter((part): part is string => Boolean(part))
    .map(trimTrailingNewlines)
    .join("\n");
}

/**
 * Indent every non-blank line by a number of spaces.
 */
export function indentLines(lines: readonly string[], spaces: number): string[] {
  if (spaces === 0) {
    return [...lines];
  }
  const pad = " ".repeat(spaces);
  return lines.map((line) => (line.trim() ? `${pad}${line}` : line));
}

function warnLongUrls(text: string, width: number, logger: Logger): void {
  for (const url of stripEscapes(text).match(URL_PATTERN) ?? []) {
    if (url.length > width) {
      logger.warn("URL longer than MOTD width", {
        url,
        length: url.length,
        width,
      });
    }
  }
}

/**
 * Build the final MOTD text.
 */
export function assemble(options: AssembleOptions): MotdResult {
  const logger = options.logger ?? silentLogger;
  const indent = options.indent ?? 0;

  requireNonNegativeInteger("Lifespan hours", options.lifespanHours);
  requireNonNegativeInteger("Wrap width", options.wrapWidth);
  requireNonNegativeInteger("Indent", indent);
  if (Number.isNaN(options.postDate.getTime())) {
    throw new InvalidConfigurationError("Post date is not a valid date");
  }

  const ageMs = postAgeMs(options.postDate, options.now);
  const state = selectState(ageMs, options.lifespanHours);
  logger.info("Selected MOTD body", {
    state,
    age_hours: Math.floor(ageMs / HOUR_MS),
    lifespan_hours: options.lifespanHours,
  });

  if (state === "stale") {
    return { state, ageMs, text: options.fallbackBody };
  }

  const composed = composeParts(options.renderedBody, {
    ...(options.headerBody !== undefined && { header: options.headerBody }),
    ...(options.footerBody !== undefined && { footer: options.footerBody }),
    ...(options.footerLink !== undefined && { link: options.footerLink }),
  });

  let lines = composed.split("\n");
  if (options.wrapWidth > 0) {
    warnLongUrls(composed, options.wrapWidth, logger);
    lines = wrap(lines, options.wrapWidth, { logger });
  }
  lines = indentLines(lines, indent);

  return { state, ageMs, text: `${lines.join("\n")}\n` };
}
