import { Result } from "@outfitter/contracts";

import { DateParseError } from "../errors";

const POST_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Parse a post date in DD/MM/YYYY form into midnight UTC of that day.
 */
export function parsePostDate(value: string): Result<Date, DateParseError> {
  const trimmed = value.trim();
  const match = POST_DATE_PATTERN.exec(trimmed);
  if (!match) {
    return Result.err(new DateParseError(value, "expected format DD/MM/YYYY"));
  }

  const day = Number.parseInt(match[1] ?? "", 10);
  const month = Number.parseInt(match[2] ?? "", 10);
  const year = Number.parseInt(match[3] ?? "", 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return Result.err(new DateParseError(value, "no such calendar day"));
  }
  return Result.ok(date);
}

/**
 * Format a date as DD/MM/YYYY using its UTC calendar day.
 */
export function formatPostDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

/**
 * Milliseconds elapsed between publication and now.
 */
export function postAgeMs(postDate: Date, now: Date): number {
  return now.getTime() - postDate.getTime();
}
