/**
 * Word wrapping for text that carries escape sequences.
 *
 * Escape sequences are zero-width and never split. Lines that already fit
 * come back untouched, so wrapping is idempotent.
 */

import { type Logger, silentLogger } from "@termpost/shared";

import { InvalidConfigurationError } from "../errors";
import {
  type ActiveStyles,
  ESC,
  RESET,
  applySgr,
  hasActiveStyles,
  styleSequence,
} from "./style";

interface Token {
  readonly text: string;
  readonly escape: boolean;
}

/** True once a buffered escape sequence has seen its final byte. */
function isEscapeComplete(sequence: string): boolean {
  if (sequence.length < 2) {
    return false;
  }
  if (sequence[1] !== "[") {
    return true;
  }
  if (sequence.length < 3) {
    return false;
  }
  const final = sequence.charCodeAt(sequence.length - 1);
  return final >= 0x40 && final <= 0x7e;
}

/**
 * Split text into escape sequences and visible characters.
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pending = "";

  for (const char of text) {
    if (pending) {
      pending += char;
      if (isEscapeComplete(pending)) {
        tokens.push({ text: pending, escape: true });
        pending = "";
      }
      continue;
    }
    if (char === ESC) {
      pending = char;
      continue;
    }
    tokens.push({ text: char, escape: false });
  }

  if (pending) {
    tokens.push({ text: pending, escape: true });
  }
  return tokens;
}

/**
 * Remove every escape sequence from text.
 */
export function stripEscapes(text: string): string {
  return tokenize(text)
    .filter((token) => !token.escape)
    .map((token) => token.text)
    .join("");
}

/**
 * Number of visible characters (code points) in text.
 */
export function visibleLength(text: string): number {
  let count = 0;
  for (const token of tokenize(text)) {
    if (!token.escape) count += 1;
  }
  return count;
}

function isSpace(char: string): boolean {
  return char === " " || char === "\t";
}

class WrapState {
  /** Styles in effect at the end of the committed output. */
  readonly styles: ActiveStyles = {};

  constructor(readonly width: number) {}

  /** Follow style changes in a line that is passed through as-is. */
  track(line: string): void {
    for (const token of tokenize(line)) {
      if (token.escape) applySgr(this.styles, token.text);
    }
  }

  wrapLine(line: string): string[] {
    const lines: string[] = [];
    let current = "";
    let column = 0;
    let indent = "";
    let leading = true;
    let hasWord = false;

    let gap: Token[] = [];
    let gapWidth = 0;
    let word: Token[] = [];
    let wordWidth = 0;

    const commit = (tokens: readonly Token[], visible: boolean): void => {
      for (const token of tokens) {
        if (token.escape) {
          applySgr(this.styles, token.text);
          current += token.text;
        } else if (visible) {
          current += token.text;
        }
      }
    };

    const placeWord = (): void => {
      if (!hasWord) {
        // Leading whitespace is dropped when it cannot share a line with the first word.
        const keepIndent = gapWidth + wordWidth <= this.width;
        commit(gap, keepIndent);
        column += keepIndent ? gapWidth : 0;
      } else if (column + gapWidth + wordWidth <= this.width) {
        commit(gap, true);
        column += gapWidth;
      } else {
        if (hasActiveStyles(this.styles)) current += RESET;
        lines.push(current);
        const carried = indent.length + wordWidth <= this.width ? indent : "";
        current = `${carried}${styleSequence(this.styles)}`;
        column = carried.length;
        commit(gap, false);
      }
      commit(word, true);
      column += wordWidth;
      hasWord = true;
      gap = [];
      gapWidth = 0;
      word = [];
      wordWidth = 0;
    };

    for (const token of tokenize(line)) {
      if (token.escape) {
        (word.length > 0 ? word : gap).push(token);
        continue;
      }
      if (isSpace(token.text)) {
        if (wordWidth > 0) placeWord();
        gap.push(token);
        gapWidth += 1;
        if (leading) indent += token.text;
        continue;
      }
      leading = false;
      word.push(token);
      wordWidth += 1;
    }

    if (wordWidth > 0) {
      placeWord();
    }
    // Trailing whitespace is kept only while it fits.
    commit(gap, column + gapWidth <= this.width);
    lines.push(current);
    return lines;
  }
}

export interface WrapOptions {
  logger?: Logger;
}

/**
 * Wrap lines to a column width, treating escape sequences as zero-width.
 *
 * Breaks happen at the last whitespace at or before the limit; a single
 * token longer than the width stays whole on its own line. Continuation
 * lines repeat the source line's indentation where the next word still fits
 * after it, and re-emit the styles active at the break.
 */
export function wrap(
  lines: readonly string[],
  width: number,
  options: WrapOptions = {}
): string[] {
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidConfigurationError(
      `Wrap width must be a positive integer, got ${width}`
    );
  }
  const logger = options.logger ?? silentLogger;
  const state = new WrapState(width);
  const wrapped: string[] = [];

  for (const line of lines) {
    if (visibleLength(line) <= width) {
      state.track(line);
      wrapped.push(line);
      continue;
    }
    const parts = state.wrapLine(line);
    logger.debug("Wrapped long line", {
      visible: visibleLength(line),
      lines: parts.length,
    });
    wrapped.push(...parts);
  }

  return wrapped;
}

/**
 * Wrap a block of text, splitting and joining on newlines.
 */
export function wrapText(
  text: string,
  width: number,
  options: WrapOptions = {}
): string {
  return wrap(text.split("\n"), width, options).join("\n");
}
