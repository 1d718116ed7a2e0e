import { describe, expect, test } from "vitest";

import { InvalidConfigurationError } from "../src/errors";
import { stripEscapes, visibleLength, wrap, wrapText } from "../src/render/wrap";

const BOLD = "\u001B[1m";
const UNBOLD = "\u001B[22m";
const RESET = "\u001B[0m";

describe("visibleLength", () => {
  test("ignores escape sequences", () => {
    expect(visibleLength(`${BOLD}ab${RESET}`)).toBe(2);
    expect(stripEscapes(`${BOLD}ab${RESET} c`)).toBe("ab c");
  });

  test("counts code points", () => {
    expect(visibleLength("né😀")).toBe(3);
  });
});

describe("wrap", () => {
  test("leaves fitting lines untouched", () => {
    expect(wrap(["short", `${BOLD}bold${UNBOLD}`], 10)).toEqual([
      "short",
      `${BOLD}bold${UNBOLD}`,
    ]);
  });

  test("breaks at the last space before the limit", () => {
    expect(wrap(["the quick brown fox"], 10)).toEqual(["the quick", "brown fox"]);
  });

  test("repeats leading indentation on continuation lines", () => {
    expect(wrap(["  alpha beta gamma"], 12)).toEqual(["  alpha beta", "  gamma"]);
  });

  test("drops indentation that leaves no room for the words", () => {
    expect(wrap(["    aaaa bbbb"], 6)).toEqual(["aaaa", "bbbb"]);
  });

  test("repeats indentation only where the next word fits after it", () => {
    expect(wrap(["    aa bbbb cc"], 8)).toEqual(["    aa", "    bbbb", "    cc"]);
    expect(wrap(["  aa bbbbbb"], 7)).toEqual(["  aa", "bbbbbb"]);
  });

  test("keeps a token longer than the width whole", () => {
    expect(wrap(["a verylongwordhere b"], 5)).toEqual(["a", "verylongwordhere", "b"]);
  });

  test("resets styles at a break and restores them on the next line", () => {
    expect(wrap([`${BOLD}bold text here${UNBOLD} after`], 10)).toEqual([
      `${BOLD}bold text${RESET}`,
      `${BOLD}here${UNBOLD} after`,
    ]);
  });

  test("carries styles opened on an earlier line", () => {
    expect(wrap([`${BOLD}open`, "one two three"], 7)).toEqual([
      `${BOLD}open`,
      `one two${RESET}`,
      `${BOLD}three`,
    ]);
  });

  test("is idempotent", () => {
    const once = wrap([`${BOLD}bold text here${UNBOLD} after`, "the quick brown fox"], 10);
    expect(wrap(once, 10)).toEqual(once);
  });

  test("bounds every line when no token exceeds the width", () => {
    const lines = wrap(
      ["Scheduled maintenance of the storage cluster starts on Monday morning"],
      16
    );
    for (const line of lines) {
      expect(visibleLength(line)).toBeLessThanOrEqual(16);
    }
    expect(lines.join(" ")).toBe(
      "Scheduled maintenance of the storage cluster starts on Monday morning"
    );
  });

  test("rejects a width that is not a positive integer", () => {
    expect(() => wrap(["x"], 0)).toThrow(InvalidConfigurationError);
    expect(() => wrap(["x"], 2.5)).toThrow(InvalidConfigurationError);
  });

  test("wrapText splits and joins on newlines", () => {
    expect(wrapText("one two\nthree", 3)).toBe("one\ntwo\nthree");
  });
});
