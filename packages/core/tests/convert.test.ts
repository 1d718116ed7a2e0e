import { describe, expect, test } from "vitest";

import { convertDocument } from "../src/convert";

const SOURCE = "# Notice\n\nThe login node restarts *tonight* at 22:00.\n";

describe("convertDocument", () => {
  test("writes the escape-styled body by default format", () => {
    expect(convertDocument(SOURCE, { format: "ansi" })).toBe(
      "\u001B[1mNotice\u001B[22m\nThe login node restarts \u001B[4mtonight\u001B[24m at 22:00.\n"
    );
  });

  test("writes markdown", () => {
    expect(convertDocument(SOURCE, { format: "markdown" })).toBe(
      "# Notice\nThe login node restarts _tonight_ at 22:00.\n"
    );
  });

  test("wraps the artifact when a width is given", () => {
    expect(convertDocument(SOURCE, { format: "markdown", wrapWidth: 24 })).toBe(
      "# Notice\nThe login node restarts\n_tonight_ at 22:00.\n"
    );
  });
});
