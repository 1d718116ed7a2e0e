/**
 * Style codec: semantic style intents to SGR escape sequences and their
 * markdown equivalents.
 */

export const ESC = "\u001B";
const CSI = `${ESC}[`;

export type StyleIntent =
  | "bold-on"
  | "bold-off"
  | "underline-on"
  | "underline-off"
  | "inverse-on"
  | "inverse-off"
  | "background-red"
  | "background-green"
  | "reset";

export interface StyleRun {
  readonly escape: string;
  readonly markdown: string;
}

const sgr = (code: number): string => `${CSI}${code}m`;

export const STYLE_RUNS: Readonly<Record<StyleIntent, StyleRun>> = {
  "bold-on": { escape: sgr(1), markdown: "**" },
  "bold-off": { escape: sgr(22), markdown: "**" },
  "underline-on": { escape: sgr(4), markdown: "_" },
  "underline-off": { escape: sgr(24), markdown: "_" },
  "inverse-on": { escape: sgr(7), markdown: "`" },
  "inverse-off": { escape: sgr(27), markdown: "`" },
  "background-red": { escape: sgr(41), markdown: "" },
  "background-green": { escape: sgr(42), markdown: "" },
  reset: { escape: sgr(0), markdown: "" },
};

/**
 * Look up the escape sequence and markdown text for a style intent.
 */
export function encode(intent: StyleIntent): StyleRun {
  const run = STYLE_RUNS[intent];
  if (!run) {
    throw new Error(`Unknown style intent: ${String(intent)}`);
  }
  return run;
}

// --------------------------------------------------------------------------
// Active style tracking
// --------------------------------------------------------------------------

/** Style attributes an SGR sequence can switch independently. */
export type StyleSlot =
  | "weight"
  | "italic"
  | "underline"
  | "blink"
  | "inverse"
  | "conceal"
  | "strike"
  | "foreground"
  | "background";

/** Active SGR parameter per slot. A missing slot is at its default. */
export type ActiveStyles = Partial<Record<StyleSlot, string>>;

/** Order in which active styles are re-emitted. */
const SLOT_ORDER: readonly StyleSlot[] = [
  "weight",
  "italic",
  "underline",
  "blink",
  "inverse",
  "conceal",
  "strike",
  "foreground",
  "background",
];

const SGR_PATTERN = /^\u001B\[([0-9;]*)m$/;

/**
 * Apply one SGR parameter to the active style set.
 * Returns the number of extra parameters consumed (extended colours).
 */
function applyParam(
  styles: ActiveStyles,
  params: readonly number[],
  index: number
): number {
  const code = params[index] ?? 0;
  const set = (slot: StyleSlot, value: string | undefined): void => {
    if (value === undefined) {
      delete styles[slot];
    } else {
      styles[slot] = value;
    }
  };

  switch (true) {
    case code === 0:
      for (const slot of SLOT_ORDER) delete styles[slot];
      return 0;
    case code === 1 || code === 2:
      set("weight", String(code));
      return 0;
    case code === 22:
      set("weight", undefined);
      return 0;
    case code === 3:
      set("italic", "3");
      return 0;
    case code === 23:
      set("italic", undefined);
      return 0;
    case code === 4:
      set("underline", "4");
      return 0;
    case code === 24:
      set("underline", undefined);
      return 0;
    case code === 5 || code === 6:
      set("blink", String(code));
      return 0;
    case code === 25:
      set("blink", undefined);
      return 0;
    case code === 7:
      set("inverse", "7");
      return 0;
    case code === 27:
      set("inverse", undefined);
      return 0;
    case code === 8:
      set("conceal", "8");
      return 0;
    case code === 28:
      set("conceal", undefined);
      return 0;
    case code === 9:
      set("strike", "9");
      return 0;
    case code === 29:
      set("strike", undefined);
      return 0;
    case code === 38 || code === 48: {
      const slot: StyleSlot = code === 38 ? "foreground" : "background";
      const mode = params[index + 1];
      if (mode === 5) {
        set(slot, `${code};5;${params[index + 2] ?? 0}`);
        return 2;
      }
      if (mode === 2) {
        const rgb = [2, 3, 4].map((offset) => params[index + offset] ?? 0);
        set(slot, `${code};2;${rgb.join(";")}`);
        return 4;
      }
      return 0;
    }
    case code === 39:
      set("foreground", undefined);
      return 0;
    case code === 49:
      set("background", undefined);
      return 0;
    case (code >= 30 && code <= 37) || (code >= 90 && code <= 97):
      set("foreground", String(code));
      return 0;
    case (code >= 40 && code <= 47) || (code >= 100 && code <= 107):
      set("background", String(code));
      return 0;
    default:
      return 0;
  }
}

/**
 * Update the active style set with an escape sequence.
 * Sequences other than SGR leave the set unchanged.
 */
export function applySgr(styles: ActiveStyles, sequence: string): void {
  const match = SGR_PATTERN.exec(sequence);
  if (!match) {
    return;
  }
  const body = match[1] ?? "";
  const params =
    body === ""
      ? [0]
      : body.split(";").map((part) => (part === "" ? 0 : Number(part)));

  for (let i = 0; i < params.length; i += 1) {
    i += applyParam(styles, params, i);
  }
}

/**
 * Styles switched on by a single escape sequence, as a fresh set.
 */
export function decodeSgr(sequence: string): ActiveStyles {
  const styles: ActiveStyles = {};
  applySgr(styles, sequence);
  return styles;
}

/** True when at least one slot is away from its default. */
export function hasActiveStyles(styles: ActiveStyles): boolean {
  return SLOT_ORDER.some((slot) => styles[slot] !== undefined);
}

/**
 * Escape sequence that re-establishes the active styles, or "" if none.
 */
export function styleSequence(styles: ActiveStyles): string {
  const params = SLOT_ORDER.flatMap((slot) => {
    const value = styles[slot];
    return value === undefined ? [] : [value];
  });
  return params.length > 0 ? `${CSI}${params.join(";")}m` : "";
}

export const RESET = STYLE_RUNS.reset.escape;
