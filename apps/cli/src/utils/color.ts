/**
 * Centralized color handling using ansis with lazy initialization.
 *
 * ansis evaluates color support at module load time, but --no-color is
 * processed after imports. The color decision is deferred until first use.
 */
import ansis, { Ansis } from "ansis";

let colorInstance: Ansis | null = null;

/**
 * Determine if color should be used.
 * Respects NO_COLOR, FORCE_COLOR, and TERM=dumb conventions.
 */
function shouldUseColor(): boolean {
  if (process.env["NO_COLOR"]) {
    return false;
  }
  if (process.env["FORCE_COLOR"]) {
    return true;
  }
  if (process.env["TERM"] === "dumb") {
    return false;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Get the ansis instance, initializing on first access.
 */
export function getAnsis(): Ansis {
  if (!colorInstance) {
    colorInstance = shouldUseColor() ? ansis : new Ansis(0);
  }
  return colorInstance;
}

/** Force color off for the rest of the run (--no-color). */
export function disableColor(): void {
  colorInstance = new Ansis(0);
}

type ColorFn = (text: string) => string;

const createColorFn =
  (getter: (a: Ansis) => ColorFn): ColorFn =>
  (text: string) =>
    getter(getAnsis())(text);

export const c = {
  green: createColorFn((a) => a.green),
  yellow: createColorFn((a) => a.yellow),
  dim: createColorFn((a) => a.dim),
  bold: createColorFn((a) => a.bold),
} as const;

/** Color for an MOTD state label. */
export function getStateColor(state: string): ColorFn {
  switch (state) {
    case "fresh":
      return c.green;
    case "stale":
      return c.yellow;
    default:
      return (s: string) => s;
  }
}
