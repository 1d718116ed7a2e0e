import { once } from "node:events";

/** Write text to stdout, waiting for the stream to drain when needed. */
export async function writeStdout(text: string): Promise<void> {
  if (!process.stdout.write(text)) {
    await once(process.stdout, "drain");
  }
}

export async function writeJsonLine(value: unknown): Promise<void> {
  const serialized = JSON.stringify(value);
  await writeStdout(`${serialized ?? "null"}\n`);
}

/** Pretty-printed JSON document. */
export async function writeJson(value: unknown): Promise<void> {
  const serialized = JSON.stringify(value, null, 2);
  await writeStdout(`${serialized ?? "null"}\n`);
}

/**
 * Determine if output should be JSON:
 * 1. --json flag
 * 2. TERMPOST_JSON env var ("1" or "0")
 * 3. human-readable otherwise
 */
export function shouldOutputJson(options: { json?: boolean }): boolean {
  if (options.json !== undefined) {
    return options.json;
  }
  return process.env["TERMPOST_JSON"] === "1";
}
