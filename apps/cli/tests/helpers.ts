import { vi } from "vitest";

export interface CliResult {
  exitCode: number;
  stdout: string;
  /** Lines logged to stderr through the logger. */
  stderr: string[];
}

const formatChunk = (chunk: string | Uint8Array): string =>
  typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");

/**
 * Run the CLI in process, capturing stdout and logger output.
 */
export async function runCli(
  run: (argv: readonly string[]) => Promise<number>,
  args: string[]
): Promise<CliResult> {
  const chunks: string[] = [];
  const write = vi
    .spyOn(process.stdout, "write")
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(formatChunk(chunk));
      return true;
    });
  const error = vi.spyOn(console, "error").mockImplementation(() => {});

  try {
    const exitCode = await run(["node", "termpost", "--no-color", ...args]);
    return {
      exitCode,
      stdout: chunks.join(""),
      stderr: error.mock.calls.map((call) => String(call[0])),
    };
  } finally {
    write.mockRestore();
    error.mockRestore();
  }
}
