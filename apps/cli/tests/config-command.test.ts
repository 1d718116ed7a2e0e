import { afterAll, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runCli } from "./helpers";

const tempRoot = await mkdtemp(join(tmpdir(), "termpost-cli-config-"));
process.env["XDG_CONFIG_HOME"] = tempRoot;

const { run } = await import("../src/index");

afterAll(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

test("prints the resolved configuration", async () => {
  const result = await runCli(run, ["config"]);
  expect(result.exitCode).toBe(0);
  expect(JSON.parse(result.stdout)).toEqual({
    wrap_width: 80,
    indent: 2,
    source_extension: ".md",
    format: "ansi",
    motd: { lifespan_hours: 72, briefing: false },
  });
});

test("sets and reads back a key in the user config", async () => {
  const set = await runCli(run, ["config", "motd.lifespan_hours", "12"]);
  expect(set.stdout).toBe("Set motd.lifespan_hours = 12\n");
  expect(await readFile(join(tempRoot, "termpost", "config.toml"), "utf8")).toBe(
    "# termpost configuration\n\n[motd]\nlifespan_hours = 12\n"
  );

  const get = await runCli(run, ["config", "motd.lifespan_hours"]);
  expect(get.stdout).toBe("12\n");
});

test("rejects invalid values", async () => {
  const result = await runCli(run, ["config", "indent", "wide"]);
  expect(result.exitCode).toBe(1);
  expect(result.stderr[0]).toContain("[error] Invalid value for indent");
});
