import { afterAll, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runCli } from "./helpers";

const tempRoot = await mkdtemp(join(tmpdir(), "termpost-cli-"));
process.env["XDG_CONFIG_HOME"] = join(tempRoot, "xdg");

const { run } = await import("../src/index");

const BOLD = "\u001B[1m";
const UNBOLD = "\u001B[22m";

const site = join(tempRoot, "site");
const postPath = join(site, "posts", "2021", "maintenance.md");
const feedPath = join(site, "_website", "news", "index.html");
const partsDir = join(tempRoot, "parts");

await mkdir(join(site, "posts", "2021"), { recursive: true });
await mkdir(join(site, "_website", "news"), { recursive: true });
await mkdir(partsDir, { recursive: true });

await writeFile(
  postPath,
  [
    "---",
    "title: Maintenance window",
    "date: 29/03/2021",
    "---",
    "",
    "# Maintenance window",
    "",
    "The cluster is **offline** on Monday.",
    "",
    "More details follow.",
    "",
  ].join("\n")
);
await writeFile(
  feedPath,
  `<html><body><div class="section">
  <h2><a href="../../posts/2021/maintenance/">Maintenance window</a></h2>
  <ul><li><i class="fa fa-calendar"></i> 29/03/2021</li></ul>
</div></body></html>`
);
await writeFile(join(partsDir, "header.txt"), "Welcome to the cluster\n");
await writeFile(join(partsDir, "footer.txt"), "Support: help desk\n");
await writeFile(join(partsDir, "fallback.txt"), "No news.\n");

afterAll(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

const ESCAPE_BODY = [
  `${BOLD}Maintenance window${UNBOLD}`,
  `The cluster is ${BOLD}offline${UNBOLD} on Monday.`,
  "",
  "More details follow.",
].join("\n");

describe("convert", () => {
  test("writes the escape-styled body beside the input", async () => {
    const outputPath = join(site, "posts", "2021", "maintenance.ansi");
    const result = await runCli(run, ["convert", postPath]);

    expect(result).toEqual({ exitCode: 0, stdout: `Wrote ${outputPath}\n`, stderr: [] });
    expect(await readFile(outputPath, "utf8")).toBe(`${ESCAPE_BODY}\n`);
  });

  test("refuses to replace an existing output without --force", async () => {
    const outputPath = join(tempRoot, "existing.ansi");
    await writeFile(outputPath, "keep\n");

    const refused = await runCli(run, ["convert", postPath, "-o", outputPath]);
    expect(refused.exitCode).toBe(1);
    expect(refused.stderr[0]).toContain(
      `[error] Output file already exists: '${outputPath}' (use --force to replace it)`
    );
    expect(await readFile(outputPath, "utf8")).toBe("keep\n");

    const forced = await runCli(run, ["convert", postPath, "-o", outputPath, "--force"]);
    expect(forced.exitCode).toBe(0);
    expect(await readFile(outputPath, "utf8")).toBe(`${ESCAPE_BODY}\n`);
  });

  test("writes markdown to stdout", async () => {
    const result = await runCli(run, [
      "convert",
      postPath,
      "--format",
      "markdown",
      "-o",
      "-",
    ]);
    expect(result.stdout).toBe(
      "# Maintenance window\nThe cluster is **offline** on Monday.\n\nMore details follow.\n"
    );
  });

  test("fails on a missing source", async () => {
    const missing = join(tempRoot, "missing.md");
    const result = await runCli(run, ["convert", missing]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr[0]).toContain(`[error] Source file not found: '${missing}'`);
  });

  test("rejects a malformed width", async () => {
    const result = await runCli(run, ["convert", postPath, "--width", "wide", "-o", "-"]);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe("");
  });
});

describe("info", () => {
  test("prints title and date as JSON", async () => {
    const result = await runCli(run, ["info", postPath, "--json"]);
    expect(JSON.parse(result.stdout)).toEqual({
      title: "Maintenance window",
      date: "29/03/2021",
      source: postPath,
    });
  });
});

describe("motd", () => {
  test("shows a fresh post", async () => {
    const result = await runCli(run, [
      "motd",
      "--feed",
      feedPath,
      "--now",
      "2021-03-30T12:00:00Z",
      "--indent",
      "0",
    ]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(`${ESCAPE_BODY}\n`);
  });

  test("frames a briefing with header, link and footer", async () => {
    const outputPath = join(tempRoot, "motd.txt");
    const result = await runCli(run, [
      "motd",
      "--feed",
      feedPath,
      "--now",
      "2021-03-30T12:00:00Z",
      "--briefing",
      "--header",
      join(partsDir, "header.txt"),
      "--footer",
      join(partsDir, "footer.txt"),
      "--link-base",
      "https://example.org/news/",
      "--indent",
      "2",
      "-o",
      outputPath,
    ]);

    expect(result.stdout).toBe(`Wrote ${outputPath} (fresh)\n`);
    expect(await readFile(outputPath, "utf8")).toBe(
      [
        "  Welcome to the cluster",
        `  ${BOLD}Maintenance window${UNBOLD}`,
        `  The cluster is ${BOLD}offline${UNBOLD} on Monday.`,
        "",
        "  More information in",
        "  https://example.org/news/posts/2021/maintenance/",
        "  Support: help desk",
        "",
      ].join("\n")
    );
  });

  test("publishes the fallback once the post is stale", async () => {
    const result = await runCli(run, [
      "motd",
      "--feed",
      feedPath,
      "--now",
      "2021-04-02T00:00:00Z",
      "--fallback",
      join(partsDir, "fallback.txt"),
    ]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("No news.\n");
  });

  test("publishes the fallback for a stale post whose source is gone", async () => {
    const oldFeed = join(site, "_website", "news", "archive.html");
    await writeFile(
      oldFeed,
      `<html><body>
  <h2><a href="../../posts/2020/removed/">Removed post</a></h2>
  <ul><li><i class="fa fa-calendar"></i> 01/01/2020</li></ul>
</body></html>`
    );

    const result = await runCli(run, [
      "motd",
      "--feed",
      oldFeed,
      "--now",
      "2021-03-30T12:00:00Z",
      "--fallback",
      join(partsDir, "fallback.txt"),
      "--header",
      join(partsDir, "missing-header.txt"),
    ]);

    expect(result).toEqual({ exitCode: 0, stdout: "No news.\n", stderr: [] });
  });

  test("fails on a feed without posts", async () => {
    const emptyFeed = join(site, "_website", "empty.html");
    await writeFile(emptyFeed, "<html><body><p>Nothing yet</p></body></html>");

    const result = await runCli(run, ["motd", "--feed", emptyFeed]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr[0]).toContain("[error] Malformed HTML news feed");
  });
});
