import { type Logger, silentLogger } from "@termpost/shared";
import { readFile, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, parse, resolve, sep } from "node:path";

import { InvalidConfigurationError, NotFoundError, reasonOf } from "./errors";

/** Directory under which the built website lives, beside the sources. */
export const WEBSITE_DIR = "_website";

/**
 * File name of `path` with its extension replaced.
 * @example changeExtension("posts/hello.md", ".ansi") // "hello.ansi"
 */
export function changeExtension(path: string, extension: string): string {
  const { name } = parse(path);
  return `${name}${extension}`;
}

/** Absolute form of a relative or absolute path. */
export function resolvePath(path: string, cwd: string = process.cwd()): string {
  return resolve(cwd, path);
}

/**
 * Name of the last directory in a path, from the path text alone.
 * A trailing separator makes the last segment itself the directory.
 */
export function bottomDir(path: string): string {
  const dir = path.endsWith("/") || path.endsWith(sep) ? path.slice(0, -1) : dirname(path);
  return basename(dir);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the source document behind a link found in a built HTML page.
 *
 * The sources root is the parent of the `_website` directory holding the
 * page. The link is taken relative to that root, first as-is and then with
 * its extension replaced by the source extension (appended when the link
 * names a directory or has none).
 */
export async function sourcePathFromHtmlLink(
  link: string,
  htmlFile: string,
  extension: string,
  logger: Logger = silentLogger
): Promise<string> {
  const linkPath = link
    .split(/[/\\]+/)
    .filter((part) => part !== "" && part !== "." && part !== "..")
    .join("/");

  const htmlParts = resolve(htmlFile).split(sep);
  const websiteIndex = htmlParts.indexOf(WEBSITE_DIR);
  if (websiteIndex === -1) {
    throw new NotFoundError({
      message: `Missing '${WEBSITE_DIR}' directory, cannot find source file from HTML link: '${htmlFile}'`,
      resourceType: "directory",
      resourceId: WEBSITE_DIR,
    });
  }
  const root = htmlParts.slice(0, websiteIndex).join(sep) || sep;

  const base = join(root, linkPath);
  const current = extname(base);
  const candidates =
    current === extension
      ? [base]
      : [base, `${current ? base.slice(0, -current.length) : base}${extension}`];
  logger.debug("Looking up source file", { link, candidates });

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      logger.debug("Found source file", { path: candidate });
      return candidate;
    }
  }
  throw new NotFoundError({
    message: `Could not find source file '${linkPath}' in '${root}'`,
    resourceType: "source",
    resourceId: linkPath,
  });
}

/**
 * Validate an absolute http(s) URL. An empty path becomes "/".
 */
export function validUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidConfigurationError(`Invalid URL '${url}': ${reasonOf(error)}`);
  }
  if (!/^https?:$/.test(parsed.protocol) || !parsed.host) {
    throw new InvalidConfigurationError(
      `Malformed URL '${url}': protocol and/or domain missing`
    );
  }
  return parsed;
}

/**
 * Public URL of a post: its relative HTML link, without `.` and `..`
 * segments, resolved under the website base URL.
 * @example postUrl("../../posts/2021/x/", "https://example.org/news") // "https://example.org/news/posts/2021/x/"
 */
export function postUrl(htmlLink: string, base: string): string {
  const root = validUrl(base);
  if (!root.pathname.endsWith("/")) {
    root.pathname = `${root.pathname}/`;
  }
  const segments = htmlLink.split("/").filter((part) => part !== "." && part !== "..");
  const path = segments.join("/").replace(/^\/+/, "");
  return new URL(path, root).href;
}

export interface WriteArtifactOptions {
  /** Replace an existing file instead of failing. */
  overwrite?: boolean;
}

/**
 * Write a generated artifact in one call.
 * Without `overwrite` the file must not exist yet.
 */
export async function writeArtifact(
  path: string,
  text: string,
  options: WriteArtifactOptions = {}
): Promise<void> {
  try {
    await writeFile(path, text, { encoding: "utf8", flag: options.overwrite ? "w" : "wx" });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new InvalidConfigurationError(
        `Output file already exists: '${path}' (use --force to replace it)`
      );
    }
    throw error;
  }
}

/**
 * Read a text part of the MOTD (header, footer, fallback).
 * `label` names the part in error messages.
 */
export async function readTextPart(path: string, label: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new InvalidConfigurationError(
      `Cannot read ${label} file '${path}': ${reasonOf(error)}`
    );
  }
}

/**
 * Read a source document, mapping a missing file to NotFoundError.
 */
export async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new NotFoundError({
        message: `Source file not found: '${path}'`,
        resourceType: "source",
        resourceId: path,
      });
    }
    throw error;
  }
}
