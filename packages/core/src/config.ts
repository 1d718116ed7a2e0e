import { type Logger, silentLogger } from "@termpost/shared";
import { readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { InvalidConfigurationError, reasonOf } from "./errors";
import { PATHS } from "./paths";
import {
  DEFAULT_CONFIG,
  type TermpostConfig,
  TermpostConfigSchema,
} from "./schema/config";

export const PROJECT_CONFIG_FILENAME = ".termpost.toml";

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

type EnvParser<T> = (value: string) => T;

const parseEnvBoolean: EnvParser<boolean> = (value) => {
  const lower = value.toLowerCase();
  return lower === "true" || lower === "1";
};

const parseEnvInteger: EnvParser<number> = (value) => {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new TypeError(`Invalid integer value: ${value}`);
  }
  return Number.parseInt(value, 10);
};

const parseEnvString: EnvParser<string> = (value) => value;

interface EnvMapping {
  path: string[];
  parse: EnvParser<unknown>;
}

/**
 * Mapping of environment variable names to config paths and parsers.
 *
 * Naming convention: TERMPOST_{SECTION}_{KEY} (all uppercase, underscores)
 *
 * Precedence (highest to lowest):
 * 1. Command line flags
 * 2. Environment variables
 * 3. Project config (.termpost.toml)
 * 4. User config (~/.config/termpost/config.toml)
 * 5. Schema defaults
 */
const ENV_MAP: Record<string, EnvMapping> = {
  TERMPOST_WRAP_WIDTH: { path: ["wrap_width"], parse: parseEnvInteger },
  TERMPOST_INDENT: { path: ["indent"], parse: parseEnvInteger },
  TERMPOST_SOURCE_EXTENSION: {
    path: ["source_extension"],
    parse: parseEnvString,
  },
  TERMPOST_FORMAT: { path: ["format"], parse: parseEnvString },

  // MOTD section
  TERMPOST_MOTD_LIFESPAN_HOURS: {
    path: ["motd", "lifespan_hours"],
    parse: parseEnvInteger,
  },
  TERMPOST_MOTD_BRIEFING: { path: ["motd", "briefing"], parse: parseEnvBoolean },
  TERMPOST_MOTD_HEADER: { path: ["motd", "header"], parse: parseEnvString },
  TERMPOST_MOTD_FOOTER: { path: ["motd", "footer"], parse: parseEnvString },
  TERMPOST_MOTD_FALLBACK: { path: ["motd", "fallback"], parse: parseEnvString },
  TERMPOST_MOTD_LINK_BASE: {
    path: ["motd", "link_base"],
    parse: parseEnvString,
  },
};

/**
 * Apply environment variable overrides to config.
 * Unparseable values are reported and skipped.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = silentLogger
): Record<string, unknown> {
  for (const [envKey, { path, parse }] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value === undefined) {
      continue;
    }
    try {
      setNestedValue(config, path, parse(value));
    } catch (error) {
      logger.warn("Ignoring environment override", {
        variable: envKey,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return config;
}

// --------------------------------------------------------------------------
// Loading
// --------------------------------------------------------------------------

export interface ConfigPaths {
  user: string;
  project?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Override the user config file location. */
  userConfigPath?: string;
  logger?: Logger;
}

/**
 * Load configuration: defaults, then user and project files, then
 * environment variables. Invalid values throw InvalidConfigurationError.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<TermpostConfig> {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? silentLogger;
  const paths = await getConfigPaths(cwd, options.userConfigPath);

  const userConfig = await readConfigFile(paths.user);
  const projectConfig = paths.project
    ? await readConfigFile(paths.project)
    : null;
  logger.debug("Loaded config files", {
    user: userConfig ? paths.user : null,
    project: projectConfig ? paths.project : null,
  });

  let merged = mergeDeep(mergeDeep({}, DEFAULT_CONFIG), userConfig ?? {});
  merged = mergeDeep(merged, projectConfig ?? {});
  const withEnv = applyEnvOverrides(merged, options.env, logger);

  const result = TermpostConfigSchema.safeParse(withEnv);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function readConfigFile(
  path: string
): Promise<Record<string, unknown> | null> {
  if (!(await exists(path))) {
    return null;
  }
  try {
    return parseTOML(await readFile(path, "utf8"));
  } catch (error) {
    throw new InvalidConfigurationError(
      `Cannot read config file '${path}': ${reasonOf(error)}`
    );
  }
}

/**
 * Nearest project config file, looking upwards from `startDir` and
 * stopping at the enclosing git repository root.
 */
export async function findProjectConfigPath(
  startDir: string = process.cwd()
): Promise<string | null> {
  let dir = startDir;

  for (;;) {
    const candidate = join(dir, PROJECT_CONFIG_FILENAME);
    if (await exists(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir || (await exists(join(dir, ".git")))) {
      return null;
    }
    dir = parent;
  }
}

export async function getConfigPaths(
  cwd: string = process.cwd(),
  userConfigPath: string = PATHS.configFile
): Promise<ConfigPaths> {
  const project = await findProjectConfigPath(cwd);
  return {
    user: userConfigPath,
    ...(project && { project }),
  };
}

// --------------------------------------------------------------------------
// TOML subset: sections, key = value, strings, integers, booleans
// --------------------------------------------------------------------------

function parseTOML(text: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let currentSection: string[] = [];

  for (const [index, line] of text.split("\n").entries()) {
    const content = stripInlineComment(line.trim());
    if (!content) {
      continue;
    }

    if (content.startsWith("[") && content.endsWith("]")) {
      currentSection = splitKey(content.slice(1, -1));
      ensureNestedObject(result, currentSection);
      continue;
    }

    const match = /^([A-Za-z0-9_.-]+)\s*=\s*(.+)$/.exec(content);
    if (!match?.[1] || !match[2]) {
      throw new InvalidConfigurationError(
        `Unrecognised line ${index + 1}: ${content}`
      );
    }
    setNestedValue(
      result,
      [...currentSection, ...splitKey(match[1])],
      parseValue(match[2].trim())
    );
  }

  return result;
}

function splitKey(key: string): string[] {
  return key
    .split(".")
    .map((part) => part.trim())
    .filter(Boolean);
}

function parseValue(value: string): unknown {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  if (/^-?\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

function stripInlineComment(value: string): string {
  let quote = "";

  for (let i = 0; i < value.length; i += 1) {
    const char = value.charAt(i);
    if (quote) {
      if (char === quote) quote = "";
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      continue;
    }
    if (char === "#") {
      return value.slice(0, i).trim();
    }
  }

  return value.trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureNestedObject(
  target: Record<string, unknown>,
  path: string[]
): Record<string, unknown> {
  let cursor = target;
  for (const key of path) {
    const existing = cursor[key];
    if (isPlainObject(existing)) {
      cursor = existing;
      continue;
    }
    const next: Record<string, unknown> = {};
    cursor[key] = next;
    cursor = next;
  }
  return cursor;
}

export function setNestedValue(
  target: Record<string, unknown>,
  path: string[],
  value: unknown
): void {
  const key = path.at(-1);
  if (key === undefined) {
    return;
  }
  ensureNestedObject(target, path.slice(0, -1))[key] = value;
}

export function getNestedValue(
  target: Record<string, unknown>,
  path: string[]
): unknown {
  let cursor: unknown = target;
  for (const key of path) {
    if (!isPlainObject(cursor)) {
      return undefined;
    }
    cursor = cursor[key];
  }
  return cursor;
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    if (isPlainObject(value)) {
      // Nested objects are always copied so later overrides never touch the inputs.
      result[key] = mergeDeep(isPlainObject(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

// --------------------------------------------------------------------------
// Serialization
// --------------------------------------------------------------------------

function serializeValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return String(value);
}

function serializeObject(
  section: Record<string, unknown>,
  prefix: string[] = []
): string[] {
  const lines: string[] = [];
  const nested: [string, Record<string, unknown>][] = [];

  for (const [key, value] of Object.entries(section)) {
    if (value === undefined) {
      continue;
    }
    if (isPlainObject(value)) {
      nested.push([key, value]);
    } else {
      lines.push(`${key} = ${serializeValue(value)}`);
    }
  }

  for (const [key, value] of nested) {
    const nextPrefix = [...prefix, key];
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(`[${nextPrefix.join(".")}]`, ...serializeObject(value, nextPrefix));
  }

  return lines;
}

export function parseConfigText(text: string): Record<string, unknown> {
  return parseTOML(text);
}

export function serializeConfigObject(config: Record<string, unknown>): string {
  return ["# termpost configuration", "", ...serializeObject(config), ""].join("\n");
}

/**
 * Set one key in a config file, creating the file when needed.
 * The file is validated as a whole before it is written.
 */
export async function setConfigValue(
  path: string,
  key: string,
  rawValue: string
): Promise<unknown> {
  const current = (await readConfigFile(path)) ?? {};
  const value = parseValue(rawValue.trim());
  setNestedValue(current, splitKey(key), value);

  const check = TermpostConfigSchema.safeParse(
    mergeDeep(mergeDeep({}, DEFAULT_CONFIG), current)
  );
  if (!check.success) {
    const details = check.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid value for ${key}: ${details}`);
  }

  await writeFile(path, serializeConfigObject(current), "utf8");
  return value;
}
