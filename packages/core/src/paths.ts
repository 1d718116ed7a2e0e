import envPaths from "env-paths";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";

const APP_NAME = "termpost";

/**
 * Resolve paths with XDG override support.
 *
 * On macOS, env-paths uses native Apple paths (~/Library/...) and ignores
 * XDG variables. An explicitly set XDG_CONFIG_HOME wins there as well.
 */
function resolvePaths(): { config: string } {
  const defaults = envPaths(APP_NAME, { suffix: "" });

  if (process.platform !== "darwin") {
    return { config: defaults.config };
  }

  const xdgConfig = process.env["XDG_CONFIG_HOME"];
  return {
    config: xdgConfig ? join(xdgConfig, APP_NAME) : defaults.config,
  };
}

const paths = resolvePaths();

/**
 * XDG-compliant paths for termpost.
 */
export const PATHS = {
  /** Config directory (~/.config/termpost) */
  config: paths.config,

  /** User config file */
  configFile: join(paths.config, "config.toml"),
} as const;

/**
 * Ensure the config directory exists.
 */
export async function ensureConfigDirectory(): Promise<void> {
  await mkdir(PATHS.config, { recursive: true });
}
