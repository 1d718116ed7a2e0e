import {
  PATHS,
  PROJECT_CONFIG_FILENAME,
  ensureConfigDirectory,
  findProjectConfigPath,
  getConfigPaths,
  getNestedValue,
  loadConfig,
  setConfigValue,
} from "@termpost/core";
import { Command } from "commander";
import { join } from "node:path";

import { commandLogger } from "../utils/options";
import {
  shouldOutputJson,
  writeJson,
  writeJsonLine,
  writeStdout,
} from "../utils/output";

interface ConfigCommandOptions {
  path?: boolean;
  local?: boolean;
  json?: boolean;
}

function splitKey(key: string): string[] {
  return key
    .split(".")
    .map((part) => part.trim())
    .filter(Boolean);
}

async function resolveTargetPath(local?: boolean): Promise<string> {
  if (local) {
    return (
      (await findProjectConfigPath()) ?? join(process.cwd(), PROJECT_CONFIG_FILENAME)
    );
  }
  await ensureConfigDirectory();
  return PATHS.configFile;
}

function formatValue(value: unknown): string {
  if (value === undefined) {
    return "";
  }
  return typeof value === "object" ? JSON.stringify(value, null, 2) : String(value);
}

export function createConfigCommand(): Command {
  return new Command("config")
    .description("View and edit configuration")
    .argument("[key]", "Configuration key (dot-separated)")
    .argument("[value]", "New value for key")
    .option("--path", "Show config file paths")
    .option("--local", `Target the project config (${PROJECT_CONFIG_FILENAME})`)
    .option("--json", "Force structured output")
    .option("--no-json", "Force human-readable output")
    .action(
      async (
        key: string | undefined,
        value: string | undefined,
        options: ConfigCommandOptions,
        command: Command
      ) => {
        if (options.path) {
          const paths = await getConfigPaths();
          if (shouldOutputJson(options)) {
            await writeJsonLine(paths);
          } else {
            await writeStdout(
              `Config:  ${paths.user}\n${paths.project ? `Project: ${paths.project}\n` : ""}`
            );
          }
          return;
        }

        if (!key) {
          await writeJson(await loadConfig({ logger: commandLogger(command) }));
          return;
        }

        if (value === undefined) {
          const config = await loadConfig({ logger: commandLogger(command) });
          const resolved = getNestedValue(config, splitKey(key));
          if (shouldOutputJson(options)) {
            await writeJsonLine({ key, value: resolved ?? null });
          } else {
            await writeStdout(`${formatValue(resolved)}\n`);
          }
          return;
        }

        const targetPath = await resolveTargetPath(options.local);
        const stored = await setConfigValue(targetPath, key, value);
        if (shouldOutputJson(options)) {
          await writeJsonLine({ ok: true, path: targetPath, key, value: stored });
        } else {
          await writeStdout(`Set ${key} = ${formatValue(stored)}\n`);
        }
      }
    );
}
