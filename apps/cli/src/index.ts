import { describeError, errorCategory } from "@termpost/core";
import { VERSION, createLogger } from "@termpost/shared";
import { Command, CommanderError } from "commander";

import { createConfigCommand } from "./commands/config";
import { createConvertCommand } from "./commands/convert";
import { createInfoCommand } from "./commands/info";
import { createMotdCommand } from "./commands/motd";
import { disableColor } from "./utils/color";
import type { GlobalOptions } from "./utils/options";

/**
 * Build a fresh program. Commander keeps parsed values on the command
 * objects, so every run gets its own tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("termpost")
    .description("Render markdown news posts for the terminal and the message of the day")
    .version(VERSION)
    .option("--verbose", "Log progress to stderr")
    .option("--debug", "Log debugging details to stderr")
    .option("--no-color", "Disable colored output")
    .exitOverride()
    .hook("preAction", (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().color === false) {
        disableColor();
      }
    });

  for (const command of [
    createConvertCommand(),
    createInfoCommand(),
    createMotdCommand(),
    createConfigCommand(),
  ]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function run(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const logger = createLogger({ level: "error", stderrOnly: true });
    const category = errorCategory(error);
    logger.error(describeError(error), category ? { category } : undefined);
    return 1;
  }
}
