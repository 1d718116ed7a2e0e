import { readPostInfo, readSource, resolvePath } from "@termpost/core";
import { Command } from "commander";

import { c } from "../utils/color";
import { shouldOutputJson, writeJsonLine, writeStdout } from "../utils/output";

interface InfoCommandOptions {
  json?: boolean;
}

export function createInfoCommand(): Command {
  return new Command("info")
    .description("Show title and date of a post")
    .argument("<input>", "Markdown post")
    .option("--json", "Output a JSON line")
    .option("--no-json", "Force human-readable output")
    .action(async (input: string, options: InfoCommandOptions) => {
      const sourcePath = resolvePath(input);
      const info = readPostInfo(await readSource(sourcePath), sourcePath);

      if (shouldOutputJson(options)) {
        await writeJsonLine(info);
        return;
      }
      await writeStdout(
        [
          `${c.bold("Title:")}  ${info.title}`,
          `${c.bold("Date:")}   ${info.date}`,
          `${c.bold("Source:")} ${c.dim(info.source)}`,
          "",
        ].join("\n")
      );
    });
}
