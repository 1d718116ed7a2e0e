import {
  type OutputFormat,
  OutputFormatSchema,
  changeExtension,
  convertDocument,
  loadConfig,
  readSource,
  resolvePath,
  writeArtifact,
} from "@termpost/core";
import { Command, Option } from "commander";
import { dirname, join } from "node:path";

import { c } from "../utils/color";
import { commandLogger, parseNonNegativeInteger } from "../utils/options";
import { writeStdout } from "../utils/output";

interface ConvertCommandOptions {
  output?: string;
  format?: string;
  briefing?: boolean;
  width?: number;
  force?: boolean;
}

/** Extension of the default output file per format. */
export const OUTPUT_EXTENSIONS: Readonly<Record<OutputFormat, string>> = {
  ansi: ".ansi",
  text: ".txt",
  markdown: ".markdown",
};

/** Output path beside the input, with the format's extension. */
export function defaultOutputPath(input: string, format: OutputFormat): string {
  return join(dirname(input), changeExtension(input, OUTPUT_EXTENSIONS[format]));
}

export function createConvertCommand(): Command {
  return new Command("convert")
    .description("Render a markdown post for the terminal")
    .argument("<input>", "Markdown post to convert")
    .option("-o, --output <path>", "Output file ('-' for stdout)")
    .addOption(
      new Option("--format <format>", "Artifact to write").choices(
        OutputFormatSchema.options
      )
    )
    .option("--briefing", "Only the title block and first paragraph")
    .option("--width <columns>", "Wrap lines to this width", parseNonNegativeInteger)
    .option("--force", "Replace an existing output file")
    .action(async (input: string, options: ConvertCommandOptions, command: Command) => {
      const logger = commandLogger(command);
      const config = await loadConfig({ logger });
      const format = OutputFormatSchema.parse(options.format ?? config.format);

      const sourcePath = resolvePath(input);
      const source = await readSource(sourcePath);
      const artifact = convertDocument(source, {
        format,
        briefingOnly: options.briefing ?? false,
        wrapWidth: options.width ?? 0,
        logger,
      });

      if (options.output === "-") {
        await writeStdout(artifact);
        return;
      }

      const outputPath = options.output
        ? resolvePath(options.output)
        : defaultOutputPath(sourcePath, format);
      await writeArtifact(outputPath, artifact, { overwrite: options.force ?? false });
      logger.info("Wrote artifact", { format, path: outputPath });
      await writeStdout(`${c.green("Wrote")} ${outputPath}\n`);
    });
}
