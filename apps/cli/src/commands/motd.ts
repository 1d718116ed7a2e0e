import {
  type TermpostConfig,
  assemble,
  loadConfig,
  parseDocument,
  parsePostDate,
  postAgeMs,
  postUrl,
  readLatestPost,
  readSource,
  readTextPart,
  render,
  resolvePath,
  selectArtifact,
  selectState,
  sourcePathFromHtmlLink,
  writeArtifact,
} from "@termpost/core";
import type { Logger } from "@termpost/shared";
import { Command } from "commander";

import { c, getStateColor } from "../utils/color";
import {
  commandLogger,
  parseNonNegativeInteger,
  parseTimestamp,
} from "../utils/options";
import { writeStdout } from "../utils/output";

interface MotdCommandOptions {
  feed: string;
  output?: string;
  lifespan?: number;
  briefing?: boolean;
  header?: string;
  footer?: string;
  fallback?: string;
  linkBase?: string;
  width?: number;
  indent?: number;
  now?: Date;
}

async function readPart(
  path: string | undefined,
  label: string
): Promise<string | undefined> {
  return path ? await readTextPart(resolvePath(path), label) : undefined;
}

/** Command line flags over configuration. */
function motdSettings(options: MotdCommandOptions, config: TermpostConfig) {
  return {
    lifespanHours: options.lifespan ?? config.motd.lifespan_hours,
    briefingOnly: options.briefing ?? config.motd.briefing,
    header: options.header ?? config.motd.header,
    footer: options.footer ?? config.motd.footer,
    fallback: options.fallback ?? config.motd.fallback,
    linkBase: options.linkBase ?? config.motd.link_base,
    wrapWidth: options.width ?? config.wrap_width,
    indent: options.indent ?? config.indent,
  };
}

async function renderPost(
  htmlLink: string,
  feedPath: string,
  config: TermpostConfig,
  briefingOnly: boolean,
  logger: Logger
): Promise<string> {
  const sourcePath = await sourcePathFromHtmlLink(
    htmlLink,
    feedPath,
    config.source_extension,
    logger
  );
  const { tree } = parseDocument(await readSource(sourcePath));
  return selectArtifact(render(tree, { briefingOnly, logger }), config.format);
}

async function buildMotd(
  options: MotdCommandOptions,
  config: TermpostConfig,
  logger: Logger
) {
  const settings = motdSettings(options, config);
  const feedPath = resolvePath(options.feed);
  const entry = readLatestPost(await readTextPart(feedPath, "news feed"), feedPath);
  logger.info("Found latest post", { title: entry.title, date: entry.date });

  const dateResult = parsePostDate(entry.date);
  if (dateResult.isErr()) {
    throw dateResult.error;
  }
  const postDate = dateResult.value;
  const now = options.now ?? new Date();
  const common = {
    postDate,
    now,
    lifespanHours: settings.lifespanHours,
    wrapWidth: settings.wrapWidth,
    indent: settings.indent,
    logger,
  };

  // A stale post is replaced by the fallback without touching its source.
  if (selectState(postAgeMs(postDate, now), settings.lifespanHours) === "stale") {
    const fallbackBody = await readPart(settings.fallback, "fallback");
    if (fallbackBody === undefined) {
      logger.debug("No fallback configured, the stale post leaves the MOTD empty");
    }
    return assemble({ ...common, renderedBody: "", fallbackBody: fallbackBody ?? "" });
  }

  const renderedBody = await renderPost(
    entry.htmlLink,
    feedPath,
    config,
    settings.briefingOnly,
    logger
  );
  const headerBody = await readPart(settings.header, "header");
  const footerBody = await readPart(settings.footer, "footer");
  const footerLink = settings.linkBase
    ? postUrl(entry.htmlLink, settings.linkBase)
    : undefined;

  return assemble({
    ...common,
    renderedBody,
    fallbackBody: "",
    ...(headerBody !== undefined && { headerBody }),
    ...(footerBody !== undefined && { footerBody }),
    ...(footerLink !== undefined && { footerLink }),
  });
}

export function createMotdCommand(): Command {
  return new Command("motd")
    .description("Build the message of the day from the latest post of a news feed")
    .requiredOption("--feed <html>", "Blog index page listing the posts")
    .option("-o, --output <path>", "MOTD file to write (default: stdout)")
    .option("--lifespan <hours>", "Hours the post stays in the MOTD (0: forever)", parseNonNegativeInteger)
    .option("--briefing", "Only the title block and first paragraph")
    .option("--header <file>", "Text placed above the post")
    .option("--footer <file>", "Text placed below the post")
    .option("--fallback <file>", "Text published once the post is stale")
    .option("--link-base <url>", "Website URL used to link to the post")
    .option("--width <columns>", "Wrap lines to this width (0: no wrapping)", parseNonNegativeInteger)
    .option("--indent <spaces>", "Indent every line", parseNonNegativeInteger)
    .option("--now <timestamp>", "Reference time instead of the clock", parseTimestamp)
    .action(async (options: MotdCommandOptions, command: Command) => {
      const logger = commandLogger(command);
      const config = await loadConfig({ logger });
      const result = await buildMotd(options, config, logger);

      if (!options.output) {
        await writeStdout(result.text);
        return;
      }

      const outputPath = resolvePath(options.output);
      await writeArtifact(outputPath, result.text, { overwrite: true });
      logger.info("Wrote MOTD", { state: result.state, path: outputPath });
      await writeStdout(
        `${c.green("Wrote")} ${outputPath} (${getStateColor(result.state)(result.state)})\n`
      );
    });
}
