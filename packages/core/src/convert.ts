import { type Logger, silentLogger } from "@termpost/shared";

import { parseDocument } from "./document/parse";
import { type RenderedText, render } from "./render/translate";
import { wrapText } from "./render/wrap";
import type { OutputFormat } from "./schema/config";

export interface ConvertOptions {
  format: OutputFormat;
  briefingOnly?: boolean;
  /** Column width for wrapping. 0 or absent disables wrapping. */
  wrapWidth?: number;
  logger?: Logger;
}

/** Pick one rendered stream by output format. */
export function selectArtifact(rendered: RenderedText, format: OutputFormat): string {
  switch (format) {
    case "ansi":
      return rendered.escapeBody;
    case "markdown":
      return rendered.markdownBody;
    case "text":
      return rendered.text;
  }
}

/**
 * Parse a markdown post and render it into one artifact, newline-terminated.
 */
export function convertDocument(source: string, options: ConvertOptions): string {
  const logger = options.logger ?? silentLogger;
  const { tree } = parseDocument(source);
  const rendered = render(tree, {
    briefingOnly: options.briefingOnly ?? false,
    logger,
  });

  let artifact = selectArtifact(rendered, options.format);
  if (options.wrapWidth) {
    artifact = wrapText(artifact, options.wrapWidth, { logger });
  }
  return `${artifact}\n`;
}
