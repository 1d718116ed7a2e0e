/**
 * Blog index pages: locate the newest post.
 *
 * Post entries are recognised by their `h2` header. The header's anchor
 * carries title and link; the first list item after it starts with an icon
 * element followed by the publication date.
 */

import { HTMLElement, type Node, TextNode, parse } from "node-html-parser";
import { z } from "zod";

import { MalformedInputError } from "./errors";

export const FeedEntrySchema = z.object({
  title: z.string().min(1),
  htmlLink: z.string().min(1),
  date: z.string().min(1),
});

export type FeedEntry = z.infer<typeof FeedEntrySchema>;

function nodeText(node: Node): string {
  if (node instanceof HTMLElement || node instanceof TextNode) {
    return node.text;
  }
  return "";
}

/** Text after the item's icon element, or the whole item text. */
function dateText(item: HTMLElement): string {
  const nodes = item.childNodes;
  const iconIndex = nodes.findIndex(
    (node) => node instanceof HTMLElement && node.tagName === "I"
  );
  if (iconIndex === -1) {
    return item.text.trim();
  }
  const next = nodes[iconIndex + 1];
  return next ? nodeText(next).trim() : "";
}

/**
 * Read the newest post of a blog index page.
 * `name` identifies the page in error messages.
 */
export function readLatestPost(html: string, name: string): FeedEntry {
  const root = parse(html);
  const header = root.querySelector("h2");
  const anchor = header?.querySelector("a");
  const item = header?.parentNode?.querySelector("li");

  const candidate = {
    title: anchor?.text.trim() ?? "",
    htmlLink: anchor?.getAttribute("href") ?? "",
    date: item ? dateText(item) : "",
  };

  const result = FeedEntrySchema.safeParse(candidate);
  if (!header || !result.success) {
    const missing = result.success
      ? ["header"]
      : result.error.issues.map((issue) => issue.path.join("."));
    throw new MalformedInputError(
      `Malformed HTML news feed, missing news header (H2) data [${missing.join(", ")}]: '${name}'`
    );
  }
  return result.data;
}
