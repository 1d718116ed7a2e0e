/**
 * Markdown to document tree.
 *
 * Pipeline:
 *   1. gray-matter splits off the YAML front matter
 *   2. marked lexes the body, with two extensions:
 *      - `|Name|` inline substitutions
 *      - `:::name argument` ... `:::` block directives
 *   3. tokens are mapped onto DocumentNode, headings opening sections
 */

import matter from "gray-matter";
import { Marked, type Token, type TokenizerExtension, type Tokens } from "marked";
import { z } from "zod";

import { MalformedInputError } from "../errors";
import { formatPostDate } from "../motd/date";
import * as build from "./build";
import type { DocumentNode, DocumentRoot, ListItemNode, TitleNode } from "./types";
import { textContent } from "./types";

// --------------------------------------------------------------------------
// marked extensions
// --------------------------------------------------------------------------

const SUBSTITUTION_PATTERN = /^\|([A-Za-z][\w-]*)\|/;
const DIRECTIVE_PATTERN =
  /^:::[ \t]*([A-Za-z][\w-]*)[ \t]*([^\n]*)\n([\s\S]*?)\n?:::[ \t]*(?:\n+|$)/;

const substitutionExtension: TokenizerExtension = {
  name: "substitution",
  level: "inline",
  start(src) {
    const index = src.indexOf("|");
    return index === -1 ? undefined : index;
  },
  tokenizer(src) {
    const match = SUBSTITUTION_PATTERN.exec(src);
    if (!match) {
      return undefined;
    }
    return { type: "substitution", raw: match[0], name: match[1] ?? "" };
  },
};

const directiveExtension: TokenizerExtension = {
  name: "directive",
  level: "block",
  start(src) {
    return /^:::/m.exec(src)?.index;
  },
  tokenizer(src) {
    const match = DIRECTIVE_PATTERN.exec(src);
    if (!match) {
      return undefined;
    }
    const tokens: Token[] = [];
    this.lexer.blockTokens(match[3] ?? "", tokens);
    return {
      type: "directive",
      raw: match[0],
      name: match[1] ?? "",
      argument: (match[2] ?? "").trim(),
      tokens,
    };
  },
};

const markdown = new Marked({
  extensions: [substitutionExtension, directiveExtension],
});

// --------------------------------------------------------------------------
// Token guards
// --------------------------------------------------------------------------

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === "heading";
}
function isParagraph(token: Token): token is Tokens.Paragraph {
  return token.type === "paragraph";
}
function isList(token: Token): token is Tokens.List {
  return token.type === "list";
}
function isText(token: Token): token is Tokens.Text {
  return token.type === "text";
}
function isLink(token: Token): token is Tokens.Link {
  return token.type === "link";
}

/** Child tokens of a token, when it carries any. */
function childTokens(token: Token): Token[] {
  return "tokens" in token && Array.isArray(token.tokens) ? token.tokens : [];
}

/** A string-valued field of a token, or "" when absent. */
function stringField(token: Token, field: string): string {
  const value: unknown = Reflect.get(token, field);
  return typeof value === "string" ? value : "";
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

// --------------------------------------------------------------------------
// Token to node mapping
// --------------------------------------------------------------------------

function inlineNodes(tokens: readonly Token[]): DocumentNode[] {
  return tokens.flatMap((token) => inlineNode(token));
}

function inlineNode(token: Token): DocumentNode[] {
  switch (token.type) {
    case "text":
    case "escape": {
      const children = childTokens(token);
      if (children.length > 0) {
        return inlineNodes(children);
      }
      return [build.text(decodeEntities(stringField(token, "text")).replace(/\n/g, " "))];
    }
    case "br":
      return [build.text(" ")];
    case "strong":
      return [build.strong(...inlineNodes(childTokens(token)))];
    case "em":
      return [build.emphasis(...inlineNodes(childTokens(token)))];
    case "codespan":
      return [build.literal(decodeEntities(stringField(token, "text")))];
    case "link":
      if (isLink(token)) {
        return [build.reference(token.href, ...inlineNodes(token.tokens))];
      }
      return [];
    case "substitution":
      return [build.substitution(stringField(token, "name"))];
    default: {
      const children = childTokens(token);
      return [
        children.length > 0
          ? build.unknown(token.type, false, inlineNodes(children))
          : build.unknown(token.type, false, decodeEntities(stringField(token, "text"))),
      ];
    }
  }
}

function listItemNode(item: Tokens.ListItem): ListItemNode {
  return build.listItem(...blockNodes(item.tokens));
}

function blockNodes(tokens: readonly Token[]): DocumentNode[] {
  return tokens.flatMap((token) => blockNode(token));
}

function blockNode(token: Token): DocumentNode[] {
  if (isParagraph(token)) {
    return [build.paragraph(...inlineNodes(token.tokens))];
  }
  if (isText(token)) {
    // Tight list items hold bare text blocks.
    return [build.paragraph(...inlineNode(token))];
  }
  if (isList(token)) {
    const items = token.items.map((item) => listItemNode(item));
    return [token.ordered ? build.enumeratedList(...items) : build.bulletList(...items)];
  }
  if (isHeading(token)) {
    // Headings nested in lists or directives stay plain titles.
    return [build.title(...inlineNodes(token.tokens))];
  }

  switch (token.type) {
    case "space":
    case "def":
      return [];
    case "hr":
      return [build.transition()];
    case "directive": {
      const argument = stringField(token, "argument");
      return [
        build.directive(
          stringField(token, "name"),
          argument === "" ? undefined : argument,
          ...blockNodes(childTokens(token))
        ),
      ];
    }
    default: {
      const children = childTokens(token);
      return [
        children.length > 0
          ? build.unknown(token.type, true, blockNodes(children))
          : build.unknown(
              token.type,
              true,
              decodeEntities(stringField(token, "text") || token.raw.trim())
            ),
      ];
    }
  }
}

interface SectionFrame {
  readonly level: number;
  readonly children: DocumentNode[];
}

/**
 * Arrange top-level tokens into a document: level-1 headings become titles,
 * a level-2 heading straight after the title becomes the subtitle, and any
 * other heading opens a section one level below its depth.
 */
function documentTree(tokens: readonly Token[]): DocumentRoot {
  const root: SectionFrame = { level: 0, children: [] };
  const stack: SectionFrame[] = [root];

  for (const token of tokens) {
    const top = stack.at(-1) ?? root;

    if (!isHeading(token)) {
      top.children.push(...blockNode(token));
      continue;
    }

    const inlines = inlineNodes(token.tokens);
    const previous = root.children.at(-1);

    if (token.depth === 1) {
      stack.length = 1;
      root.children.push(build.title(...inlines));
      continue;
    }
    if (token.depth === 2 && stack.length === 1 && previous?.kind === "title") {
      root.children.push(build.subtitle(...inlines));
      continue;
    }

    const level = token.depth - 1;
    while (stack.length > 1 && (stack.at(-1)?.level ?? 0) >= level) {
      stack.pop();
    }
    const frame: SectionFrame = { level, children: [build.title(...inlines)] };
    (stack.at(-1) ?? root).children.push({ kind: "section", children: frame.children });
    stack.push(frame);
  }

  return { kind: "document", children: root.children };
}

// --------------------------------------------------------------------------
// Public API
// --------------------------------------------------------------------------

export const FrontMatterSchema = z
  .object({
    title: z.string().optional(),
    date: z.union([z.string(), z.date()]).optional(),
  })
  .passthrough();

export type FrontMatter = z.infer<typeof FrontMatterSchema>;

export interface ParsedDocument {
  tree: DocumentRoot;
  frontMatter: FrontMatter;
}

/**
 * Parse a markdown post, with optional front matter, into a document tree.
 */
export function parseDocument(source: string): ParsedDocument {
  const { data, content } = matter(source);
  const frontMatter = FrontMatterSchema.safeParse(data);
  if (!frontMatter.success) {
    throw new MalformedInputError(
      `Malformed front matter: ${frontMatter.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }

  return {
    tree: documentTree(markdown.lexer(content)),
    frontMatter: frontMatter.data,
  };
}

export interface PostInfo {
  title: string;
  /** Publication date as DD/MM/YYYY. */
  date: string;
  source: string;
}

function firstTitle(tree: DocumentRoot): TitleNode | undefined {
  for (const node of tree.children) {
    if (node.kind === "title") {
      return node;
    }
  }
  return undefined;
}

/**
 * Read title and date of a post. `source` is reported back as given.
 */
export function readPostInfo(text: string, source: string): PostInfo {
  const { tree, frontMatter } = parseDocument(text);

  const titleNode = firstTitle(tree);
  const title = frontMatter.title ?? (titleNode ? textContent(titleNode) : undefined);
  if (!title) {
    throw new MalformedInputError(`Malformed news post, missing title: '${source}'`);
  }

  const rawDate = frontMatter.date;
  if (rawDate === undefined) {
    throw new MalformedInputError(`Malformed news post, missing date: '${source}'`);
  }
  const date = rawDate instanceof Date ? formatPostDate(rawDate) : rawDate.trim();

  return { title, date, source };
}
