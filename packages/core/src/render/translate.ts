/**
 * Document tree to styled text.
 *
 * One walk over the tree fills three aligned buffers:
 * - escape:   text with SGR escape styling, no markdown punctuation
 * - markdown: text with markdown punctuation, no escapes
 * - text:     the terminal artifact, escapes plus structural punctuation
 *             (headings, list markers, links, literal backquotes)
 */

import { type Logger, silentLogger } from "@termpost/shared";

import {
  type DirectiveNode,
  type DocumentNode,
  type ListItemNode,
  textContent,
} from "../document/types";
import { type StyleIntent, encode } from "./style";

export interface RenderOptions {
  /** Stop after the first main paragraph of the document. */
  briefingOnly?: boolean;
  logger?: Logger;
}

export interface RenderedText {
  escapeBody: string;
  markdownBody: string;
  text: string;
}

/** Directive names with a styled prefix. */
export const RECOGNIZED_DIRECTIVES = ["update"] as const;

const LIST_INDENT = "  ";
const MAX_HEADING_LEVEL = 6;

const BADGES: Readonly<Record<string, StyleIntent>> = {
  Warning: "background-red",
  Info: "background-green",
};

interface ListFrame {
  readonly kind: "bulletList" | "enumeratedList";
  position: number;
  /** Indentation in front of this list's markers. */
  readonly indent: string;
}

type Separator = 1 | 2;

class RenderContext {
  private readonly escape: string[] = [];
  private readonly markdown: string[] = [];
  private readonly text: string[] = [];
  private pendingBreaks = 0;
  private emitted = false;
  private separator: Separator = 2;

  readonly lists: ListFrame[] = [];
  /** Depth of sections around the current node. */
  sectionDepth = 0;
  /** Depth of block containers other than sections (lists, directives). */
  containerDepth = 0;
  halted = false;

  private flush(): void {
    if (this.pendingBreaks > 0) {
      const breaks = "\n".repeat(this.pendingBreaks);
      this.escape.push(breaks);
      this.markdown.push(breaks);
      this.text.push(breaks);
      this.pendingBreaks = 0;
    }
    this.emitted = true;
  }

  /** Visible text, identical in every buffer. */
  content(value: string): void {
    if (!value) return;
    this.flush();
    this.escape.push(value);
    this.markdown.push(value);
    this.text.push(value);
  }

  /** Escape styling plus its markdown equivalent. */
  style(intent: StyleIntent): void {
    const run = encode(intent);
    this.flush();
    this.escape.push(run.escape);
    this.markdown.push(run.markdown);
    this.text.push(run.escape);
  }

  /** Escape styling with no markdown counterpart. */
  escapeOnly(intent: StyleIntent): void {
    const run = encode(intent);
    this.flush();
    this.escape.push(run.escape);
    this.text.push(run.escape);
  }

  /** Markdown punctuation, also shown in the terminal text. */
  punct(value: string): void {
    if (!value) return;
    this.flush();
    this.markdown.push(value);
    this.text.push(value);
  }

  requestBreaks(count: number): void {
    if (this.emitted) {
      this.pendingBreaks = Math.max(this.pendingBreaks, count);
    }
  }

  startBlock(): void {
    this.requestBreaks(this.lists.length > 0 ? 1 : this.separator);
  }

  endBlock(kind: "heading" | "block"): void {
    this.separator = kind === "heading" ? 1 : 2;
  }

  result(): RenderedText {
    return {
      escapeBody: this.escape.join(""),
      markdownBody: this.markdown.join(""),
      text: this.text.join(""),
    };
  }
}

function isInline(node: DocumentNode): boolean {
  switch (node.kind) {
    case "text":
    case "strong":
    case "emphasis":
    case "literal":
    case "reference":
    case "substitution":
      return true;
    case "unknown":
      return !node.block;
    default:
      return false;
  }
}

function isList(
  node: DocumentNode
): node is Extract<DocumentNode, { kind: "bulletList" | "enumeratedList" }> {
  return node.kind === "bulletList" || node.kind === "enumeratedList";
}

function containsTitle(node: DocumentNode): boolean {
  switch (node.kind) {
    case "title":
      return true;
    case "document":
    case "section":
      return node.children.some((child) => containsTitle(child));
    default:
      return false;
  }
}

class TreeRenderer {
  private readonly ctx = new RenderContext();
  /** Briefing counts paragraphs only once the title is out. */
  private awaitingTitle = false;

  constructor(
    private readonly briefingOnly: boolean,
    private readonly logger: Logger
  ) {}

  run(tree: DocumentNode): RenderedText {
    this.awaitingTitle = this.briefingOnly && containsTitle(tree);
    if (isInline(tree)) {
      this.inline(tree);
    } else {
      this.block(tree);
    }
    return this.ctx.result();
  }

  /** Render block children, grouping runs of inline nodes into one block. */
  private blocks(children: readonly DocumentNode[]): void {
    let run: DocumentNode[] = [];
    const flushRun = (): void => {
      if (run.length === 0) return;
      this.ctx.startBlock();
      this.inlines(run);
      this.ctx.endBlock("block");
      run = [];
    };

    for (const child of children) {
      if (this.ctx.halted) return;
      if (isInline(child)) {
        run.push(child);
        continue;
      }
      flushRun();
      this.block(child);
    }
    flushRun();
  }

  private inlines(children: readonly DocumentNode[]): void {
    for (const child of children) {
      this.inline(child);
    }
  }

  private heading(level: number, children: readonly DocumentNode[], bold: boolean): void {
    const ctx = this.ctx;
    ctx.startBlock();
    if (bold) ctx.escapeOnly("bold-on");
    ctx.punct(`${"#".repeat(Math.min(level, MAX_HEADING_LEVEL))} `);
    this.inlines(children);
    if (bold) ctx.escapeOnly("bold-off");
    ctx.endBlock("heading");
  }

  private block(node: DocumentNode): void {
    const ctx = this.ctx;
    if (ctx.halted) return;

    switch (node.kind) {
      case "document":
        this.blocks(node.children);
        return;
      case "section":
        ctx.sectionDepth += 1;
        this.blocks(node.children);
        ctx.sectionDepth -= 1;
        return;
      case "title":
        this.heading(1 + ctx.sectionDepth, node.children, true);
        this.awaitingTitle = false;
        return;
      case "subtitle":
        this.heading(2 + ctx.sectionDepth, node.children, false);
        return;
      case "paragraph":
        ctx.startBlock();
        this.inlines(node.children);
        ctx.endBlock("block");
        if (this.briefingOnly && !this.awaitingTitle && ctx.containerDepth === 0) {
          this.logger.debug("Briefing limit reached after first main paragraph");
          ctx.halted = true;
        }
        return;
      case "bulletList":
      case "enumeratedList":
        this.list(node.kind, node.children);
        return;
      case "listItem":
        // An item outside any list renders as a one-item bullet list.
        this.list("bulletList", [node]);
        return;
      case "directive":
        this.directive(node);
        return;
      case "transition":
        ctx.startBlock();
        ctx.content("---");
        ctx.endBlock("block");
        return;
      case "unknown":
        this.unsupported(node.name);
        ctx.startBlock();
        ctx.content(textContent(node));
        ctx.endBlock("block");
        return;
      default:
        this.inline(node);
    }
  }

  private list(
    kind: ListFrame["kind"],
    items: readonly DocumentNode[]
  ): void {
    const ctx = this.ctx;
    const parent = ctx.lists.at(-1);
    const frame: ListFrame = {
      kind,
      position: 0,
      indent: parent ? `${parent.indent}${LIST_INDENT}` : "",
    };

    ctx.startBlock();
    ctx.lists.push(frame);
    ctx.containerDepth += 1;
    try {
      for (const item of items) {
        if (ctx.halted) return;
        if (item.kind !== "listItem") {
          this.logger.debug("List child is not a list item", { kind: item.kind });
          this.block(item);
          continue;
        }
        frame.position += 1;
        this.listItem(frame, item);
      }
    } finally {
      ctx.containerDepth -= 1;
      ctx.lists.pop();
      ctx.endBlock("block");
    }
  }

  private listItem(frame: ListFrame, item: ListItemNode): void {
    const ctx = this.ctx;
    const marker = frame.kind === "enumeratedList" ? `${frame.position}. ` : "- ";
    const hanging = `${frame.indent}${" ".repeat(marker.length)}`;

    ctx.requestBreaks(1);
    ctx.content(frame.indent);
    ctx.punct(marker);

    let first = true;
    let inlineRun = false;
    for (const child of item.children) {
      if (isInline(child)) {
        if (!first && !inlineRun) {
          ctx.requestBreaks(1);
          ctx.content(hanging);
        }
        this.inline(child);
        inlineRun = true;
      } else if (child.kind === "paragraph") {
        if (!first) {
          ctx.requestBreaks(1);
          ctx.content(hanging);
        }
        this.inlines(child.children);
        inlineRun = false;
      } else {
        this.block(child);
        inlineRun = false;
      }
      first = false;
    }
  }

  private directive(node: DirectiveNode): void {
    const ctx = this.ctx;
    const recognized = RECOGNIZED_DIRECTIVES.some((name) => name === node.name);
    const argument = node.argument?.trim();

    if (recognized && argument) {
      ctx.startBlock();
      ctx.style("bold-on");
      ctx.content(`Update ${argument}`);
      ctx.style("bold-off");
      ctx.endBlock("heading");
    } else {
      this.logger.debug("Directive rendered without prefix", {
        name: node.name,
        ...(argument === undefined && { reason: "missing argument" }),
      });
    }

    ctx.containerDepth += 1;
    this.blocks(node.children);
    ctx.containerDepth -= 1;
    ctx.endBlock("block");
  }

  private inline(node: DocumentNode): void {
    const ctx = this.ctx;

    switch (node.kind) {
      case "text":
        ctx.content(node.text);
        return;
      case "strong":
        ctx.style("bold-on");
        this.inlines(node.children);
        ctx.style("bold-off");
        return;
      case "emphasis":
        ctx.style("underline-on");
        this.inlines(node.children);
        ctx.style("underline-off");
        return;
      case "literal":
        ctx.escapeOnly("inverse-on");
        ctx.punct("`");
        ctx.content(node.text);
        ctx.punct("`");
        ctx.escapeOnly("inverse-off");
        return;
      case "reference": {
        const target = node.target?.trim();
        if (!target) {
          this.logger.debug("Reference without target rendered as text", {
            text: textContent(node),
          });
          this.inlines(node.children);
          return;
        }
        ctx.punct("[");
        this.inlines(node.children);
        ctx.punct(`](${target})`);
        return;
      }
      case "substitution": {
        const badge = BADGES[node.name];
        if (badge) ctx.style(badge);
        ctx.content(` ${node.name} `);
        if (badge) ctx.style("reset");
        return;
      }
      case "unknown":
        this.unsupported(node.name);
        ctx.content(textContent(node));
        return;
      default:
        // Block node in inline position: keep its text.
        this.unsupported(node.kind);
        ctx.content(textContent(node));
    }
  }

  private unsupported(name: string): void {
    this.logger.debug("Unsupported node rendered as plain text", { node: name });
  }
}

/**
 * Render a document tree into escape-styled, markdown and terminal text.
 */
export function render(
  tree: DocumentNode,
  options: RenderOptions = {}
): RenderedText {
  const logger = options.logger ?? silentLogger;
  const rendered = new TreeRenderer(options.briefingOnly ?? false, logger).run(tree);
  logger.debug("Rendered document", {
    briefing: options.briefingOnly ?? false,
    characters: rendered.text.length,
  });
  return rendered;
}
