/**
 * Factories for document nodes.
 *
 * Inline children may be given as plain strings; they become text nodes.
 */

import type {
  BulletListNode,
  DirectiveNode,
  DocumentNode,
  DocumentRoot,
  EmphasisNode,
  EnumeratedListNode,
  ListItemNode,
  LiteralNode,
  ParagraphNode,
  ReferenceNode,
  SectionNode,
  StrongNode,
  SubstitutionNode,
  SubtitleNode,
  TextNode,
  TitleNode,
  TransitionNode,
  UnknownNode,
} from "./types";

type Child = DocumentNode | string;

function toNodes(children: readonly Child[]): DocumentNode[] {
  return children.map((child) =>
    typeof child === "string" ? text(child) : child
  );
}

export function document(...children: Child[]): DocumentRoot {
  return { kind: "document", children: toNodes(children) };
}

export function section(...children: Child[]): SectionNode {
  return { kind: "section", children: toNodes(children) };
}

export function title(...children: Child[]): TitleNode {
  return { kind: "title", children: toNodes(children) };
}

export function subtitle(...children: Child[]): SubtitleNode {
  return { kind: "subtitle", children: toNodes(children) };
}

export function paragraph(...children: Child[]): ParagraphNode {
  return { kind: "paragraph", children: toNodes(children) };
}

export function strong(...children: Child[]): StrongNode {
  return { kind: "strong", children: toNodes(children) };
}

export function emphasis(...children: Child[]): EmphasisNode {
  return { kind: "emphasis", children: toNodes(children) };
}

export function literal(value: string): LiteralNode {
  return { kind: "literal", text: value };
}

export function reference(
  target: string | undefined,
  ...children: Child[]
): ReferenceNode {
  return {
    kind: "reference",
    children: toNodes(children),
    ...(target !== undefined && { target }),
  };
}

export function bulletList(...items: ListItemNode[]): BulletListNode {
  return { kind: "bulletList", children: items };
}

export function enumeratedList(...items: ListItemNode[]): EnumeratedListNode {
  return { kind: "enumeratedList", children: items };
}

export function listItem(...children: Child[]): ListItemNode {
  return { kind: "listItem", children: toNodes(children) };
}

export function substitution(name: string): SubstitutionNode {
  return { kind: "substitution", name };
}

export function directive(
  name: string,
  argument: string | undefined,
  ...children: Child[]
): DirectiveNode {
  return {
    kind: "directive",
    name,
    children: toNodes(children),
    ...(argument !== undefined && { argument }),
  };
}

export function transition(): TransitionNode {
  return { kind: "transition" };
}

export function text(value: string): TextNode {
  return { kind: "text", text: value };
}

export function unknown(
  name: string,
  block: boolean,
  content: string | readonly DocumentNode[]
): UnknownNode {
  return typeof content === "string"
    ? { kind: "unknown", name, block, text: content }
    : { kind: "unknown", name, block, children: content };
}
