/**
 * Document tree consumed by the renderer.
 *
 * The tree is a closed discriminated union on `kind`. Producers (the
 * markdown adapter, tests, other parsers) build it once; the renderer
 * treats it as read-only input.
 */

interface Container {
  readonly children: readonly DocumentNode[];
}

export interface DocumentRoot extends Container {
  readonly kind: "document";
}

/** Groups the blocks under a heading; nests to give deeper headings. */
export interface SectionNode extends Container {
  readonly kind: "section";
}

export interface TitleNode extends Container {
  readonly kind: "title";
}

export interface SubtitleNode extends Container {
  readonly kind: "subtitle";
}

export interface ParagraphNode extends Container {
  readonly kind: "paragraph";
}

export interface StrongNode extends Container {
  readonly kind: "strong";
}

export interface EmphasisNode extends Container {
  readonly kind: "emphasis";
}

export interface LiteralNode {
  readonly kind: "literal";
  readonly text: string;
}

export interface ReferenceNode extends Container {
  readonly kind: "reference";
  /** Link target. Missing or empty targets render as plain text. */
  readonly target?: string;
}

export interface BulletListNode extends Container {
  readonly kind: "bulletList";
}

export interface EnumeratedListNode extends Container {
  readonly kind: "enumeratedList";
}

export interface ListItemNode extends Container {
  readonly kind: "listItem";
}

export interface SubstitutionNode {
  readonly kind: "substitution";
  readonly name: string;
}

export interface DirectiveNode extends Container {
  readonly kind: "directive";
  readonly name: string;
  readonly argument?: string;
}

export interface TransitionNode {
  readonly kind: "transition";
}

export interface TextNode {
  readonly kind: "text";
  readonly text: string;
}

/** A node from the producer that has no styled form. */
export interface UnknownNode {
  readonly kind: "unknown";
  /** The producer's own name for the node, kept for logging. */
  readonly name: string;
  readonly block: boolean;
  readonly text?: string;
  readonly children?: readonly DocumentNode[];
}

export type DocumentNode =
  | DocumentRoot
  | SectionNode
  | TitleNode
  | SubtitleNode
  | ParagraphNode
  | StrongNode
  | EmphasisNode
  | LiteralNode
  | ReferenceNode
  | BulletListNode
  | EnumeratedListNode
  | ListItemNode
  | SubstitutionNode
  | DirectiveNode
  | TransitionNode
  | TextNode
  | UnknownNode;

export type NodeKind = DocumentNode["kind"];

/**
 * Concatenated text of a node and its descendants, without markup.
 */
export function textContent(node: DocumentNode): string {
  switch (node.kind) {
    case "text":
    case "literal":
      return node.text;
    case "substitution":
      return node.name;
    case "transition":
      return "";
    case "unknown":
      return (
        node.text ?? (node.children ?? []).map((child) => textContent(child)).join("")
      );
    default:
      return node.children.map((child) => textContent(child)).join("");
  }
}
