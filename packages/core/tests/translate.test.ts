import { describe, expect, test } from "vitest";

import {
  bulletList,
  directive,
  document,
  emphasis,
  enumeratedList,
  listItem,
  literal,
  paragraph,
  reference,
  section,
  strong,
  substitution,
  subtitle,
  title,
  transition,
  unknown,
} from "../src/document/build";
import { render } from "../src/render/translate";

const BOLD = "\u001B[1m";
const UNBOLD = "\u001B[22m";

describe("render", () => {
  test("renders a title and a paragraph into all three streams", () => {
    const tree = document(
      title("Release Notes"),
      paragraph(strong("v2.0"), " is out.")
    );

    expect(render(tree)).toEqual({
      escapeBody: `${BOLD}Release Notes${UNBOLD}\n${BOLD}v2.0${UNBOLD} is out.`,
      markdownBody: "# Release Notes\n**v2.0** is out.",
      text: `${BOLD}# Release Notes${UNBOLD}\n${BOLD}v2.0${UNBOLD} is out.`,
    });
  });

  test("separates paragraphs with a blank line", () => {
    const tree = document(paragraph("First."), paragraph("Second."));
    expect(render(tree).markdownBody).toBe("First.\n\nSecond.");
  });

  test("briefing stops after the first main paragraph", () => {
    const tree = document(title("T"), paragraph("First."), paragraph("Second."));
    expect(render(tree, { briefingOnly: true }).markdownBody).toBe("# T\nFirst.");
  });

  test("briefing waits for the title before counting paragraphs", () => {
    const tree = document(paragraph("intro"), title("T"), paragraph("main"), paragraph("rest"));

    const rendered = render(tree, { briefingOnly: true });
    expect(rendered.markdownBody).toBe("intro\n\n# T\nmain");
    expect(rendered.escapeBody).toBe(`intro\n\n${BOLD}T${UNBOLD}\nmain`);
  });

  test("briefing ignores paragraphs inside lists", () => {
    const tree = document(
      bulletList(listItem(paragraph("a")), listItem(paragraph("b"))),
      paragraph("after"),
      paragraph("more")
    );

    const rendered = render(tree, { briefingOnly: true });
    expect(rendered.markdownBody).toBe("- a\n- b\n\nafter");
    expect(rendered.escapeBody).toBe("a\nb\n\nafter");
  });

  test("briefing without any main paragraph renders everything", () => {
    const tree = document(title("T"), bulletList(listItem("only")));
    expect(render(tree, { briefingOnly: true }).markdownBody).toBe("# T\n- only");
  });

  test("numbers each enumerated list from one", () => {
    const tree = document(
      enumeratedList(listItem("one"), listItem("two")),
      enumeratedList(listItem("x"))
    );
    expect(render(tree).markdownBody).toBe("1. one\n2. two\n\n1. x");
  });

  test("restores the outer numbering after a nested enumerated list", () => {
    const tree = document(
      enumeratedList(
        listItem(paragraph("a"), enumeratedList(listItem(paragraph("x")), listItem(paragraph("y")))),
        listItem(paragraph("b"))
      )
    );

    const rendered = render(tree);
    expect(rendered.markdownBody).toBe("1. a\n  1. x\n  2. y\n2. b");
    expect(rendered.escapeBody).toBe("a\n  x\n  y\nb");
  });

  test("plain text renders identically in escape and markdown bodies", () => {
    const tree = document(
      paragraph("one ", reference(undefined, "two")),
      paragraph("three"),
      transition(),
      paragraph("four")
    );

    const rendered = render(tree);
    expect(rendered.escapeBody).toBe("one two\n\nthree\n\n---\n\nfour");
    expect(rendered.markdownBody).toBe(rendered.escapeBody);
    expect(rendered.text).toBe(rendered.escapeBody);
  });

  test("indents nested lists", () => {
    const tree = document(
      bulletList(listItem(paragraph("outer"), bulletList(listItem("inner"))))
    );

    const rendered = render(tree);
    expect(rendered.markdownBody).toBe("- outer\n  - inner");
    expect(rendered.escapeBody).toBe("outer\n  inner");
  });

  test("renders section titles one level deeper", () => {
    const tree = document(title("T"), section(title("S"), paragraph("p")));

    const rendered = render(tree);
    expect(rendered.markdownBody).toBe("# T\n## S\np");
    expect(rendered.escapeBody).toBe(`${BOLD}T${UNBOLD}\n${BOLD}S${UNBOLD}\np`);
  });

  test("renders the subtitle without bold", () => {
    const tree = document(title("T"), subtitle("Sub"));

    const rendered = render(tree);
    expect(rendered.markdownBody).toBe("# T\n## Sub");
    expect(rendered.escapeBody).toBe(`${BOLD}T${UNBOLD}\nSub`);
  });

  test("renders a transition as a rule in every body", () => {
    const tree = document(paragraph("a"), transition(), paragraph("b"));
    expect(render(tree)).toEqual({
      escapeBody: "a\n\n---\n\nb",
      markdownBody: "a\n\n---\n\nb",
      text: "a\n\n---\n\nb",
    });
  });

  test("prefixes update directives with a bold line", () => {
    const tree = document(directive("update", "30/03/2021", paragraph("Fixed.")));

    const rendered = render(tree);
    expect(rendered.escapeBody).toBe(`${BOLD}Update 30/03/2021${UNBOLD}\nFixed.`);
    expect(rendered.markdownBody).toBe("**Update 30/03/2021**\nFixed.");
  });

  test("renders unrecognised directives as their content", () => {
    const tree = document(directive("note", undefined, paragraph("x")));
    expect(render(tree).markdownBody).toBe("x");
  });

  test("renders unknown blocks as plain text", () => {
    const tree = document(paragraph("a"), unknown("table", true, "raw"));
    expect(render(tree).markdownBody).toBe("a\n\nraw");
  });
});

describe("render inline nodes", () => {
  test("strong on its own", () => {
    const rendered = render(strong("x"));
    expect(rendered.escapeBody).toBe(`${BOLD}x${UNBOLD}`);
    expect(rendered.markdownBody).toBe("**x**");
  });

  test("emphasis underlines", () => {
    const rendered = render(emphasis("x"));
    expect(rendered.escapeBody).toBe("\u001B[4mx\u001B[24m");
    expect(rendered.markdownBody).toBe("_x_");
  });

  test("literal is inverse in escape text and backquoted in markdown", () => {
    expect(render(literal("code"))).toEqual({
      escapeBody: "\u001B[7mcode\u001B[27m",
      markdownBody: "`code`",
      text: "\u001B[7m`code`\u001B[27m",
    });
  });

  test("references keep their target in markdown", () => {
    const rendered = render(
      paragraph("See ", reference("https://example.org", "docs"), ".")
    );
    expect(rendered.markdownBody).toBe("See [docs](https://example.org).");
    expect(rendered.escapeBody).toBe("See docs.");
  });

  test("references without a target degrade to their text", () => {
    expect(render(paragraph(reference(undefined, "docs"))).markdownBody).toBe("docs");
  });

  test("badge substitutions get a background colour and a reset", () => {
    const rendered = render(paragraph(substitution("Warning"), " disk full"));
    expect(rendered.escapeBody).toBe("\u001B[41m Warning \u001B[0m disk full");
    expect(rendered.markdownBody).toBe(" Warning  disk full");
  });

  test("other substitutions are padded text", () => {
    expect(render(substitution("Note")).escapeBody).toBe(" Note ");
  });
});
