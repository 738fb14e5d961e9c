import { describe, expect, it } from "vitest";
import { parseMarkdown, splitSections, stripFrontMatter } from "./markdown";

describe("parseMarkdown", () => {
  const source = "# Title\n\nSome text.\n\n- a\n- b\n\n```\n# not a heading\n```\n";

  it("returns top-level spans in source order", () => {
    const kinds = parseMarkdown(source)
      .map((s) => s.kind)
      .filter((k) => k !== "space");
    expect(kinds).toEqual(["heading", "paragraph", "list", "code"]);
  });

  it("keeps the raw markdown of every span", () => {
    expect(
      parseMarkdown(source)
        .map((s) => s.text)
        .join(""),
    ).toBe(source);
  });

  it("records heading depth and title", () => {
    const [heading] = parseMarkdown("### Install steps\n");
    expect(heading).toEqual({ kind: "heading", text: "### Install steps\n", depth: 3, title: "Install steps" });
  });

  it("does not treat a hash line inside a fenced code block as a heading", () => {
    const headings = parseMarkdown(source).filter((s) => s.kind === "heading");
    expect(headings).toHaveLength(1);
    expect(headings[0]?.title).toBe("Title");
  });

  it("returns nothing for empty input", () => {
    expect(parseMarkdown("")).toEqual([]);
  });
});

describe("splitSections", () => {
  it("starts a new section at every heading", () => {
    const sections = splitSections(parseMarkdown("Intro line.\n\n# A\n\nalpha\n\n## B\n\nbeta\n"));
    expect(sections).toEqual([
      { text: "Intro line." },
      { heading: "A", depth: 1, text: "# A\n\nalpha" },
      { heading: "B", depth: 2, text: "## B\n\nbeta" },
    ]);
  });

  it("yields a single section for a document without headings", () => {
    const sections = splitSections(parseMarkdown("first paragraph\n\nsecond paragraph\n"));
    expect(sections).toEqual([{ text: "first paragraph\n\nsecond paragraph" }]);
  });

  it("drops empty leading content", () => {
    const sections = splitSections(parseMarkdown("\n\n# Only\n"));
    expect(sections).toEqual([{ heading: "Only", depth: 1, text: "# Only" }]);
  });
});

describe("stripFrontMatter", () => {
  it("removes front matter and exposes the title", () => {
    const { body, title } = stripFrontMatter("---\ntitle: Getting Started\n---\n# Intro\n");
    expect(title).toBe("Getting Started");
    expect(body.trim()).toBe("# Intro");
  });

  it("leaves documents without front matter untouched", () => {
    expect(stripFrontMatter("# Intro\n")).toEqual({ body: "# Intro\n" });
  });

  it("keeps malformed front matter as plain text", () => {
    const raw = "---\ntitle: [unclosed\n---\nbody\n";
    expect(stripFrontMatter(raw)).toEqual({ body: raw });
  });
});
