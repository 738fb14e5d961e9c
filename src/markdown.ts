import matter from "gray-matter";
import { marked, type Token } from "marked";
import type { Span, SpanKind } from "./types";

/** Consecutive spans under one heading (or before the first heading). */
export interface Section {
  /** Heading text, absent for content preceding the first heading. */
  heading?: string;
  /** Heading depth (1-6), absent for the leading section. */
  depth?: number;
  /** Concatenated raw markdown of the section, trimmed. Starts with the heading line. */
  text: string;
}

export interface FrontMatter {
  /** Markdown body with the front matter block removed. */
  body: string;
  /** `title` from the front matter, when it is a non-empty string. */
  title?: string;
}

const KIND_BY_TOKEN: Record<string, SpanKind> = {
  heading: "heading",
  lheading: "heading",
  paragraph: "paragraph",
  list: "list",
  code: "code",
  blockquote: "blockquote",
  table: "table",
  html: "html",
  hr: "hr",
  space: "space",
  text: "text",
};

/**
 * Split YAML front matter off a markdown file. A malformed front matter block
 * is left in the body untouched.
 */
export function stripFrontMatter(raw: string): FrontMatter {
  if (!raw.startsWith("---")) return { body: raw };
  try {
    const parsed = matter(raw);
    const title: unknown = parsed.data.title;
    return typeof title === "string" && title.trim()
      ? { body: parsed.content, title: title.trim() }
      : { body: parsed.content };
  } catch {
    return { body: raw };
  }
}

function toSpan(token: Token): Span {
  const kind = KIND_BY_TOKEN[token.type] ?? "text";
  if (kind !== "heading") return { kind, text: token.raw };
  const depth: unknown = "depth" in token ? token.depth : undefined;
  const title: unknown = "text" in token ? token.text : undefined;
  return {
    kind,
    text: token.raw,
    depth: typeof depth === "number" ? depth : 1,
    title: typeof title === "string" ? title.trim() : token.raw.replace(/^#+\s*/, "").trim(),
  };
}

/**
 * Tokenize markdown into an ordered list of top-level structural spans.
 * Pure: no filesystem access. Text that the lexer cannot handle is returned
 * as a single paragraph span.
 */
export function parseMarkdown(text: string): Span[] {
  if (!text) return [];
  try {
    return marked.lexer(text, { gfm: true }).map(toSpan);
  } catch {
    return [{ kind: "paragraph", text }];
  }
}

/**
 * Group spans into header-delimited sections. Every heading span opens a new
 * section; empty sections are dropped.
 */
export function splitSections(spans: Span[]): Section[] {
  const sections: Section[] = [];
  let current: { heading?: string; depth?: number; parts: string[] } = { parts: [] };

  const flush = () => {
    const text = current.parts.join("").trim();
    if (text) {
      const section: Section = { text };
      if (current.heading !== undefined) section.heading = current.heading;
      if (current.depth !== undefined) section.depth = current.depth;
      sections.push(section);
    }
  };

  for (const span of spans) {
    if (span.kind === "heading") {
      flush();
      current = { heading: span.title, depth: span.depth, parts: [span.text] };
    } else {
      current.parts.push(span.text);
    }
  }
  flush();
  return sections;
}
