/**
 * Shared document / chunk / session types used across the indexing pipeline,
 * the retrieval layer and the HTTP transport.
 */

/** A markdown file loaded from the documentation root. Immutable once loaded. */
export interface Document {
  /** Path relative to the documentation root (forward slashes). Used as the source id. */
  readonly path: string;
  /** Absolute filesystem path. */
  readonly absolutePath: string;
  /** Markdown body with any front matter removed. */
  readonly text: string;
  /** Front matter `title`, else the first heading, when present. */
  readonly title?: string;
  /** Size of the original file in bytes. */
  readonly size: number;
}

export type SpanKind =
  | "heading"
  | "paragraph"
  | "list"
  | "code"
  | "blockquote"
  | "table"
  | "html"
  | "hr"
  | "space"
  | "text";

/** One top-level structural element of a markdown document, in source order. */
export interface Span {
  readonly kind: SpanKind;
  /** Raw markdown of the span, as written in the source. */
  readonly text: string;
  /** Heading level (1-6); headings only. */
  readonly depth?: number;
  /** Heading text without the leading hashes; headings only. */
  readonly title?: string;
}

/** A bounded span of text extracted from a document; the unit of retrieval. */
export interface Chunk {
  /** `<source>#<position>`; stable across rebuilds of an unchanged corpus. */
  readonly id: string;
  readonly text: string;
  /** Path of the source document relative to the documentation root. */
  readonly source: string;
  /** 0-based order of the chunk within its source document. */
  readonly position: number;
  /** Nearest enclosing heading, if any. */
  readonly heading?: string;
}

export interface ChunkingOptions {
  /** Maximum characters per chunk. */
  chunkSize: number;
  /** Characters shared between adjacent sub-chunks of an oversized section. */
  chunkOverlap: number;
}

/** A chunk returned from a similarity query together with its cosine score. */
export interface RetrievedChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

export interface ChatTurn {
  readonly question: string;
  readonly answer: string;
}

/** Per-session conversational state. Lives in process memory only. */
export interface Session {
  readonly id: string;
  readonly createdAt: number;
  lastSeenAt: number;
  readonly history: ChatTurn[];
}

/** OpenAI-style chat message. */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}
