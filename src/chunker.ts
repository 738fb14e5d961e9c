import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { parseMarkdown, splitSections } from "./markdown";
import type { Chunk, ChunkingOptions, Document } from "./types";

/** Natural boundaries tried in order: paragraph, line, sentence, word. */
export const NATURAL_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", " "];

const SENTENCE_END = /^[.!?]$/;

/**
 * Ensure overlap < size for forward progress. An out-of-range overlap falls
 * back to 15% of the chunk size.
 */
export function resolveOverlap(chunkSize: number, chunkOverlap: number): number {
  if (chunkOverlap >= 0 && chunkOverlap < chunkSize) return chunkOverlap;
  const fallback = Math.max(0, Math.floor(chunkSize * 0.15));
  console.error(
    `[docs-chat] Provided chunkOverlap (=${chunkOverlap}) >= chunkSize (=${chunkSize}). Using fallback overlap ${fallback}.`,
  );
  return fallback;
}

/**
 * Split text into fixed-size windows where each window starts `size - overlap`
 * characters after the previous one, so adjacent windows share exactly
 * `overlap` characters. The final window may be shorter and always ends at the
 * end of the text.
 *
 * @param text Input string to divide.
 * @param size Maximum characters per window.
 * @param overlap Characters shared with the previous window. Must be < size.
 */
export function splitWindows(text: string, size: number, overlap: number): string[] {
  const out: string[] = [];
  const step = Math.max(1, size - overlap);
  for (let i = 0; i < text.length; i += step) {
    out.push(text.slice(i, i + size));
    if (i + size >= text.length) break;
  }
  return out;
}

/**
 * Splits markdown documents into bounded chunks. Header boundaries come
 * first; a section longer than `chunkSize` is split recursively at natural
 * boundaries, and any piece with no boundary left is cut into overlapping
 * fixed windows.
 */
export class Chunker {
  public readonly chunkSize: number;
  public readonly chunkOverlap: number;
  private readonly splitter: RecursiveCharacterTextSplitter;

  public constructor(opts: ChunkingOptions) {
    this.chunkSize = Math.max(1, Math.floor(opts.chunkSize));
    this.chunkOverlap = resolveOverlap(this.chunkSize, Math.floor(opts.chunkOverlap));
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.chunkSize,
      chunkOverlap: this.chunkOverlap,
      separators: NATURAL_SEPARATORS,
      keepSeparator: false,
    });
  }

  /** Lazily yield the chunks of one document in source order. */
  public async *chunk(doc: Document): AsyncGenerator<Chunk> {
    const sections = splitSections(parseMarkdown(doc.text));
    let position = 0;
    for (const section of sections) {
      for (const text of await this.splitText(section.text)) {
        const chunk: Chunk = {
          id: `${doc.path}#${position}`,
          text,
          source: doc.path,
          position,
          ...(section.heading ? { heading: section.heading } : {}),
        };
        position++;
        yield chunk;
      }
    }
  }

  /** Chunk several documents one after another. */
  public async *chunkAll(docs: Iterable<Document>): AsyncGenerator<Chunk> {
    for (const doc of docs) yield* this.chunk(doc);
  }

  /** Split one block of text so every piece is at most `chunkSize` characters. */
  public async splitText(text: string): Promise<string[]> {
    if (text.length <= this.chunkSize) return text ? [text] : [];
    const pieces = this.restoreClosingPunctuation(text, await this.splitter.splitText(text));
    return pieces.flatMap((piece) =>
      piece.length > this.chunkSize
        ? splitWindows(piece, this.chunkSize, this.chunkOverlap)
        : [piece],
    );
  }

  /**
   * The splitter drops the separator it cut at, so a piece ending at a
   * sentence boundary loses its `.`, `!` or `?`. Put it back from the source
   * when the piece still fits.
   */
  private restoreClosingPunctuation(text: string, pieces: string[]): string[] {
    let from = 0;
    return pieces.map((piece) => {
      const at = text.indexOf(piece, from);
      if (at < 0) return piece;
      from = at + 1;
      const next = text.charAt(at + piece.length);
      return SENTENCE_END.test(next) && piece.length < this.chunkSize ? piece + next : piece;
    });
  }
}
