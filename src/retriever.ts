import type { Embedder } from "./embeddings";
import type { RetrievedChunk } from "./types";
import type { DocsIndex } from "./vector-index";

export interface RetrieverOptions {
  /** Default number of chunks to return. */
  topK: number;
  /** Chunks scoring below this cosine similarity are dropped. */
  minScore: number;
}

/**
 * Embeds a query with the index-time embedder and looks up its nearest
 * chunks. Read-only with respect to the index.
 */
export class Retriever {
  public constructor(
    private readonly index: DocsIndex,
    private readonly embedder: Embedder,
    private readonly opts: RetrieverOptions,
  ) {}

  public async retrieve(query: string, k = this.opts.topK): Promise<RetrievedChunk[]> {
    if (this.index.size === 0) return [];
    const vector = await this.embedder.embed(query);
    const results = await this.index.search(vector, k);
    return results.filter((r) => r.score >= this.opts.minScore);
  }
}
