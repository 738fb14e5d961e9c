import { Chunker } from "./chunker";
import { embedInBatches, type Embedder } from "./embeddings";
import { CorpusReadError, EmbeddingServiceError } from "./errors";
import { loadDocuments } from "./loader";
import { Persistence, type IndexManifest } from "./persistence";
import { statusManager } from "./status";
import type { Chunk, ChunkingOptions } from "./types";
import { writeVectorIndex } from "./vector-index";

/** Options for {@link IndexBuilder}. */
export interface IndexBuilderOptions {
  indexDir: string;
  embedder: Embedder;
  chunking: ChunkingOptions;
  /** Texts per embedding request (default 64). */
  batchSize?: number;
  verbose?: boolean;
}

export interface BuildResult {
  indexDir: string;
  manifest: IndexManifest;
}

/**
 * Embeds a complete chunk sequence and writes it as a new index. The live
 * index is only replaced after every chunk has a vector and the staged copy is
 * fully written; any failure leaves the previous index as it was.
 */
export class IndexBuilder {
  private readonly persistence: Persistence;
  private readonly embedder: Embedder;
  private readonly chunking: ChunkingOptions;
  private readonly batchSize: number;
  private readonly verbose: boolean;

  public constructor(opts: IndexBuilderOptions) {
    this.persistence = new Persistence(opts.indexDir, opts.verbose);
    this.embedder = opts.embedder;
    this.chunking = opts.chunking;
    this.batchSize = opts.batchSize ?? 64;
    this.verbose = !!opts.verbose;
  }

  /**
   * @param chunks Every chunk of the corpus, in order.
   * @param documentCount Number of source documents the chunks came from.
   * @throws {CorpusReadError} If there are no chunks.
   * @throws {EmbeddingServiceError} If any embedding call fails or vector sizes differ.
   */
  public async build(
    chunks: AsyncIterable<Chunk> | Iterable<Chunk>,
    documentCount: number,
  ): Promise<BuildResult> {
    const all: Chunk[] = [];
    for await (const chunk of chunks) all.push(chunk);
    if (all.length === 0) throw new CorpusReadError("No chunks to index: the corpus is empty.");

    statusManager.setIndexTotals(documentCount, all.length);
    console.error(`[docs-chat] Created ${all.length} chunks. Generating embeddings...`);

    let reported = 0;
    const vectors = await embedInBatches(
      this.embedder,
      all.map((c) => c.text),
      this.batchSize,
      (done, total) => {
        statusManager.incEmbedded(done - reported);
        reported = done;
        if (this.verbose) {
          const pct = ((done / Math.max(1, total)) * 100).toFixed(1);
          console.error(`[docs-chat][verbose] Embedding progress: ${done}/${total} (${pct}%)`);
        }
      },
    );

    const dimensions = vectors[0]?.length ?? 0;
    if (dimensions === 0 || vectors.some((v) => v.length !== dimensions)) {
      throw new EmbeddingServiceError("Embedding vectors are empty or of inconsistent dimensions");
    }

    const manifest: IndexManifest = {
      version: 1,
      embeddingModel: this.embedder.getModelName(),
      dimensions,
      chunkSize: this.chunking.chunkSize,
      chunkOverlap: this.chunking.chunkOverlap,
      chunkCount: all.length,
      documentCount,
      builtAt: new Date().toISOString(),
    };

    const staging = await this.persistence.createStagingDir();
    try {
      await writeVectorIndex(
        staging,
        all.map((chunk, i) => ({ chunk, vector: vectors[i] ?? [] })),
      );
      await this.persistence.writeManifest(staging, manifest);
      await this.persistence.commit(staging);
    } catch (e) {
      await this.persistence.discard(staging);
      throw e;
    }

    statusManager.markReady(manifest.builtAt);
    console.error(`[docs-chat] Index written to ${this.persistence.getIndexDir()}`);
    return { indexDir: this.persistence.getIndexDir(), manifest };
  }
}

export interface IndexCorpusOptions extends IndexBuilderOptions {
  docsRoot: string;
  excludedFolders?: string[];
}

/**
 * Full offline pipeline: load every markdown file under `docsRoot`, chunk,
 * embed and write the index. Always a full rebuild.
 *
 * @throws {CorpusReadError} If the corpus cannot be read or holds no markdown.
 */
export async function indexCorpus(opts: IndexCorpusOptions): Promise<BuildResult> {
  statusManager.resetIndexing();
  const docs = await loadDocuments(opts.docsRoot, {
    excludedFolders: opts.excludedFolders,
    verbose: opts.verbose,
  });
  if (docs.length === 0) {
    throw new CorpusReadError(`No markdown documents found in ${opts.docsRoot}`);
  }
  const chunker = new Chunker(opts.chunking);
  const builder = new IndexBuilder({
    ...opts,
    chunking: { chunkSize: chunker.chunkSize, chunkOverlap: chunker.chunkOverlap },
  });
  return builder.build(chunker.chunkAll(docs), docs.length);
}
