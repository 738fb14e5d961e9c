import { LocalIndex } from "vectra";
import { IncompatibleIndexError, IndexNotFoundError } from "./errors";
import { Persistence, type IndexManifest } from "./persistence";
import type { Chunk, RetrievedChunk } from "./types";

/** A chunk together with the vector stored for it. */
export interface IndexedChunk {
  chunk: Chunk;
  vector: number[];
}

function toMetadata(chunk: Chunk) {
  return {
    text: chunk.text,
    source: chunk.source,
    position: chunk.position,
    heading: chunk.heading ?? "",
  };
}

/** Rebuild a {@link Chunk} from a stored item; null when the item is not one of ours. */
function fromItem(id: string, metadata: Record<string, unknown>): Chunk | null {
  const { text, source, position, heading } = metadata;
  if (typeof text !== "string" || typeof source !== "string" || typeof position !== "number") {
    return null;
  }
  return {
    id,
    text,
    source,
    position,
    ...(typeof heading === "string" && heading ? { heading } : {}),
  };
}

/**
 * Write `(vector, chunk)` pairs into a new vectra index under `dir`.
 * Any existing index at `dir` is replaced.
 */
export async function writeVectorIndex(dir: string, items: IndexedChunk[]): Promise<void> {
  const index = new LocalIndex(dir);
  await index.createIndex({ version: 1, deleteIfExists: true });
  await index.beginUpdate();
  try {
    for (const { chunk, vector } of items) {
      await index.insertItem({ id: chunk.id, vector, metadata: toMetadata(chunk) });
    }
    await index.endUpdate();
  } catch (e) {
    index.cancelUpdate();
    throw e;
  }
}

/**
 * Read-only view over a persisted index. Nothing here mutates the files on
 * disk, so one instance can serve concurrent requests.
 */
export class DocsIndex {
  private constructor(
    private readonly index: LocalIndex,
    public readonly manifest: IndexManifest,
    public readonly dir: string,
  ) {}

  /**
   * Open the index at `indexDir` for queries embedded with `embeddingModel`.
   *
   * @throws {IndexNotFoundError} If no built index exists there.
   * @throws {IncompatibleIndexError} If it was built with another embedding model.
   */
  public static async open(indexDir: string, embeddingModel: string): Promise<DocsIndex> {
    const persistence = new Persistence(indexDir);
    const dir = persistence.getIndexDir();
    const manifest = await persistence.readManifest();
    if (!manifest) throw new IndexNotFoundError(dir);
    if (manifest.embeddingModel !== embeddingModel) {
      throw new IncompatibleIndexError(manifest.embeddingModel, embeddingModel);
    }
    const index = new LocalIndex(dir);
    if (!(await index.isIndexCreated())) throw new IndexNotFoundError(dir);
    return new DocsIndex(index, manifest, dir);
  }

  public get size(): number {
    return this.manifest.chunkCount;
  }

  /** Nearest chunks to `vector` by cosine similarity, best first. */
  public async search(vector: number[], k: number): Promise<RetrievedChunk[]> {
    const count = Math.min(Math.max(0, Math.floor(k)), this.size);
    if (count === 0) return [];
    const results = await this.index.queryItems(vector, count);
    const out: RetrievedChunk[] = [];
    for (const r of results) {
      const chunk = fromItem(r.item.id, r.item.metadata);
      if (chunk) out.push({ chunk, score: r.score });
    }
    return out;
  }

  /** Every stored chunk with its vector, ordered by source then position. */
  public async listChunks(): Promise<IndexedChunk[]> {
    const items = await this.index.listItems();
    const out: IndexedChunk[] = [];
    for (const item of items) {
      const chunk = fromItem(item.id, item.metadata);
      if (chunk) out.push({ chunk, vector: item.vector });
    }
    return out.sort(
      (a, b) => a.chunk.source.localeCompare(b.chunk.source) || a.chunk.position - b.chunk.position,
    );
  }
}
