import { APP_VERSION } from "./config";

/**
 * Counters for the indexing pipeline (offline build) or the loaded index (server).
 * All values are non-negative integers updated in place.
 */
export interface IndexingStatus {
  /** Markdown documents discovered under the documentation root. */
  documents: number;
  /** Chunks produced from those documents. */
  chunksTotal: number;
  /** Chunks that have an embedding so far. */
  chunksEmbedded: number;
  /** ISO timestamp of the build that produced the loaded index, if known. */
  builtAt: string | null;
}

/**
 * Mutable in-memory snapshot of process lifecycle state. Exposed read-only
 * through `statusManager.getStatus()` and served by `GET /health`.
 *
 * ready = true once an index is fully built (CLI) or loaded (server).
 */
export interface ServiceStatus {
  version: string;
  docsRoot: string;
  indexDir: string;
  embeddingModel: string;
  chatModel: string;
  ready: boolean;
  startedAt: string;
  /** Live sessions held by the session store. */
  sessions: number;
  indexing: IndexingStatus;
}

/** Class wrapper around mutable status state. */
export class StatusManager {
  private readonly data: ServiceStatus;
  private sessionCounter: (() => number) | null = null;

  public constructor(initial?: Partial<ServiceStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsRoot: initial?.docsRoot ?? "",
      indexDir: initial?.indexDir ?? "",
      embeddingModel: initial?.embeddingModel ?? "",
      chatModel: initial?.chatModel ?? "",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      sessions: initial?.sessions ?? 0,
      indexing: initial?.indexing ?? {
        documents: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        builtAt: null,
      },
    };
  }

  public setPaths(docsRoot: string, indexDir: string) {
    this.data.docsRoot = docsRoot;
    this.data.indexDir = indexDir;
  }

  public setModels(embeddingModel: string, chatModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.chatModel = chatModel;
  }

  /** Initialize / update document + chunk totals. */
  public setIndexTotals(documents: number, chunks: number) {
    this.data.indexing.documents = documents;
    this.data.indexing.chunksTotal = chunks;
  }

  /** Increment the number of chunks that have embeddings generated. */
  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  public markReady(builtAt?: string) {
    if (builtAt) this.data.indexing.builtAt = builtAt;
    this.data.ready = true;
  }

  /** Reset readiness and counters before a (re)build. */
  public resetIndexing() {
    this.data.ready = false;
    this.data.indexing = { documents: 0, chunksTotal: 0, chunksEmbedded: 0, builtAt: null };
  }

  /** Register a live session counter (usually the session store's `size`). */
  public trackSessions(counter: () => number) {
    this.sessionCounter = counter;
  }

  /** Current status; the session count is sampled on every call. */
  public getStatus(): ServiceStatus {
    if (this.sessionCounter) this.data.sessions = this.sessionCounter();
    return this.data;
  }

  public toJSON() {
    return this.getStatus();
  }
}

// Singleton shared by the indexer, the CLI and the HTTP health endpoint.
export const statusManager = new StatusManager();
