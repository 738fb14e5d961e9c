import { z } from "zod";
import { EmbeddingServiceError, errorMessage } from "./errors";
import { postJson, type OpenAIEndpointOptions } from "./openai-http";

/**
 * Narrow embedding interface shared by the index builder and the retriever.
 * Index-time and query-time vectors must come from the same model.
 */
export interface Embedder {
  /** Identifier of the underlying model; recorded in the index manifest. */
  getModelName(): string;
  embed(text: string): Promise<number[]>;
  /** Embed several texts; the result is index-aligned with the input. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().nonnegative().optional(),
        embedding: z.array(z.number()),
      }),
    )
    .min(1),
});

export interface OpenAIEmbeddingsOptions extends OpenAIEndpointOptions {
  model: string;
}

/**
 * Embedding client for an OpenAI-compatible `/embeddings` endpoint.
 * One instance can be reused for any number of calls.
 */
export class OpenAIEmbeddings implements Embedder {
  private readonly opts: OpenAIEmbeddingsOptions;

  public constructor(opts: OpenAIEmbeddingsOptions) {
    this.opts = opts;
  }

  public getModelName(): string {
    return this.opts.model;
  }

  public async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) throw new EmbeddingServiceError("Embedding API returned no vector");
    return vector;
  }

  /**
   * @throws {EmbeddingServiceError} If the call fails or the payload does not
   *   carry exactly one vector per input.
   */
  public async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    let raw: unknown;
    try {
      raw = await postJson(this.opts, "/embeddings", { model: this.opts.model, input: texts });
    } catch (e) {
      throw new EmbeddingServiceError(`Embedding request failed: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = EmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingServiceError(`Unexpected embedding response: ${parsed.error.message}`);
    }
    const data = parsed.data.data;
    if (data.length !== texts.length) {
      throw new EmbeddingServiceError(
        `Embedding API returned ${data.length} vectors for ${texts.length} inputs`,
      );
    }
    // Results may arrive out of order; `index` points back at the input.
    const out = new Array<number[]>(texts.length);
    data.forEach((item, i) => {
      out[item.index ?? i] = item.embedding;
    });
    for (let i = 0; i < out.length; i++) {
      if (!out[i]) throw new EmbeddingServiceError(`Embedding API returned no vector for input ${i}`);
    }
    return out;
  }
}

/**
 * Embed texts in sequential batches of `batchSize`, reporting progress after
 * each batch. The first failing batch aborts the whole run.
 */
export async function embedInBatches(
  embedder: Embedder,
  texts: string[],
  batchSize: number,
  onProgress?: (done: number, total: number) => void,
): Promise<number[][]> {
  const size = Math.max(1, Math.floor(batchSize));
  const results: number[][] = [];
  for (let i = 0; i < texts.length; i += size) {
    const batch = texts.slice(i, i + size);
    const vectors = await embedder.embedBatch(batch);
    if (vectors.length !== batch.length) {
      throw new EmbeddingServiceError(
        `Embedder returned ${vectors.length} vectors for a batch of ${batch.length}`,
      );
    }
    results.push(...vectors);
    onProgress?.(results.length, texts.length);
  }
  return results;
}
