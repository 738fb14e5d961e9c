/**
 * Offline index build.
 *
 * Walks DOCS_ROOT for markdown files, chunks them (header sections first, then
 * a recursive splitter bounded by CHUNK_SIZE / CHUNK_OVERLAP), embeds every
 * chunk with EMBEDDING_MODEL and writes the vector index to INDEX_DIR,
 * replacing any previous index wholesale. A failure at any step leaves the
 * previous index in place and exits with code 1.
 *
 * Run with: npm run build-index
 */
import { getConfig } from "./config";
import { errorMessage } from "./errors";
import { indexCorpus } from "./indexer";
import { createEmbedder } from "./services";
import { statusManager } from "./status";

const config = getConfig();

try {
  const embedder = createEmbedder(config);
  const started = Date.now();
  const { manifest, indexDir } = await indexCorpus({
    docsRoot: config.DOCS_ROOT,
    excludedFolders: config.EXCLUDED_FOLDERS,
    indexDir: config.INDEX_DIR,
    embedder,
    chunking: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
    batchSize: config.EMBEDDING_BATCH_SIZE,
    verbose: config.VERBOSE,
  });
  const { indexing } = statusManager.getStatus();
  console.error(
    `[docs-chat] Indexed ${indexing.documents} documents / ${indexing.chunksEmbedded} of ${indexing.chunksTotal} chunks embedded ` +
      `(${manifest.dimensions}-dim, ${manifest.embeddingModel}) into ${indexDir} in ${((Date.now() - started) / 1000).toFixed(1)}s`,
  );
} catch (err) {
  console.error(`[docs-chat] Index build failed: ${errorMessage(err)}`);
  process.exitCode = 1;
}
