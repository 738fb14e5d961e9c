/**
 * Application entry point: the chat HTTP service.
 *
 * High-level flow:
 * 1. Load environment configuration (dotenv, see config.ts).
 * 2. Create the embedding + chat-completion clients.
 * 3. Open the index written by `npm run build-index` (read-only). A missing or
 *    incompatible index does not stop the server: /chat answers 503 and
 *    /health reports ready=false until the process is restarted on a built index.
 * 4. Start the Express transport.
 *
 * ENVIRONMENT VARIABLES (all optional unless marked required):
 *  - OPENAI_API_KEY      Required. Key for the embeddings + chat endpoints.
 *  - OPENAI_BASE_URL     OpenAI-compatible API base (default https://api.openai.com/v1).
 *  - EMBEDDING_MODEL     Must match the model the index was built with.
 *  - CHAT_MODEL          Chat-completion model (default gpt-4o-mini).
 *  - CHAT_TEMPERATURE    Sampling temperature (default 0.7).
 *  - INDEX_DIR           Index directory (default .docs-index).
 *  - TOP_K / MIN_SCORE   Retrieval depth and cosine cutoff (default 4 / 0.3).
 *  - MAX_HISTORY_TURNS   Conversation turns replayed to the model (default 10).
 *  - SESSION_TTL_MS      Idle session expiry, 0 = never (default 0).
 *  - MAX_SESSIONS        Live session cap, 0 = unbounded (default 0).
 *  - ANSWER_FORMAT       "text" (default) or "html" (newlines become <br>).
 *  - PORT / HOST         Bind address (default 8000 / 127.0.0.1).
 *  - VERBOSE             Extra logging when 1/true/yes/on.
 */
import { ChatService } from "./chat";
import { getConfig, type Config } from "./config";
import { errorMessage } from "./errors";
import { Retriever } from "./retriever";
import { createCompleter, createEmbedder } from "./services";
import { InMemorySessionStore } from "./sessions";
import { statusManager } from "./status";
import { createApp, startHttpTransport } from "./transport/http";
import { DocsIndex } from "./vector-index";

const config: Config = getConfig();
statusManager.setPaths(config.DOCS_ROOT, config.INDEX_DIR);

const embedder = createEmbedder(config);
const completer = createCompleter(config);
statusManager.setModels(embedder.getModelName(), completer.getModelName());

const sessions = new InMemorySessionStore({
  ttlMs: config.SESSION_TTL_MS,
  maxSessions: config.MAX_SESSIONS,
});
statusManager.trackSessions(() => sessions.size);

let chat: ChatService | null = null;
let unavailableReason: string | undefined;
try {
  const index = await DocsIndex.open(config.INDEX_DIR, embedder.getModelName());
  statusManager.setIndexTotals(index.manifest.documentCount, index.manifest.chunkCount);
  statusManager.incEmbedded(index.manifest.chunkCount);
  statusManager.markReady(index.manifest.builtAt);
  console.error(
    `[docs-chat] Loaded index: ${index.manifest.chunkCount} chunks from ${index.manifest.documentCount} documents (built ${index.manifest.builtAt}).`,
  );
  const retriever = new Retriever(index, embedder, {
    topK: config.TOP_K,
    minScore: config.MIN_SCORE,
  });
  chat = new ChatService(retriever, completer, sessions, {
    topK: config.TOP_K,
    maxHistoryTurns: config.MAX_HISTORY_TURNS,
    answerFormat: config.ANSWER_FORMAT,
  });
} catch (err) {
  unavailableReason = errorMessage(err);
  console.error(`[docs-chat] Index unavailable, /chat will answer 503: ${unavailableReason}`);
}

const app = createApp({ chat, sessions, unavailableReason });
await startHttpTransport(app, config.PORT, config.HOST);
