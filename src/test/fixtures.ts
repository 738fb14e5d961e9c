import path from "node:path";
import { ChatService, type ChatServiceOptions } from "../chat";
import { indexCorpus } from "../indexer";
import { Retriever } from "../retriever";
import { InMemorySessionStore } from "../sessions";
import type { ChatMessage } from "../types";
import { DocsIndex } from "../vector-index";
import { FakeCompleter, FakeEmbedder, makeCorpus, makeTempDir } from "./fakes";

export const UBUNTU_TEXT = "# Installing Ubuntu\n\nTo install Ubuntu, download the ISO and boot from USB.";

/**
 * Two-document corpus indexed with a {@link FakeEmbedder}: questions mentioning
 * "install" hit ubuntu.md, questions mentioning "weather" match nothing.
 */
export async function buildChatFixture(
  reply: (messages: ChatMessage[]) => string = (m) => `answer ${m.length}`,
  opts: Partial<ChatServiceOptions> = {},
) {
  const embedder = new FakeEmbedder({
    rules: [
      { match: /install/i, vector: [1, 0, 0, 0, 0, 0, 0, 0] },
      { match: /weather/i, vector: [-1, 0, 0, 0, 0, 0, 0, 0] },
    ],
  });
  const docsRoot = await makeCorpus({
    "ubuntu.md": `${UBUNTU_TEXT}\n`,
    "intro.md": "# Welcome\n\nThis site documents the desktop.\n",
  });
  const indexDir = path.join(await makeTempDir(), "index");
  await indexCorpus({ docsRoot, indexDir, embedder, chunking: { chunkSize: 1000, chunkOverlap: 100 } });

  const index = await DocsIndex.open(indexDir, embedder.getModelName());
  const retriever = new Retriever(index, embedder, { topK: 3, minScore: 0.3 });
  const completer = new FakeCompleter(reply);
  const sessions = new InMemorySessionStore();
  const chat = new ChatService(retriever, completer, sessions, { topK: 3, maxHistoryTurns: 10, ...opts });
  return { chat, completer, sessions, embedder };
}
