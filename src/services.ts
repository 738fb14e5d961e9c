import { OpenAIChatCompleter } from "./completion";
import type { Config } from "./config";
import { OpenAIEmbeddings } from "./embeddings";

function requireApiKey(config: Config): string {
  if (!config.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY environment variable is required.");
  }
  return config.OPENAI_API_KEY;
}

/** Embedding client shared by the index build and query-time retrieval. */
export function createEmbedder(config: Config): OpenAIEmbeddings {
  return new OpenAIEmbeddings({
    baseUrl: config.OPENAI_BASE_URL,
    apiKey: requireApiKey(config),
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    model: config.EMBEDDING_MODEL,
  });
}

export function createCompleter(config: Config): OpenAIChatCompleter {
  return new OpenAIChatCompleter(
    {
      baseUrl: config.OPENAI_BASE_URL,
      apiKey: requireApiKey(config),
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      model: config.CHAT_MODEL,
      temperature: config.CHAT_TEMPERATURE,
    },
    config.VERBOSE,
  );
}
