import type { ChatCompleter } from "./completion";
import type { AnswerFormat } from "./config";
import type { Retriever } from "./retriever";
import type { SessionStore } from "./sessions";
import type { ChatMessage, ChatTurn, RetrievedChunk } from "./types";

export const SYSTEM_PROMPT =
  "You are a documentation assistant. Answer the user's question using the provided documentation " +
  "excerpts. If the excerpts do not contain the answer, say so. Mention the source file when you " +
  "rely on a specific excerpt.";

/** Returned without calling the chat model when retrieval finds nothing. */
export const NO_CONTEXT_ANSWER = "No relevant documents found.";

export interface ChatServiceOptions {
  /** Chunks to retrieve per question. */
  topK: number;
  /** Prior turns replayed to the model; 0 sends none. */
  maxHistoryTurns: number;
  answerFormat?: AnswerFormat;
}

export interface ChatAnswer {
  sessionId: string;
  answer: string;
  /** Distinct source documents of the retrieved chunks, best match first. */
  sources: string[];
}

/** Render retrieved chunks as labelled context blocks. */
export function formatContext(retrieved: RetrievedChunk[]): string {
  return retrieved
    .map(({ chunk }) => `[Source: ${chunk.source}]\n${chunk.text}`)
    .join("\n\n---\n\n");
}

/**
 * Assemble the chat-completion messages: system prompt, the trailing
 * `maxHistoryTurns` turns of history, then the question with its context.
 */
export function buildMessages(
  query: string,
  retrieved: RetrievedChunk[],
  history: ChatTurn[],
  maxHistoryTurns: number,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: SYSTEM_PROMPT }];
  const turns = maxHistoryTurns > 0 ? history.slice(-maxHistoryTurns) : [];
  for (const turn of turns) {
    messages.push({ role: "user", content: turn.question });
    messages.push({ role: "assistant", content: turn.answer });
  }
  messages.push({
    role: "user",
    content: `Documentation excerpts:\n\n${formatContext(retrieved)}\n\nQuestion: ${query}`,
  });
  return messages;
}

export function formatAnswer(answer: string, format: AnswerFormat = "text"): string {
  return format === "html" ? answer.replace(/\r?\n/g, "<br>") : answer;
}

function distinctSources(retrieved: RetrievedChunk[]): string[] {
  return [...new Set(retrieved.map((r) => r.chunk.source))];
}

/**
 * Session-scoped question answering: retrieve, prompt, complete, remember.
 * Embedding and completion failures propagate to the caller.
 */
export class ChatService {
  public constructor(
    private readonly retriever: Retriever,
    private readonly completer: ChatCompleter,
    private readonly sessions: SessionStore,
    private readonly opts: ChatServiceOptions,
  ) {}

  /**
   * Answer `query` within session `sessionId`. An unknown id starts a fresh,
   * empty conversation under that id.
   */
  public async ask(sessionId: string, query: string): Promise<ChatAnswer> {
    const session = this.sessions.getOrCreate(sessionId);
    const retrieved = await this.retriever.retrieve(query, this.opts.topK);
    if (retrieved.length === 0) {
      return { sessionId: session.id, answer: NO_CONTEXT_ANSWER, sources: [] };
    }

    const messages = buildMessages(query, retrieved, session.history, this.opts.maxHistoryTurns);
    const answer = await this.completer.complete(messages);
    session.history.push({ question: query, answer });
    // Only the replayed window is worth keeping.
    const excess = session.history.length - this.opts.maxHistoryTurns;
    if (excess > 0) session.history.splice(0, excess);

    return {
      sessionId: session.id,
      answer: formatAnswer(answer, this.opts.answerFormat),
      sources: distinctSources(retrieved),
    };
  }
}
