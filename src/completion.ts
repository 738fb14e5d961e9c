import { z } from "zod";
import { CompletionServiceError, errorMessage } from "./errors";
import { postJson, type OpenAIEndpointOptions } from "./openai-http";
import type { ChatMessage } from "./types";

/** Narrow chat-completion interface: messages in, answer text out. */
export interface ChatCompleter {
  getModelName(): string;
  complete(messages: ChatMessage[]): Promise<string>;
}

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAIChatOptions extends OpenAIEndpointOptions {
  model: string;
  temperature: number;
}

let requestSeq = 0;

/** Non-streaming client for an OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAIChatCompleter implements ChatCompleter {
  public constructor(
    private readonly opts: OpenAIChatOptions,
    private readonly verbose = false,
  ) {}

  public getModelName(): string {
    return this.opts.model;
  }

  /**
   * @throws {CompletionServiceError} If the call fails or the first choice has no content.
   */
  public async complete(messages: ChatMessage[]): Promise<string> {
    const requestId = (requestSeq += 1);
    const startMs = Date.now();
    if (this.verbose) {
      console.error(
        `[docs-chat][verbose] llm#${requestId} -> ${this.opts.model} (${messages.length} messages)`,
      );
    }

    let raw: unknown;
    try {
      raw = await postJson(this.opts, "/chat/completions", {
        model: this.opts.model,
        messages,
        temperature: this.opts.temperature,
        stream: false,
      });
    } catch (e) {
      throw new CompletionServiceError(`Chat completion failed: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = CompletionResponseSchema.safeParse(raw);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (!content) {
      throw new CompletionServiceError("Chat completion returned no content");
    }
    if (this.verbose) {
      console.error(`[docs-chat][verbose] llm#${requestId} <- ${Date.now() - startMs}ms`);
    }
    return content;
  }
}
