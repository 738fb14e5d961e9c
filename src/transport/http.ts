/**
 * HTTP transport for the documentation chat service.
 *
 * Endpoints:
 *  - GET  /new_session : issue a fresh session id -> `{ session_id }`.
 *  - POST /chat        : `{ session_id, query }` -> `{ session_id, response, sources }`.
 *  - GET  /health      : status snapshot (delegates to `statusManager`).
 *
 * Error mapping:
 *  - invalid body                          => 400 (or the body parser's own 4xx, e.g. 413)
 *  - embedding / chat-completion failure   => 502
 *  - no index loaded                       => 503
 *  - anything else                         => 500
 * Every error body is `{ error: string }`.
 *
 * An unknown `session_id` is not an error: the chat service starts an empty
 * conversation under that id.
 *
 * Keep this file free of business logic; it is a thin shim over `ChatService`.
 */
import type { Server } from "node:http";
import express from "express";
import { z } from "zod";
import type { ChatService } from "../chat";
import {
  CompletionServiceError,
  EmbeddingServiceError,
  IncompatibleIndexError,
  IndexNotFoundError,
  errorMessage,
} from "../errors";
import type { SessionStore } from "../sessions";
import { statusManager, type StatusManager } from "../status";

const ChatRequestSchema = z.object({
  session_id: z.string().trim().min(1, "session_id is required"),
  query: z.string().trim().min(1, "query is required"),
});

export interface HttpDependencies {
  /** Null when no index could be loaded; /chat then answers 503. */
  chat: ChatService | null;
  sessions: SessionStore;
  status?: StatusManager;
  /** Why `chat` is null, surfaced in the 503 body. */
  unavailableReason?: string;
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof EmbeddingServiceError || err instanceof CompletionServiceError) return 502;
  if (err instanceof IndexNotFoundError || err instanceof IncompatibleIndexError) return 503;
  return 500;
}

/** 4xx status carried by a body-parser error (413 too large, 415 bad charset, ...). */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

/** Build the Express application. Exposed separately from listening for tests. */
export function createApp(deps: HttpDependencies): express.Express {
  const status = deps.status ?? statusManager;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/new_session", (_req, res) => {
    const session = deps.sessions.create();
    res.json({ session_id: session.id });
  });

  app.post("/chat", async (req: express.Request, res: express.Response) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    if (!deps.chat) {
      res.status(503).json({ error: deps.unavailableReason ?? "Index not loaded" });
      return;
    }

    const { session_id, query } = parsed.data;
    try {
      const result = await deps.chat.ask(session_id, query);
      res.json({ session_id: result.sessionId, response: result.answer, sources: result.sources });
    } catch (err) {
      console.error("[docs-chat] /chat error:", err);
      if (!res.headersSent) {
        res.status(httpStatusFor(err)).json({ error: errorMessage(err) });
      }
    }
  });

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  // Malformed JSON bodies are rejected by express.json() before reaching a route.
  app.use(
    (err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const statusCode =
        clientErrorStatus(err) ?? (err instanceof SyntaxError ? 400 : httpStatusFor(err));
      res.status(statusCode).json({ error: errorMessage(err) });
    },
  );

  return app;
}

/**
 * Bind the app and resolve once listening.
 *
 * @returns The underlying Node HTTP server (close it to stop).
 */
export async function startHttpTransport(
  app: express.Express,
  port: number,
  host: string,
): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.error(`[docs-chat] HTTP listening at http://${host}:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
