import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { CompletionServiceError } from "../errors";
import { InMemorySessionStore } from "../sessions";
import { StatusManager } from "../status";
import { buildChatFixture } from "../test/fixtures";
import { createApp, httpStatusFor, startHttpTransport, type HttpDependencies } from "./http";

const NewSessionSchema = z.object({ session_id: z.string().min(1) });

let server: Server | undefined;

afterEach(async () => {
  const s = server;
  server = undefined;
  if (s) await new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
});

async function serve(deps: HttpDependencies): Promise<string> {
  server = await startHttpTransport(createApp(deps), 0, "127.0.0.1");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server is not listening on a TCP port");
  return `http://127.0.0.1:${addr.port}`;
}

function postChat(base: string, body: unknown): Promise<Response> {
  return fetch(`${base}/chat`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("HTTP transport", () => {
  it("issues a new session id", async () => {
    const sessions = new InMemorySessionStore();
    const base = await serve({ chat: null, sessions });

    const res = await fetch(`${base}/new_session`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ session_id: expect.any(String) });
    expect(sessions.size).toBe(1);
  });

  it("answers a chat request within a session", async () => {
    const { chat, sessions } = await buildChatFixture();
    const base = await serve({ chat, sessions });
    const { session_id } = NewSessionSchema.parse(await (await fetch(`${base}/new_session`)).json());

    const res = await postChat(base, { session_id, query: "How do I install Ubuntu?" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ session_id, response: "answer 2", sources: ["ubuntu.md"] });
  });

  it("accepts a session id it never issued", async () => {
    const { chat, sessions } = await buildChatFixture();
    const base = await serve({ chat, sessions });

    const res = await postChat(base, { session_id: "never-issued", query: "How do I install Ubuntu?" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ session_id: "never-issued", response: "answer 2", sources: ["ubuntu.md"] });
  });

  it("rejects a blank query with 400", async () => {
    const { chat, sessions } = await buildChatFixture();
    const base = await serve({ chat, sessions });

    const res = await postChat(base, { session_id: "s", query: "   " });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "query is required" });
  });

  it("rejects a body without a query with 400", async () => {
    const base = await serve({ chat: null, sessions: new InMemorySessionStore() });

    const res = await postChat(base, { session_id: "s" });

    expect(res.status).toBe(400);
  });

  it("rejects malformed JSON with 400", async () => {
    const base = await serve({ chat: null, sessions: new InMemorySessionStore() });

    const res = await postChat(base, "{not json");

    expect(res.status).toBe(400);
  });

  it("rejects an oversized body with 413", async () => {
    const base = await serve({ chat: null, sessions: new InMemorySessionStore() });

    const res = await postChat(base, { session_id: "s", query: "x".repeat(2 * 1024 * 1024) });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: "request entity too large" });
  });

  it("answers 503 when no index is loaded", async () => {
    const base = await serve({
      chat: null,
      sessions: new InMemorySessionStore(),
      unavailableReason: "No index found at /tmp/index.",
    });

    const res = await postChat(base, { session_id: "s", query: "hello" });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "No index found at /tmp/index." });
  });

  it("maps upstream model failures to 502", async () => {
    const { chat, sessions } = await buildChatFixture(() => {
      throw new CompletionServiceError("Chat completion failed: timeout");
    });
    const base = await serve({ chat, sessions });

    const res = await postChat(base, { session_id: "s", query: "How do I install Ubuntu?" });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Chat completion failed: timeout" });
  });

  it("reports status on /health", async () => {
    const sessions = new InMemorySessionStore();
    const status = new StatusManager({ version: "9.9.9", startedAt: "2024-01-01T00:00:00.000Z" });
    status.trackSessions(() => sessions.size);
    sessions.create();
    const base = await serve({ chat: null, sessions, status });

    const body: unknown = await (await fetch(`${base}/health`)).json();

    expect(body).toMatchObject({ version: "9.9.9", ready: false, sessions: 1 });
  });
});

describe("httpStatusFor", () => {
  it("treats unknown errors as internal", () => {
    expect(httpStatusFor(new Error("boom"))).toBe(500);
    expect(httpStatusFor("boom")).toBe(500);
  });
});
