import path from "node:path";
import { describe, expect, it } from "vitest";
import { getConfig } from "./config";

describe("getConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = getConfig({});

    expect(config).toMatchObject({
      DOCS_ROOT: path.resolve("docs"),
      INDEX_DIR: path.resolve(".docs-index"),
      EXCLUDED_FOLDERS: ["node_modules", ".git", "dist", "build", ".cache"],
      VERBOSE: false,
      CHUNK_SIZE: 1000,
      CHUNK_OVERLAP: 100,
      TOP_K: 4,
      MIN_SCORE: 0.3,
      OPENAI_BASE_URL: "https://api.openai.com/v1",
      EMBEDDING_MODEL: "text-embedding-3-small",
      CHAT_MODEL: "gpt-4o-mini",
      MAX_HISTORY_TURNS: 10,
      SESSION_TTL_MS: 0,
      MAX_SESSIONS: 0,
      ANSWER_FORMAT: "text",
      PORT: 8000,
      HOST: "127.0.0.1",
    });
    expect(config.OPENAI_API_KEY).toBeUndefined();
  });

  it("reads overrides", () => {
    const config = getConfig({
      DOCS_ROOT: "/srv/docs",
      EXCLUDED_FOLDERS: " drafts , , archive",
      VERBOSE: "Yes",
      CHUNK_SIZE: "500",
      TOP_K: "8",
      OPENAI_API_KEY: " test-secret ",
      OPENAI_BASE_URL: "http://localhost:11434/v1//",
      ANSWER_FORMAT: "HTML",
    });

    expect(config.DOCS_ROOT).toBe("/srv/docs");
    expect(config.EXCLUDED_FOLDERS).toEqual(["drafts", "archive"]);
    expect(config.VERBOSE).toBe(true);
    expect(config.CHUNK_SIZE).toBe(500);
    expect(config.TOP_K).toBe(8);
    expect(config.OPENAI_API_KEY).toBe("test-secret");
    expect(config.OPENAI_BASE_URL).toBe("http://localhost:11434/v1");
    expect(config.ANSWER_FORMAT).toBe("html");
  });

  it("clamps or ignores out-of-range numbers", () => {
    const config = getConfig({
      CHUNK_SIZE: "999999",
      TOP_K: "0",
      MIN_SCORE: "7",
      PORT: "not-a-port",
      CHAT_TEMPERATURE: "-1",
    });

    expect(config.CHUNK_SIZE).toBe(8000);
    expect(config.TOP_K).toBe(4);
    expect(config.MIN_SCORE).toBe(0.3);
    expect(config.PORT).toBe(8000);
    expect(config.CHAT_TEMPERATURE).toBe(0.7);
  });
});
