import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env (one level above src/); otherwise fall back to the cwd default.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch {
    /* fall through to the default lookup */
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type AnswerFormat = "text" | "html";

export interface Config {
  DOCS_ROOT: string;
  INDEX_DIR: string;
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  MIN_SCORE: number;
  OPENAI_API_KEY: string | undefined;
  OPENAI_BASE_URL: string;
  EMBEDDING_MODEL: string;
  EMBEDDING_BATCH_SIZE: number;
  CHAT_MODEL: string;
  CHAT_TEMPERATURE: number;
  REQUEST_TIMEOUT_MS: number;
  MAX_HISTORY_TURNS: number;
  SESSION_TTL_MS: number;
  MAX_SESSIONS: number;
  ANSWER_FORMAT: AnswerFormat;
  PORT: number;
  HOST: string;
}

type Env = Record<string, string | undefined>;

/** Parse a non-negative integer, clamped to `[min, max]`; `fallback` when unset or invalid. */
function intFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

function floatFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n) || n < min || n > max) return fallback;
  return n;
}

/**
 * Resolve runtime configuration from environment variables. Every knob has a
 * default; numeric values outside their accepted range fall back to it.
 */
export function getConfig(env: Env = process.env): Config {
  const DOCS_ROOT = path.resolve(env.DOCS_ROOT?.trim() || "docs");
  const INDEX_DIR = path.resolve(env.INDEX_DIR?.trim() || ".docs-index");

  // Folder names (not globs) pruned during directory traversal.
  const EXCLUDED_FOLDERS = env.EXCLUDED_FOLDERS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean) ?? ["node_modules", ".git", "dist", "build", ".cache"];

  // Verbosity toggle with tolerant truthy parsing.
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  // Chunk sizes are measured in characters.
  const CHUNK_SIZE = intFrom(env.CHUNK_SIZE, 1000, 1, 8000);
  const CHUNK_OVERLAP = intFrom(env.CHUNK_OVERLAP, 100, 0, 4000);

  const TOP_K = intFrom(env.TOP_K, 4, 1, 50);
  const MIN_SCORE = floatFrom(env.MIN_SCORE, 0.3, -1, 1);

  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim() || undefined;
  const OPENAI_BASE_URL = (env.OPENAI_BASE_URL?.trim() || "https://api.openai.com/v1").replace(
    /\/+$/,
    "",
  );
  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small";
  const EMBEDDING_BATCH_SIZE = intFrom(env.EMBEDDING_BATCH_SIZE, 64, 1, 2048);
  const CHAT_MODEL = env.CHAT_MODEL?.trim() || "gpt-4o-mini";
  const CHAT_TEMPERATURE = floatFrom(env.CHAT_TEMPERATURE, 0.7, 0, 2);
  const REQUEST_TIMEOUT_MS = intFrom(env.REQUEST_TIMEOUT_MS, 60_000, 1, 600_000);

  const MAX_HISTORY_TURNS = intFrom(env.MAX_HISTORY_TURNS, 10, 0, 100);
  // 0 disables idle expiry / capacity eviction.
  const SESSION_TTL_MS = intFrom(env.SESSION_TTL_MS, 0, 0, Number.MAX_SAFE_INTEGER);
  const MAX_SESSIONS = intFrom(env.MAX_SESSIONS, 0, 0, Number.MAX_SAFE_INTEGER);

  const ANSWER_FORMAT: AnswerFormat =
    (env.ANSWER_FORMAT ?? "").trim().toLowerCase() === "html" ? "html" : "text";

  const PORT = intFrom(env.PORT, 8000, 0, 65535);
  const HOST = env.HOST?.trim() || "127.0.0.1";

  return {
    DOCS_ROOT,
    INDEX_DIR,
    EXCLUDED_FOLDERS,
    VERBOSE,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K,
    MIN_SCORE,
    OPENAI_API_KEY,
    OPENAI_BASE_URL,
    EMBEDDING_MODEL,
    EMBEDDING_BATCH_SIZE,
    CHAT_MODEL,
    CHAT_TEMPERATURE,
    REQUEST_TIMEOUT_MS,
    MAX_HISTORY_TURNS,
    SESSION_TTL_MS,
    MAX_SESSIONS,
    ANSWER_FORMAT,
    PORT,
    HOST,
  };
}
