import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project root .env (one level above src/), otherwise fall back to cwd.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using working directory:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  PORT: number;
  HOST: string;
  GOOGLE_API_KEY: string | undefined;
  GEMINI_MODEL: string;
  EMBEDDING_MODEL: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K_RESULTS: number;
  /** Number of past messages (user + assistant) rendered into a prompt. */
  HISTORY_WINDOW: number;
  HISTORY_MAX_TURNS: number;
  UPLOAD_DIR: string;
  MAX_FILE_SIZE: number;
  /** Directory holding the persisted collection; undefined keeps it in memory. */
  VECTOR_DB_DIR: string | undefined;
  COLLECTION_NAME: string;
  VERBOSE: boolean;
  MCP_ENABLED: boolean;
  CORS_ORIGINS: string[];
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

/** Tolerant truthy parsing ('1', 'true', 'yes', 'on'); unset returns the fallback. */
export function readFlag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Parse a positive-or-zero integer, clamped to [min, max]; junk yields the fallback. */
export function readInt(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

function readList(raw: string | undefined): string[] | undefined {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items?.length ? items : undefined;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const CHUNK_SIZE = readInt(env.CHUNK_SIZE, 1000, 1, 8000);
  let CHUNK_OVERLAP = readInt(env.CHUNK_OVERLAP, 200, 0, 4000);
  // Overlap must stay below size for the window to advance.
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[RAG] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  // An explicitly empty VECTOR_DB_DIR disables persistence.
  const VECTOR_DB_DIR =
    env.VECTOR_DB_DIR === undefined ? "vector_db" : env.VECTOR_DB_DIR.trim() || undefined;

  return {
    PORT: readInt(env.PORT, 8000, 0, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    GOOGLE_API_KEY: env.GOOGLE_API_KEY?.trim() || undefined,
    GEMINI_MODEL: env.GEMINI_MODEL?.trim() || "gemini-1.5-flash",
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || "Xenova/all-MiniLM-L6-v2",
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K_RESULTS: readInt(env.TOP_K_RESULTS, 5, 1, 50),
    HISTORY_WINDOW: readInt(env.HISTORY_WINDOW, 5, 0, 100),
    HISTORY_MAX_TURNS: readInt(env.HISTORY_MAX_TURNS, 100, 1, 10000),
    UPLOAD_DIR: path.resolve(env.UPLOAD_DIR?.trim() || "uploads"),
    MAX_FILE_SIZE: readInt(env.MAX_FILE_SIZE, 10 * 1024 * 1024, 1, 512 * 1024 * 1024),
    VECTOR_DB_DIR: VECTOR_DB_DIR ? path.resolve(VECTOR_DB_DIR) : undefined,
    COLLECTION_NAME: env.COLLECTION_NAME?.trim() || "pdf_documents",
    VERBOSE: readFlag(env.VERBOSE, false),
    MCP_ENABLED: readFlag(env.MCP_ENABLED, true),
    CORS_ORIGINS: readList(env.CORS_ORIGINS) ?? ["*"],
    ALLOWED_HOSTS: readList(env.ALLOWED_HOSTS),
    ENABLE_DNS_REBINDING_PROTECTION: readFlag(env.ENABLE_DNS_REBINDING_PROTECTION, true),
  };
}
