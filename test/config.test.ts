import path from "node:path";
import { describe, expect, it } from "vitest";
import { getConfig, readFlag, readInt } from "../src/config";

describe("getConfig", () => {
  it("applies defaults for an empty environment", () => {
    const cfg = getConfig({});
    expect(cfg).toMatchObject({
      PORT: 8000,
      HOST: "127.0.0.1",
      GOOGLE_API_KEY: undefined,
      GEMINI_MODEL: "gemini-1.5-flash",
      EMBEDDING_MODEL: "Xenova/all-MiniLM-L6-v2",
      CHUNK_SIZE: 1000,
      CHUNK_OVERLAP: 200,
      TOP_K_RESULTS: 5,
      HISTORY_WINDOW: 5,
      MAX_FILE_SIZE: 10 * 1024 * 1024,
      COLLECTION_NAME: "pdf_documents",
      MCP_ENABLED: true,
      CORS_ORIGINS: ["*"],
      ALLOWED_HOSTS: undefined,
    });
    expect(cfg.UPLOAD_DIR).toBe(path.resolve("uploads"));
    expect(cfg.VECTOR_DB_DIR).toBe(path.resolve("vector_db"));
  });

  it("falls back to a smaller overlap when it would not advance the window", () => {
    const cfg = getConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" });
    expect(cfg.CHUNK_SIZE).toBe(100);
    expect(cfg.CHUNK_OVERLAP).toBe(15);
  });

  it("keeps the collection in memory when VECTOR_DB_DIR is empty", () => {
    expect(getConfig({ VECTOR_DB_DIR: "" }).VECTOR_DB_DIR).toBeUndefined();
  });

  it("splits comma-separated lists", () => {
    const cfg = getConfig({ CORS_ORIGINS: "http://a.test, http://b.test,", ALLOWED_HOSTS: "localhost" });
    expect(cfg.CORS_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
    expect(cfg.ALLOWED_HOSTS).toEqual(["localhost"]);
  });
});

describe("readFlag", () => {
  it("accepts common truthy spellings", () => {
    expect(readFlag("YES", false)).toBe(true);
    expect(readFlag(" on ", false)).toBe(true);
    expect(readFlag("0", true)).toBe(false);
    expect(readFlag(undefined, true)).toBe(true);
  });
});

describe("readInt", () => {
  it("clamps to the maximum and rejects junk", () => {
    expect(readInt("70000", 8000, 0, 65535)).toBe(65535);
    expect(readInt("12.9", 1, 1, 100)).toBe(12);
    expect(readInt("abc", 5, 1, 50)).toBe(5);
    expect(readInt("-3", 5, 1, 50)).toBe(5);
    expect(readInt("", 5, 1, 50)).toBe(5);
  });
});
