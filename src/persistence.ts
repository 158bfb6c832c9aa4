import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ChunkRecord } from "./types";

/** Stored chunk record; `emb` holds base64 little-endian float32 values. */
const StoredRecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: z.object({
    fileId: z.string(),
    fileName: z.string(),
    chunkIndex: z.number().int().nonnegative(),
    totalChunks: z.number().int().positive(),
    uploadedAt: z.string(),
  }),
  emb: z.string(),
});

const StoredCollectionSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    collection: z.string(),
    modelName: z.string(),
    savedAt: z.string(),
  }),
  records: z.array(z.unknown()),
});

/** Result of a successful load. */
export interface LoadedCollection {
  /** Embedding model the records were produced with. */
  modelName: string;
  records: ChunkRecord[];
}

export function encodeEmbedding(emb: Float32Array): string {
  return Buffer.from(emb.buffer, emb.byteOffset, emb.byteLength).toString("base64");
}

/** Decode a base64 float32 vector; returns null for malformed payloads. */
export function decodeEmbedding(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy out of the (possibly shared, unaligned) Buffer pool
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

/**
 * Load/save of a vector collection as a single JSON file. Without a store path
 * every call is a no-op, which keeps the collection purely in memory.
 */
export class Persistence {
  private readonly storePath?: string;
  private readonly verbose: boolean;

  /**
   * @param storePath JSON file to read and write, or undefined for memory-only.
   */
  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public getStorePath(): string | undefined {
    return this.storePath;
  }

  /**
   * Read the persisted collection. Individual malformed records are skipped;
   * a missing or unreadable file yields null.
   */
  public async load(): Promise<LoadedCollection | null> {
    const storePath = this.storePath;
    if (!storePath || !fsSync.existsSync(storePath)) return null;
    try {
      const raw = await fs.readFile(storePath, "utf8");
      const parsed = StoredCollectionSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.error(`[RAG] Ignoring unrecognised collection file at ${storePath}`);
        return null;
      }
      const records: ChunkRecord[] = [];
      let skipped = 0;
      for (const r of parsed.data.records) {
        const rec = StoredRecordSchema.safeParse(r);
        const emb = rec.success ? decodeEmbedding(rec.data.emb) : null;
        if (!rec.success || !emb) {
          skipped++;
          continue;
        }
        records.push({ id: rec.data.id, text: rec.data.text, metadata: rec.data.metadata, emb });
      }
      console.error(
        `[RAG] Loaded persisted collection: ${records.length} chunks` +
          (skipped ? ` (${skipped} malformed records skipped)` : ""),
      );
      if (this.verbose) console.error(`[RAG][verbose] Loaded from ${storePath}`);
      return { modelName: parsed.data.meta.modelName, records };
    } catch (e) {
      console.error(`[RAG] Failed to load collection at ${storePath}:`, e);
      return null;
    }
  }

  /** Write the full collection; the file is replaced atomically via rename. */
  public async save(collection: string, modelName: string, records: ChunkRecord[]): Promise<void> {
    const storePath = this.storePath;
    if (!storePath) return;
    const out = {
      version: 1,
      meta: {
        collection,
        modelName,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      records: records.map((r) => ({
        id: r.id,
        text: r.text,
        metadata: r.metadata,
        emb: encodeEmbedding(r.emb),
      })),
    };
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    const tmp = `${storePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, storePath);
    if (this.verbose) console.error(`[RAG][verbose] Persisted collection to ${storePath}`);
  }
}
