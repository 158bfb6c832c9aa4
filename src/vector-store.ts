import type {
  ChunkRecord,
  DocumentDetail,
  DocumentInfo,
  Embedder,
  SearchHit,
} from "./types";
import type { Persistence } from "./persistence";

/** Largest result set a single query may request. */
export const MAX_TOP_K = 50;

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length.
 *
 * @returns Similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

export interface VectorStoreOptions {
  /** Collection name recorded in the persisted file. */
  collection: string;
  embedder: Embedder;
  /** Optional disk persistence; omit for an in-memory collection. */
  persistence?: Persistence;
  verbose?: boolean;
}

/** Per-document fields supplied when adding chunks. */
export interface AddMetadata {
  fileId: string;
  fileName: string;
  uploadedAt: string;
}

/**
 * In-process vector collection: embeds chunk text on insert, answers nearest
 * neighbour queries by a linear cosine scan, and rewrites its JSON file after
 * every mutation. A mutation whose write fails is undone before the error
 * propagates. Records keep insertion order, so documents list in upload
 * order and a document's chunks stay in index order.
 */
export class VectorStore {
  private readonly collection: string;
  private readonly embedder: Embedder;
  private readonly persistence?: Persistence;
  private readonly verbose: boolean;
  private records: ChunkRecord[] = [];
  // saves are chained so two writers never interleave on the same file
  private saving: Promise<void> = Promise.resolve();

  public constructor(opts: VectorStoreOptions) {
    this.collection = opts.collection;
    this.embedder = opts.embedder;
    this.persistence = opts.persistence;
    this.verbose = !!opts.verbose;
  }

  /**
   * Hydrate from disk. Records produced by a different embedding model are
   * re-embedded from their stored text and written back.
   */
  public async init(): Promise<void> {
    const loaded = await this.persistence?.load();
    if (!loaded) return;
    const modelName = this.embedder.getModelName();
    if (loaded.modelName === modelName) {
      this.records = loaded.records;
      return;
    }
    console.error(
      `[RAG] Stored collection was embedded with ${loaded.modelName}; re-embedding ${loaded.records.length} chunks with ${modelName}.`,
    );
    const rebuilt: ChunkRecord[] = [];
    for (const r of loaded.records) {
      rebuilt.push({ ...r, emb: await this.embedder.embed(r.text) });
    }
    this.records = rebuilt;
    await this.persist();
  }

  /** Number of chunks in the collection. */
  public count(): number {
    return this.records.length;
  }

  /**
   * Embed and append the chunks of one document.
   * @returns Number of chunks added.
   */
  public async add(chunks: string[], meta: AddMetadata): Promise<number> {
    if (!chunks.length) return 0;
    const added: ChunkRecord[] = [];
    for (let i = 0; i < chunks.length; i++) {
      if (this.verbose && i % 50 === 0) {
        console.error(`[RAG][verbose] Embedding ${i}/${chunks.length} for ${meta.fileName}`);
      }
      added.push({
        id: `${meta.fileId}_${i}`,
        text: chunks[i],
        metadata: {
          fileId: meta.fileId,
          fileName: meta.fileName,
          chunkIndex: i,
          totalChunks: chunks.length,
          uploadedAt: meta.uploadedAt,
        },
        emb: await this.embedder.embed(chunks[i]),
      });
    }
    // committed only once every chunk embedded, so a failure adds nothing
    this.records.push(...added);
    try {
      await this.persist();
    } catch (e) {
      const ids = new Set(added.map((r) => r.id));
      this.records = this.records.filter((r) => !ids.has(r.id));
      throw e;
    }
    return added.length;
  }

  /**
   * Nearest neighbours of `query`, closest first. `topK` is clamped to
   * [1, MAX_TOP_K]. An empty collection returns [] without embedding.
   */
  public async search(query: string, topK: number): Promise<SearchHit[]> {
    if (!this.records.length) return [];
    const k = Math.max(1, Math.min(MAX_TOP_K, Math.floor(topK)));
    const q = await this.embedder.embed(query);
    return this.records
      .map((r) => ({ r, s: cosine(r.emb, q) }))
      .sort((a, b) => b.s - a.s)
      .slice(0, k)
      .map(({ r, s }) => ({ content: r.text, metadata: r.metadata, distance: 1 - s }));
  }

  /** Remove every chunk of a document. @returns false when none matched. */
  public async deleteDocument(fileId: string): Promise<boolean> {
    const before = this.records;
    const removed = before.filter((r) => r.metadata.fileId === fileId);
    if (!removed.length) return false;
    this.records = before.filter((r) => r.metadata.fileId !== fileId);
    try {
      await this.persist();
    } catch (e) {
      this.restore(before, removed);
      throw e;
    }
    return true;
  }

  public listDocuments(): DocumentInfo[] {
    const docs = new Map<string, DocumentInfo>();
    for (const { metadata: m } of this.records) {
      const existing = docs.get(m.fileId);
      if (existing) {
        existing.numChunks++;
      } else {
        docs.set(m.fileId, {
          fileId: m.fileId,
          fileName: m.fileName,
          uploadedAt: m.uploadedAt,
          numChunks: 1,
        });
      }
    }
    return Array.from(docs.values());
  }

  public getDocument(fileId: string): DocumentDetail | undefined {
    const own = this.records.filter((r) => r.metadata.fileId === fileId);
    if (!own.length) return undefined;
    const first = own[0].metadata;
    return {
      info: {
        fileId,
        fileName: first.fileName,
        uploadedAt: first.uploadedAt,
        numChunks: own.length,
      },
      chunks: own
        .map((r) => ({ chunkIndex: r.metadata.chunkIndex, text: r.text }))
        .sort((a, b) => a.chunkIndex - b.chunkIndex),
    };
  }

  /** Drop every record in the collection. */
  public async clear(): Promise<void> {
    const before = this.records;
    this.records = [];
    try {
      await this.persist();
    } catch (e) {
      this.restore(before, before);
      throw e;
    }
  }

  /**
   * Undo a removal whose write failed. `removed` goes back in its original
   * position; records added or removed by other calls meanwhile are kept as they are.
   */
  private restore(before: ChunkRecord[], removed: ChunkRecord[]): void {
    const live = new Set(this.records.map((r) => r.id));
    const back = new Set(removed.map((r) => r.id));
    const restored = before.filter((r) => live.has(r.id) || back.has(r.id));
    const seen = new Set(restored.map((r) => r.id));
    this.records = restored.concat(this.records.filter((r) => !seen.has(r.id)));
  }

  private persist(): Promise<void> {
    const persistence = this.persistence;
    if (!persistence) return Promise.resolve();
    const snapshot = this.records.slice();
    const run = this.saving.then(() =>
      persistence.save(this.collection, this.embedder.getModelName(), snapshot),
    );
    // keep the chain alive after a failed write; the caller still sees the error
    this.saving = run.catch((e: unknown) => {
      console.error(`[RAG] Failed to persist collection:`, e);
    });
    return run;
  }
}
