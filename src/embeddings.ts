import { pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import type { Embedder } from "./types";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Local sentence-embedding model backed by a transformers.js feature-extraction
 * pipeline. One instance serves both chunk ingestion and query embedding.
 */
export class Embeddings implements Embedder {
  private readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;

  public constructor(modelName?: string) {
    this.modelName = modelName?.trim() || "Xenova/all-MiniLM-L6-v2";
  }

  /** @returns Resolved (possibly defaulted) underlying model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return;
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    this.embedder = await pipeline("feature-extraction", this.modelName);
    console.error(`[RAG] Model ready: ${this.modelName}`);
  }

  /**
   * Embed a single string with mean pooling and L2 normalization. Very long
   * inputs are truncated by the model tokenizer.
   *
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    const output = await this.embedder(text, { pooling: "mean", normalize: true });
    return output.data as Float32Array;
  }
}
