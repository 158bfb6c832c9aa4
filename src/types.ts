/**
 * Shared document/chunk types used by ingestion, the vector store and the chat agent.
 */

/** Metadata attached to every chunk in the collection. */
export interface ChunkMetadata {
  /** Owning document id (UUID v4). */
  readonly fileId: string;
  /** Original upload file name. */
  readonly fileName: string;
  /** 0-based position of the chunk within its document. */
  readonly chunkIndex: number;
  /** Number of chunks the document was split into. */
  readonly totalChunks: number;
  /** ISO timestamp of the upload. */
  readonly uploadedAt: string;
}

/**
 * A single chunk of extracted PDF text plus its embedding. Records are immutable
 * once added; the embedding belongs to the vector store.
 */
export interface ChunkRecord {
  /** `${fileId}_${chunkIndex}` */
  readonly id: string;
  readonly text: string;
  readonly metadata: ChunkMetadata;
  readonly emb: Float32Array;
}

/** Aggregate view of one uploaded document. */
export interface DocumentInfo {
  fileId: string;
  fileName: string;
  uploadedAt: string;
  numChunks: number;
}

export interface DocumentDetail {
  info: DocumentInfo;
  chunks: { chunkIndex: number; text: string }[];
}

/** One nearest-neighbour result; distance is 1 - cosine similarity. */
export interface SearchHit {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
}

/** Reference to a chunk cited in an answer. */
export interface SourceRef {
  fileName: string;
  chunkIndex: number;
  relevanceScore: number;
}

export type Intent =
  | "FACTUAL_QUESTION"
  | "SUMMARIZATION"
  | "COMPARISON"
  | "GENERAL_CHAT"
  | "CLARIFICATION";

export interface ConversationTurn {
  query: string;
  answer: string;
  sources: SourceRef[];
  intent?: Intent;
  timestamp: string;
}

export interface ChatResult {
  answer: string;
  sources: SourceRef[];
  intent?: Intent;
}

export interface UploadResult {
  fileId: string;
  fileName: string;
  numChunks: number;
  numCharacters: number;
  uploadedAt: string;
}

/** Produces embedding vectors for text. */
export interface Embedder {
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
}

/** Turns a prompt into an answer through a hosted model. */
export interface TextGenerator {
  getModelName(): string;
  isConfigured(): boolean;
  generate(prompt: string): Promise<string>;
}

/** Extracts plain text from a PDF buffer. */
export interface TextExtractor {
  extractText(data: Uint8Array): Promise<{ text: string; pageCount: number }>;
}
