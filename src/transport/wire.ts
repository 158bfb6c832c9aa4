/**
 * JSON payload shapes of the public API. Field names are snake_case on the
 * wire and camelCase inside the service.
 */
import type {
  ChatResult,
  ConversationTurn,
  DocumentDetail,
  DocumentInfo,
  Intent,
  SourceRef,
  UploadResult,
} from "../types";

export interface WireSource {
  file_name: string;
  chunk_index: number;
  relevance_score: number;
}

export interface WireChatResponse {
  answer: string;
  sources: WireSource[];
  intent: Intent | null;
  error: null;
}

export interface WireDocument {
  file_id: string;
  file_name: string;
  uploaded_at: string;
  num_chunks: number;
}

export function toWireSource(s: SourceRef): WireSource {
  return { file_name: s.fileName, chunk_index: s.chunkIndex, relevance_score: s.relevanceScore };
}

export function toWireChat(r: ChatResult): WireChatResponse {
  return {
    answer: r.answer,
    sources: r.sources.map(toWireSource),
    intent: r.intent ?? null,
    error: null,
  };
}

export function toWireDocument(d: DocumentInfo): WireDocument {
  return {
    file_id: d.fileId,
    file_name: d.fileName,
    uploaded_at: d.uploadedAt,
    num_chunks: d.numChunks,
  };
}

export function toWireDocumentDetail(d: DocumentDetail) {
  return {
    ...toWireDocument(d.info),
    chunks: d.chunks.map((c) => ({ chunk_index: c.chunkIndex, text: c.text })),
  };
}

export function toWireUpload(u: UploadResult) {
  return {
    message: "PDF uploaded and processed successfully",
    file_id: u.fileId,
    file_name: u.fileName,
    num_chunks: u.numChunks,
    num_characters: u.numCharacters,
    uploaded_at: u.uploadedAt,
  };
}

export function toWireTurn(t: ConversationTurn) {
  return {
    query: t.query,
    answer: t.answer,
    sources: t.sources.map(toWireSource),
    intent: t.intent ?? null,
    timestamp: t.timestamp,
  };
}
