import { APP_VERSION } from "./config";

/**
 * Mutable in-memory snapshot of server lifecycle. Collection totals are not
 * kept here; /health reads them live from the vector store.
 *
 * ready = true once the embedding model is loaded and the persisted collection
 * has been restored.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Embedding model identifier (empty before init). */
  embeddingModel: string;
  /** Generation model identifier. */
  generationModel: string;
  /** Whether a generation API key was supplied. */
  llmConfigured: boolean;
  /** Surfaces being served, e.g. 'rest', 'mcp'. */
  transports: string[];
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
}

/**
 * Class wrapper around mutable server status state.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      embeddingModel: initial?.embeddingModel ?? "",
      generationModel: initial?.generationModel ?? "",
      llmConfigured: initial?.llmConfigured ?? false,
      transports: initial?.transports ?? [],
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
    };
  }

  public setEmbeddingModel(name: string) {
    this.data.embeddingModel = name;
  }

  public setGenerationModel(name: string, configured: boolean) {
    this.data.generationModel = name;
    this.data.llmConfigured = configured;
  }

  /** Record a surface as being served (idempotent). */
  public markTransport(t: string) {
    if (!this.data.transports.includes(t)) this.data.transports.push(t);
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance shared by the entry point and the HTTP layer.
export const statusManager = new StatusManager();
