import path from "node:path";
import { ChatAgent } from "./chat-agent";
import { ConversationHistory } from "./history";
import { DocumentIngestor } from "./ingestion";
import { IntentClassifier } from "./intent";
import { Persistence } from "./persistence";
import { statusManager, type StatusManager } from "./status";
import type { Embedder, TextExtractor, TextGenerator } from "./types";
import { VectorStore } from "./vector-store";

/** Everything the HTTP and MCP surfaces delegate to. */
export interface AppServices {
  store: VectorStore;
  ingestor: DocumentIngestor;
  agent: ChatAgent;
  history: ConversationHistory;
  status: StatusManager;
}

export interface ServiceOptions {
  embedder: Embedder;
  extractor: TextExtractor;
  generator: TextGenerator;
  uploadDir: string;
  /** Directory for the persisted collection; omit for memory only. */
  vectorDbDir?: string;
  collection?: string;
  chunkSize?: number;
  chunkOverlap?: number;
  maxFileSize?: number;
  topK?: number;
  historyWindow?: number;
  historyMaxTurns?: number;
  verbose?: boolean;
  status?: StatusManager;
}

/**
 * Build the service graph and restore the persisted collection.
 */
export async function createServices(opts: ServiceOptions): Promise<AppServices> {
  const collection = opts.collection ?? "pdf_documents";
  const verbose = !!opts.verbose;
  const store = new VectorStore({
    collection,
    embedder: opts.embedder,
    persistence: opts.vectorDbDir
      ? new Persistence(path.join(opts.vectorDbDir, `${collection}.json`), verbose)
      : undefined,
    verbose,
  });
  await store.init();

  const ingestor = new DocumentIngestor({
    uploadDir: opts.uploadDir,
    extractor: opts.extractor,
    store,
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
    maxFileSize: opts.maxFileSize,
    verbose,
  });

  const history = new ConversationHistory(opts.historyMaxTurns);
  const agent = new ChatAgent({
    store,
    generator: opts.generator,
    classifier: new IntentClassifier(opts.topK),
    history,
    defaultTopK: opts.topK,
    historyWindow: opts.historyWindow,
    verbose,
  });

  const status = opts.status ?? statusManager;
  status.setEmbeddingModel(opts.embedder.getModelName());
  status.setGenerationModel(opts.generator.getModelName(), opts.generator.isConfigured());
  status.markReady();

  return { store, ingestor, agent, history, status };
}
