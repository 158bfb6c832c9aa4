/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration.
 * 2. Point the transformers.js model cache at disk.
 * 3. Load the embedding model eagerly so the first upload or chat is fast.
 * 4. Restore the persisted vector collection and wire the services.
 * 5. Serve the REST API (and the MCP endpoint unless MCP_ENABLED=false).
 *
 * ENVIRONMENT VARIABLES (all optional; see config.ts for defaults):
 *  - GOOGLE_API_KEY        Gemini API key; chat answers fail with 502 without it.
 *  - GEMINI_MODEL          Generation model name.
 *  - EMBEDDING_MODEL       transformers.js feature-extraction model.
 *  - PORT / HOST           Bind address.
 *  - CHUNK_SIZE            Characters per chunk (default 1000, cap 8000).
 *  - CHUNK_OVERLAP         Characters shared by neighbouring chunks (default 200).
 *  - TOP_K_RESULTS         Default retrieval width (default 5).
 *  - HISTORY_WINDOW        Past messages included in prompts (default 5).
 *  - HISTORY_MAX_TURNS     Turns kept in memory (default 100).
 *  - UPLOAD_DIR            Where uploaded PDFs are stored.
 *  - MAX_FILE_SIZE         Upload limit in bytes (default 10 MiB).
 *  - VECTOR_DB_DIR         Collection directory; empty string keeps it in memory.
 *  - COLLECTION_NAME       Collection (and file) name.
 *  - VERBOSE               '1'/'true'/... enables extra logging.
 *  - MCP_ENABLED           Mount the MCP endpoint at /mcp (default true).
 *  - CORS_ORIGINS          Comma list of allowed origins (default '*').
 *  - ALLOWED_HOSTS         Host[:port] whitelist for /mcp.
 *  - ENABLE_DNS_REBINDING_PROTECTION  Set to 'false' to disable for /mcp.
 *  - TRANSFORMERS_CACHE    Directory for model downloads.
 */
import { configureTransformersCache } from "./cache";
import { getConfig, type Config } from "./config";
import { Embeddings } from "./embeddings";
import { GeminiGenerator } from "./llm";
import { createMcpServer } from "./mcp";
import { PdfExtractor } from "./pdf-extractor";
import { createServices } from "./services";
import { createHttpApp, defaultAllowedHosts, startHttpTransport } from "./transport/http";

const config: Config = getConfig();

await configureTransformersCache().catch((e: unknown) =>
  console.error("[RAG] Failed to set TRANSFORMERS cache directory:", e),
);

const embeddings = new Embeddings(config.EMBEDDING_MODEL);
await embeddings.init();

const generator = new GeminiGenerator(config.GOOGLE_API_KEY, config.GEMINI_MODEL);
if (!generator.isConfigured()) {
  console.error("[LLM] GOOGLE_API_KEY is not set; chat requests will fail until it is.");
}

const services = await createServices({
  embedder: embeddings,
  extractor: new PdfExtractor(config.VERBOSE),
  generator,
  uploadDir: config.UPLOAD_DIR,
  vectorDbDir: config.VECTOR_DB_DIR,
  collection: config.COLLECTION_NAME,
  chunkSize: config.CHUNK_SIZE,
  chunkOverlap: config.CHUNK_OVERLAP,
  maxFileSize: config.MAX_FILE_SIZE,
  topK: config.TOP_K_RESULTS,
  historyWindow: config.HISTORY_WINDOW,
  historyMaxTurns: config.HISTORY_MAX_TURNS,
  verbose: config.VERBOSE,
});

const app = createHttpApp(services, {
  corsOrigins: config.CORS_ORIGINS,
  mcp: config.MCP_ENABLED
    ? {
        createServer: () => createMcpServer(services, config.TOP_K_RESULTS),
        allowedHosts: config.ALLOWED_HOSTS ?? defaultAllowedHosts(config.HOST, config.PORT),
        enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
      }
    : undefined,
});

await startHttpTransport(app, config.PORT, config.HOST);
console.error(
  `[RAG] Ready: ${services.store.listDocuments().length} documents, ${services.store.count()} chunks`,
);
