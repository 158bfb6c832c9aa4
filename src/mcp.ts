/**
 * Model Context Protocol surface over the same services as the REST API.
 *
 * Tool contracts:
 *  search_documents
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ file_id, file_name, chunk_index, relevance_score, snippet }> }
 *  ask_documents
 *    Input:  { query: string, use_agentic?: boolean, use_history?: boolean }
 *    Output: { answer, sources, intent }
 *  list_documents
 *    Input:  {}
 *    Output: { documents: Array<{ file_id, file_name, uploaded_at, num_chunks }> }
 *
 * Results are returned as a single JSON text content block. Argument errors
 * raise InvalidParams; a failed generation comes back as an isError result.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import { toSourceRef } from "./chat-agent";
import { HttpError } from "./errors";
import type { AppServices } from "./services";
import { MAX_TOP_K } from "./vector-store";
import { toWireChat, toWireDocument } from "./transport/wire";

const SearchArgs = z.object({
  query: z.string().trim().min(1, "Missing query"),
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

const AskArgs = z.object({
  query: z.string().trim().min(1, "Missing query"),
  use_agentic: z.boolean().optional(),
  use_history: z.boolean().optional(),
});

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      parsed.error.issues.map((i) => i.message).join(", "),
    );
  }
  return parsed.data;
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value) }] };
}

/**
 * Build an unconnected MCP server. A new instance is created per HTTP session;
 * the services are shared.
 */
export function createMcpServer(services: AppServices, defaultTopK = 5): Server {
  const server = new Server(
    { name: "pdf-rag-chat", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "search_documents",
        description:
          "Semantic search over uploaded PDF documents. Returns the closest text chunks with file name, chunk index and relevance score.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Natural language search query." },
            top_k: {
              type: "number",
              description: `Maximum number of matches (1-${MAX_TOP_K}). Defaults to ${defaultTopK}.`,
              minimum: 1,
              maximum: MAX_TOP_K,
            },
          },
          required: ["query"],
        },
      },
      {
        name: "ask_documents",
        description:
          "Answer a question from the uploaded PDF documents using retrieval-augmented generation.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Question about the documents." },
            use_agentic: {
              type: "boolean",
              description: "Detect query intent to size retrieval (default true).",
            },
            use_history: {
              type: "boolean",
              description: "Include recent conversation in the prompt (default true).",
            },
          },
          required: ["query"],
        },
      },
      {
        name: "list_documents",
        description: "List uploaded PDF documents.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const { name, arguments: args } = req.params;

    if (name === "search_documents") {
      const { query, top_k = defaultTopK } = parseArgs(SearchArgs, args);
      const hits = await services.store.search(query, top_k);
      return jsonResult({
        matches: hits.map((h) => {
          const ref = toSourceRef(h);
          return {
            file_id: h.metadata.fileId,
            file_name: ref.fileName,
            chunk_index: ref.chunkIndex,
            relevance_score: ref.relevanceScore,
            snippet: h.content,
          };
        }),
      });
    }

    if (name === "ask_documents") {
      const { query, use_agentic, use_history } = parseArgs(AskArgs, args);
      try {
        const result = await services.agent.chat(query, {
          useAgentic: use_agentic,
          useHistory: use_history,
        });
        return jsonResult(toWireChat(result));
      } catch (e) {
        if (e instanceof HttpError && e.status >= 500) {
          return { content: [{ type: "text", text: e.message }], isError: true };
        }
        if (e instanceof HttpError) throw new McpError(ErrorCode.InvalidParams, e.message);
        throw e;
      }
    }

    if (name === "list_documents") {
      return jsonResult({ documents: services.store.listDocuments().map(toWireDocument) });
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
