import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createMcpServer } from "../src/mcp";
import { createServices, type AppServices } from "../src/services";
import { StatusManager } from "../src/status";
import { FakeEmbedder, FakeExtractor, FakeGenerator, makeTempDir } from "./helpers";

const TextResult = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).length(1),
  isError: z.boolean().optional(),
});

function parseText(result: unknown): unknown {
  return JSON.parse(TextResult.parse(result).content[0].text);
}

describe("MCP tools", () => {
  let services: AppServices;
  let generator: FakeGenerator;
  let client: Client;

  beforeEach(async () => {
    generator = new FakeGenerator();
    services = await createServices({
      embedder: new FakeEmbedder(),
      extractor: new FakeExtractor(),
      generator,
      uploadDir: await makeTempDir("mcp"),
      topK: 5,
      status: new StatusManager({ version: "0.0.0-test" }),
    });
    await services.store.add(["apples are red", "pears are green"], {
      fileId: "f1",
      fileName: "fruit.pdf",
      uploadedAt: "2026-01-01T00:00:00.000Z",
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([
      createMcpServer(services, 5).connect(serverTransport),
      client.connect(clientTransport),
    ]);
  });

  afterEach(async () => {
    await client.close();
  });

  it("lists the document tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["search_documents", "ask_documents", "list_documents"]);
  });

  it("searches chunks with relevance scores", async () => {
    const result = await client.callTool({
      name: "search_documents",
      arguments: { query: "apples are red", top_k: 1 },
    });
    expect(parseText(result)).toEqual({
      matches: [
        {
          file_id: "f1",
          file_name: "fruit.pdf",
          chunk_index: 0,
          relevance_score: 1,
          snippet: "apples are red",
        },
      ],
    });
  });

  it("lists uploaded documents", async () => {
    const result = await client.callTool({ name: "list_documents", arguments: {} });
    expect(parseText(result)).toEqual({
      documents: [
        { file_id: "f1", file_name: "fruit.pdf", uploaded_at: "2026-01-01T00:00:00.000Z", num_chunks: 2 },
      ],
    });
  });

  it("answers questions and records the turn", async () => {
    const result = await client.callTool({
      name: "ask_documents",
      arguments: { query: "Summarize the fruit notes" },
    });
    expect(parseText(result)).toMatchObject({ answer: "Fake answer.", intent: "SUMMARIZATION", error: null });
    expect(services.history.size()).toBe(1);
  });

  it("returns generation failures as error results", async () => {
    generator.failure = new Error("boom");
    const result = TextResult.parse(
      await client.callTool({ name: "ask_documents", arguments: { query: "What colour are apples?" } }),
    );
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe("Error generating response: boom");
  });

  it("rejects bad arguments and unknown tools", async () => {
    await expect(client.callTool({ name: "search_documents", arguments: {} })).rejects.toThrow(/Required/);
    await expect(
      client.callTool({ name: "search_documents", arguments: { query: "   " } }),
    ).rejects.toThrow(/Missing query/);
    await expect(client.callTool({ name: "read_file", arguments: {} })).rejects.toThrow(/Unknown tool/);
  });
});
