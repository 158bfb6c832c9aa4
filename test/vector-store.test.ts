import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { Persistence, decodeEmbedding, encodeEmbedding } from "../src/persistence";
import { VectorStore, cosine } from "../src/vector-store";
import { FakeEmbedder, makeTempDir } from "./helpers";

const FRUIT = ["apples are red and crunchy", "bananas are yellow and soft", "cherries grow on trees"];
const TOOLS = ["hammers drive nails", "saws cut wood"];

function meta(fileId: string, fileName: string) {
  return { fileId, fileName, uploadedAt: "2026-01-01T00:00:00.000Z" };
}

async function seeded(embedder = new FakeEmbedder(), persistence?: Persistence) {
  const store = new VectorStore({ collection: "test", embedder, persistence });
  await store.init();
  await store.add(FRUIT, meta("doc-fruit", "fruit.pdf"));
  await store.add(TOOLS, meta("doc-tools", "tools.pdf"));
  return store;
}

describe("cosine", () => {
  it("is 1 for parallel and 0 for orthogonal vectors", () => {
    expect(cosine(new Float32Array([1, 2]), new Float32Array([2, 4]))).toBeCloseTo(1, 6);
    expect(cosine(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
  });
});

describe("VectorStore", () => {
  it("lists documents in upload order with chunk counts", async () => {
    const store = await seeded();
    expect(store.count()).toBe(5);
    expect(store.listDocuments()).toEqual([
      { fileId: "doc-fruit", fileName: "fruit.pdf", uploadedAt: "2026-01-01T00:00:00.000Z", numChunks: 3 },
      { fileId: "doc-tools", fileName: "tools.pdf", uploadedAt: "2026-01-01T00:00:00.000Z", numChunks: 2 },
    ]);
  });

  it("adds nothing for an empty chunk list", async () => {
    const store = new VectorStore({ collection: "test", embedder: new FakeEmbedder() });
    expect(await store.add([], meta("x", "x.pdf"))).toBe(0);
    expect(store.listDocuments()).toEqual([]);
  });

  it("ranks the closest chunk first", async () => {
    const store = await seeded();
    const hits = await store.search("apples are red and crunchy", 2);
    expect(hits).toHaveLength(2);
    expect(hits[0].content).toBe(FRUIT[0]);
    expect(hits[0].metadata).toMatchObject({ fileId: "doc-fruit", chunkIndex: 0, totalChunks: 3 });
    expect(hits[0].distance).toBeCloseTo(0, 5);
    expect(hits[1].distance).toBeGreaterThanOrEqual(hits[0].distance);
  });

  it("clamps topK to at least one result", async () => {
    const store = await seeded();
    expect(await store.search("nails", 0)).toHaveLength(1);
    expect(await store.search("nails", 500)).toHaveLength(5);
  });

  it("does not embed the query when the collection is empty", async () => {
    const embedder = new FakeEmbedder();
    const store = new VectorStore({ collection: "test", embedder });
    expect(await store.search("anything", 5)).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it("removes a deleted document from search results", async () => {
    const store = await seeded();
    expect(await store.deleteDocument("doc-fruit")).toBe(true);
    const hits = await store.search("apples are red", 10);
    expect(hits.map((h) => h.metadata.fileId)).toEqual(["doc-tools", "doc-tools"]);
    expect(await store.deleteDocument("doc-fruit")).toBe(false);
  });

  it("returns a document's chunks in index order", async () => {
    const store = await seeded();
    const doc = store.getDocument("doc-tools");
    expect(doc?.info.numChunks).toBe(2);
    expect(doc?.chunks).toEqual([
      { chunkIndex: 0, text: TOOLS[0] },
      { chunkIndex: 1, text: TOOLS[1] },
    ]);
    expect(store.getDocument("missing")).toBeUndefined();
  });

  it("clears every record", async () => {
    const store = await seeded();
    await store.clear();
    expect(store.count()).toBe(0);
    expect(store.listDocuments()).toEqual([]);
  });
});

describe("VectorStore persistence", () => {
  it("reloads the same records from disk", async () => {
    const dir = await makeTempDir("vs");
    const file = path.join(dir, "test.json");
    const original = await seeded(new FakeEmbedder(), new Persistence(file));

    const embedder = new FakeEmbedder();
    const reloaded = new VectorStore({ collection: "test", embedder, persistence: new Persistence(file) });
    await reloaded.init();

    expect(embedder.calls).toBe(0);
    expect(reloaded.listDocuments()).toEqual(original.listDocuments());
    const hits = await reloaded.search("saws cut wood", 1);
    expect(hits[0].content).toBe(TOOLS[1]);
    expect(hits[0].distance).toBeCloseTo(0, 5);
  });

  it("re-embeds records stored by a different model", async () => {
    const dir = await makeTempDir("vs");
    const file = path.join(dir, "test.json");
    await seeded(new FakeEmbedder("model-a"), new Persistence(file));

    const embedder = new FakeEmbedder("model-b");
    const store = new VectorStore({ collection: "test", embedder, persistence: new Persistence(file) });
    await store.init();

    expect(embedder.calls).toBe(5);
    expect(store.count()).toBe(5);
    const saved = JSON.parse(await fs.readFile(file, "utf8"));
    expect(saved.meta.modelName).toBe("model-b");
  });

  it("skips a file it does not recognise", async () => {
    const dir = await makeTempDir("vs");
    const file = path.join(dir, "test.json");
    await fs.writeFile(file, JSON.stringify({ version: 9, docs: [] }));
    expect(await new Persistence(file).load()).toBeNull();
  });

  it("rolls back an insert whose write fails", async () => {
    const dir = await makeTempDir("vs");
    const file = path.join(dir, "test.json");
    await fs.mkdir(file);
    const store = new VectorStore({
      collection: "test",
      embedder: new FakeEmbedder(),
      persistence: new Persistence(file),
    });
    await store.init();

    await expect(store.add(FRUIT, meta("doc-fruit", "fruit.pdf"))).rejects.toThrow();
    expect(store.count()).toBe(0);
    expect(store.listDocuments()).toEqual([]);
  });

  it("restores deleted and cleared records when the write fails", async () => {
    const dir = await makeTempDir("vs");
    const file = path.join(dir, "test.json");
    const store = await seeded(new FakeEmbedder(), new Persistence(file));
    const listed = store.listDocuments();

    await fs.rm(file);
    await fs.mkdir(file);

    await expect(store.deleteDocument("doc-fruit")).rejects.toThrow();
    expect(store.listDocuments()).toEqual(listed);
    expect(store.getDocument("doc-fruit")?.chunks.map((c) => c.text)).toEqual(FRUIT);

    await expect(store.clear()).rejects.toThrow();
    expect(store.count()).toBe(5);
    expect(store.listDocuments()).toEqual(listed);
  });

  it("encodes embeddings as base64 float32", () => {
    const v = new Float32Array([0.5, -1.25, 3]);
    expect(Array.from(decodeEmbedding(encodeEmbedding(v)) ?? [])).toEqual([0.5, -1.25, 3]);
    expect(decodeEmbedding("abc")).toBeNull();
  });
});
