import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { EncryptedPdfError, InvalidPdfError } from "../src/errors";
import type { Embedder, TextExtractor, TextGenerator } from "../src/types";

const DIMS = 64;

/** Deterministic bag-of-words embedder: each token bumps one hashed dimension. */
export class FakeEmbedder implements Embedder {
  public calls = 0;
  constructor(private readonly modelName = "fake-embedder") {}

  getModelName(): string {
    return this.modelName;
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls++;
    const v = new Float32Array(DIMS);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let h = 0;
      for (let i = 0; i < token.length; i++) h = (h * 31 + token.charCodeAt(i)) >>> 0;
      v[h % DIMS] += 1;
    }
    return v;
  }
}

/**
 * Treats uploads as "%PDF-..." header line followed by the page text.
 * A body containing ENCRYPTED behaves like a password protected file.
 */
export class FakeExtractor implements TextExtractor {
  async extractText(data: Uint8Array): Promise<{ text: string; pageCount: number }> {
    const raw = Buffer.from(data).toString("utf8");
    if (!raw.startsWith("%PDF-")) throw new InvalidPdfError("missing header");
    if (raw.includes("ENCRYPTED")) throw new EncryptedPdfError();
    const nl = raw.indexOf("\n");
    return { text: nl === -1 ? "" : raw.slice(nl + 1), pageCount: 1 };
  }
}

/** Records prompts; answers with `answer` or throws `failure` when set. */
export class FakeGenerator implements TextGenerator {
  public prompts: string[] = [];
  public answer = "Fake answer.";
  public failure: Error | null = null;

  getModelName(): string {
    return "fake-llm";
  }

  isConfigured(): boolean {
    return true;
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.failure) throw this.failure;
    return this.answer;
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/** A fake PDF body whose extracted text is exactly `text`. */
export function pdfBody(text: string): string {
  return `%PDF-1.4\n${text}`;
}
