import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import {
  BadRequestError,
  EmptyPdfError,
  NotFoundError,
  PayloadTooLargeError,
} from "./errors";
import type { TextExtractor, UploadResult } from "./types";
import type { VectorStore } from "./vector-store";

/**
 * Options required to construct a {@link DocumentIngestor}.
 */
export interface IngestorOptions {
  uploadDir: string; // where original uploads are kept
  extractor: TextExtractor;
  store: VectorStore;
  chunkSize?: number; // default 1000
  chunkOverlap?: number; // default 200
  maxFileSize?: number; // bytes, default 10 MiB
  verbose?: boolean;
}

/** An uploaded file as received from the HTTP layer. */
export interface IncomingFile {
  originalName: string;
  buffer: Uint8Array;
}

/**
 * Owns the document lifecycle: stores uploads on disk, extracts and chunks
 * their text into the vector store, and removes both again on delete / clear.
 * Uploads are named `<fileId>_<name>` so a document's files can be found from
 * its id alone.
 */
export class DocumentIngestor {
  private readonly uploadDir: string;
  private readonly extractor: TextExtractor;
  private readonly store: VectorStore;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly maxFileSize: number;
  private readonly verbose: boolean;

  public constructor(opts: IngestorOptions) {
    this.uploadDir = path.resolve(opts.uploadDir);
    this.extractor = opts.extractor;
    this.store = opts.store;
    this.verbose = !!opts.verbose;
    this.chunkSize = opts.chunkSize ?? 1000;
    this.maxFileSize = opts.maxFileSize ?? 10 * 1024 * 1024;
    const overlap = opts.chunkOverlap ?? 200;
    // Safety: ensure overlap < size for forward progress
    if (overlap >= this.chunkSize) {
      const fallback = Math.max(0, Math.floor(this.chunkSize * 0.15));
      console.error(
        `[RAG] Provided chunkOverlap (=${overlap}) >= chunkSize (=${this.chunkSize}). Using fallback overlap ${fallback}.`,
      );
      this.chunkOverlap = fallback;
    } else {
      this.chunkOverlap = overlap;
    }
  }

  public getMaxFileSize(): number {
    return this.maxFileSize;
  }

  /**
   * Split text into fixed-size overlapping windows of code points. Each window starts
   * `size - overlap` characters after the previous one; the last window ends
   * at the end of the text and may be shorter than `size`.
   *
   * For a text of length L > size this yields 1 + ceil((L - size) / (size - overlap))
   * chunks; 1 chunk when 0 < L <= size; none for empty text.
   *
   * @param size Maximum characters per chunk.
   * @param overlap Characters shared between neighbouring chunks. Must be < size.
   */
  public static splitChunks(text: string, size = 1000, overlap = 200): string[] {
    // windows count code points so a surrogate pair is never split
    const chars = Array.from(text);
    const out: string[] = [];
    const step = Math.max(1, size - overlap);
    for (let i = 0; i < chars.length; i += step) {
      out.push(chars.slice(i, i + size).join(""));
      if (i + size >= chars.length) break;
    }
    return out;
  }

  /**
   * Reduce an upload's name to a safe single path segment.
   */
  public static sanitizeFileName(name: string): string {
    const base = path.basename(name.replace(/\\/g, "/"));
    const cleaned = base.replace(/[^\w.\- ]+/g, "_").trim();
    return cleaned || "document.pdf";
  }

  /**
   * Store, extract, chunk and index one uploaded PDF.
   * @throws {BadRequestError} wrong extension or empty file.
   * @throws {PayloadTooLargeError} file above the size limit.
   * @throws {EmptyPdfError} the PDF has no extractable text.
   */
  public async ingest(file: IncomingFile): Promise<UploadResult> {
    const fileName = path.basename(file.originalName.replace(/\\/g, "/"));
    if (!fileName.toLowerCase().endsWith(".pdf"))
      throw new BadRequestError("Only PDF files are allowed");
    if (file.buffer.byteLength === 0) throw new BadRequestError("Uploaded file is empty");
    if (file.buffer.byteLength > this.maxFileSize)
      throw new PayloadTooLargeError(`File exceeds the ${this.maxFileSize} byte limit`);

    const fileId = randomUUID();
    const uploadedAt = new Date().toISOString();
    await fs.mkdir(this.uploadDir, { recursive: true });
    const diskPath = this.ensureWithinRoot(
      `${fileId}_${DocumentIngestor.sanitizeFileName(fileName)}`,
    );
    await fs.writeFile(diskPath, file.buffer);

    let numChunks: number;
    let numCharacters: number;
    try {
      const { text, pageCount } = await this.extractor.extractText(file.buffer);
      if (!text.trim()) throw new EmptyPdfError();
      const chunks = DocumentIngestor.splitChunks(text, this.chunkSize, this.chunkOverlap);
      numCharacters = Array.from(text).length;
      numChunks = await this.store.add(chunks, { fileId, fileName, uploadedAt });
      console.error(
        `[RAG] Indexed ${fileName} (${pageCount} pages, ${numCharacters} chars) as ${numChunks} chunks`,
      );
    } catch (e) {
      await fs.rm(diskPath, { force: true });
      throw e;
    }

    return { fileId, fileName, numChunks, numCharacters, uploadedAt };
  }

  /**
   * Delete a document's chunks and its stored upload.
   * @throws {NotFoundError} when no chunk carries the id.
   */
  public async deleteDocument(fileId: string): Promise<void> {
    const removed = await this.store.deleteDocument(fileId);
    if (!removed) throw new NotFoundError("Document not found");
    const files = await this.discoverUploads(`${fg.escapePath(fileId)}_*`);
    await Promise.all(files.map((f) => fs.rm(f, { force: true })));
    if (this.verbose) console.error(`[RAG][verbose] Removed ${files.length} files for ${fileId}`);
  }

  /** Empty the collection and the upload directory. */
  public async clearAll(): Promise<void> {
    await this.store.clear();
    const files = await this.discoverUploads("*");
    await Promise.all(files.map((f) => fs.rm(f, { force: true })));
    console.error(`[RAG] Cleared collection and ${files.length} uploaded files`);
  }

  /** Resolve a name inside the upload directory, rejecting traversal. */
  public ensureWithinRoot(relPath: string): string {
    const abs = path.resolve(this.uploadDir, relPath);
    if (!abs.startsWith(this.uploadDir + path.sep))
      throw new BadRequestError("Path outside upload directory");
    return abs;
  }

  private async discoverUploads(pattern: string): Promise<string[]> {
    return fg(pattern, { cwd: this.uploadDir, absolute: true, onlyFiles: true, dot: true });
  }
}
