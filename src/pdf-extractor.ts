/**
 * PDF text extraction.
 *
 * Each page's text is emitted as its own block headed by a page marker so that
 * retrieved chunks can still be traced to a page by a reader:
 *
 *   --- Page 1 ---
 *   first page text...
 *   --- Page 2 ---
 *   ...
 *
 * Pages that yield no text (scans, blank pages) are skipped but still counted
 * in `pageCount`.
 */

import { PDFParse } from "pdf-parse";
import { EncryptedPdfError, InvalidPdfError } from "./errors";
import type { TextExtractor } from "./types";

/**
 * Thin wrapper around pdf-parse. A fresh parser is created per call and always
 * destroyed afterwards.
 */
export class PdfExtractor implements TextExtractor {
  private readonly verbose: boolean;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  /**
   * Extract text from a PDF held in memory.
   * @throws {EncryptedPdfError} for password protected documents.
   * @throws {InvalidPdfError} when the bytes cannot be parsed as a PDF.
   */
  public async extractText(data: Uint8Array): Promise<{ text: string; pageCount: number }> {
    // pdf.js may transfer the underlying buffer; hand it a private copy.
    const parser = new PDFParse({ data: new Uint8Array(data) });
    try {
      const result = await parser.getText();
      const text = PdfExtractor.joinPages(result.pages.map((p) => p.text));
      if (this.verbose) {
        console.error(
          `[PDF] Extracted ${text.length} characters from ${result.pages.length} pages`,
        );
      }
      return { text, pageCount: result.pages.length };
    } catch (e) {
      throw PdfExtractor.classifyError(e);
    } finally {
      await parser.destroy().catch((e: unknown) => {
        console.error(`[PDF] Failed to release parser:`, e);
      });
    }
  }

  /** Join per-page texts with 1-based page markers, skipping empty pages. */
  public static joinPages(pages: string[]): string {
    let out = "";
    pages.forEach((pageText, i) => {
      if (pageText.trim()) out += `\n--- Page ${i + 1} ---\n${pageText}`;
    });
    return out.trim();
  }

  /** Translate pdf.js exceptions into domain errors. */
  public static classifyError(e: unknown): Error {
    if (e instanceof EncryptedPdfError || e instanceof InvalidPdfError) return e;
    const name = e instanceof Error ? e.name : "";
    const message = e instanceof Error ? e.message : String(e);
    if (name === "PasswordException" || /password/i.test(message)) return new EncryptedPdfError();
    return new InvalidPdfError(message);
  }
}
