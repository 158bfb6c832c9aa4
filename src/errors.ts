import multer from "multer";
import type { ErrorRequestHandler } from "express";

/** Error carrying the HTTP status it should be reported with. */
export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class PayloadTooLargeError extends HttpError {
  constructor(message: string) {
    super(413, message);
    this.name = "PayloadTooLargeError";
  }
}

export class UnprocessableEntityError extends HttpError {
  constructor(message: string) {
    super(422, message);
    this.name = "UnprocessableEntityError";
  }
}

/** A hosted dependency (the generation API) failed. */
export class UpstreamError extends HttpError {
  constructor(message: string) {
    super(502, message);
    this.name = "UpstreamError";
  }
}

/** The uploaded bytes are not a readable PDF. */
export class InvalidPdfError extends Error {
  constructor(detail?: string) {
    super(detail ? `Invalid PDF file: ${detail}` : "Invalid PDF file");
    this.name = "InvalidPdfError";
  }
}

/** The PDF is password protected. */
export class EncryptedPdfError extends Error {
  constructor() {
    super("PDF is encrypted or password protected");
    this.name = "EncryptedPdfError";
  }
}

/** The PDF parsed but yielded no text (e.g. scanned images only). */
export class EmptyPdfError extends Error {
  constructor() {
    super("PDF contains no extractable text");
    this.name = "EmptyPdfError";
  }
}

/** Thrown when generation is attempted without an API key. */
export class GeneratorNotConfiguredError extends Error {
  constructor() {
    super("GOOGLE_API_KEY not found in environment variables");
    this.name = "GeneratorNotConfiguredError";
  }
}

/** Map any thrown value onto an {@link HttpError}. Unknown errors become 500. */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (err instanceof InvalidPdfError) return new BadRequestError(err.message);
  if (err instanceof EncryptedPdfError || err instanceof EmptyPdfError)
    return new UnprocessableEntityError(err.message);
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") return new PayloadTooLargeError("File too large");
    return new BadRequestError(`Upload error: ${err.message}`);
  }
  // body-parser tags its own failures with a 4xx status
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    const status = err.status;
    if (status >= 400 && status < 500) {
      if (err instanceof SyntaxError) return new BadRequestError("Malformed JSON body");
      if (status === 413) return new PayloadTooLargeError("Request body too large");
      return new HttpError(status, err.message);
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return new HttpError(500, `Internal server error: ${message}`);
}

/** Terminal Express middleware rendering errors as `{ message, status }`. */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const httpErr = toHttpError(err);
  if (httpErr.status >= 500) {
    console.error(`[HTTP] ${req.method} ${req.path} failed:`, err);
  }
  if (res.headersSent) return;
  res.status(httpErr.status).json({ message: httpErr.message, status: httpErr.status });
};
