import express, { type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { BadRequestError, NotFoundError } from "../errors";
import type { AppServices } from "../services";
import {
  toWireChat,
  toWireDocument,
  toWireDocumentDetail,
  toWireTurn,
  toWireUpload,
} from "./wire";

const ChatBody = z.object({
  query: z.string({ required_error: "query is required" }),
  use_agentic: z.boolean().default(true),
  use_history: z.boolean().default(true),
});

/** Express 4 does not forward rejected promises; route them to next(). */
function route(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/**
 * REST endpoints. Handlers validate input and delegate; status codes come from
 * the errors thrown by the services (see errors.ts).
 */
export function createApiRouter(services: AppServices): express.Router {
  const { store, ingestor, agent, history, status } = services;
  const router = express.Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    // browsers send UTF-8 file names; busboy defaults to latin1
    defParamCharset: "utf8",
    limits: { fileSize: ingestor.getMaxFileSize(), files: 1 },
  });

  router.get("/", (_req, res) => {
    res.json({
      message: "PDF RAG chat API",
      version: status.getStatus().version,
      endpoints: {
        upload: "POST /upload - Upload a PDF document (multipart field 'file')",
        chat: "POST /chat - Chat with the uploaded documents",
        documents: "GET /documents - List all uploaded documents",
        document: "GET /documents/{file_id} - Show a document and its chunks",
        delete: "DELETE /documents/{file_id} - Delete a specific document",
        clear: "POST /clear - Clear chat history",
        history: "GET /history - Get chat history",
        clearAll: "DELETE /clear-all - Remove all documents and history",
        health: "GET /health - Check API health",
      },
    });
  });

  router.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      ...status.getStatus(),
      documents: store.listDocuments().length,
      chunks: store.count(),
    });
  });

  router.post(
    "/upload",
    upload.single("file"),
    route(async (req, res) => {
      if (!req.file) throw new BadRequestError("No file provided (expected multipart field 'file')");
      const result = await ingestor.ingest({
        originalName: req.file.originalname,
        buffer: req.file.buffer,
      });
      res.json(toWireUpload(result));
    }),
  );

  router.post(
    "/chat",
    route(async (req, res) => {
      const parsed = ChatBody.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new BadRequestError(parsed.error.issues.map((i) => i.message).join(", "));
      }
      const { query, use_agentic, use_history } = parsed.data;
      const result = await agent.chat(query, { useAgentic: use_agentic, useHistory: use_history });
      res.json(toWireChat(result));
    }),
  );

  router.get("/documents", (_req, res) => {
    res.json(store.listDocuments().map(toWireDocument));
  });

  router.get("/documents/:fileId", (req, res) => {
    const doc = store.getDocument(req.params.fileId);
    if (!doc) throw new NotFoundError("Document not found");
    res.json(toWireDocumentDetail(doc));
  });

  router.delete(
    "/documents/:fileId",
    route(async (req, res) => {
      await ingestor.deleteDocument(req.params.fileId);
      res.json({ message: "Document deleted successfully", file_id: req.params.fileId });
    }),
  );

  router.post("/clear", (_req, res) => {
    history.clear();
    res.json({ message: "Chat history cleared successfully" });
  });

  router.get("/history", (_req, res) => {
    res.json({ history: history.list().map(toWireTurn) });
  });

  router.delete(
    "/clear-all",
    route(async (_req, res) => {
      await ingestor.clearAll();
      history.clear();
      res.json({ message: "All data cleared successfully" });
    }),
  );

  return router;
}
