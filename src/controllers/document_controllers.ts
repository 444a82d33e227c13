import type { NextFunction, Request, Response } from "express";
import { randomUUID } from "crypto";
import path from "path";
import multer from "multer";
import type { AppServices } from "../services/container.js";
import { documentKey } from "../services/storage.js";
import { fileExtension, isSupportedDocument } from "../services/text_extraction.js";
import type { DocumentRecord, FileStatus } from "../types/index.js";
import { MIME_TYPES } from "../utils/constants.js";
import {
  BadRequestError,
  NotFoundError,
  UnsupportedMediaTypeError,
} from "../utils/errors.js";
import { currentUserId } from "../utils/token_manager.js";

/** Single multipart file held in memory; multer rejects anything above `maxFileSize`. */
export const uploadMiddleware = (maxFileSize: number, field = "file") =>
  multer({ storage: multer.memoryStorage(), limits: { fileSize: maxFileSize, files: 1 } }).single(field);

/** `req.file`, or a 400 when the multipart field was empty. */
export const requireFile = (req: Request): Express.Multer.File => {
  if (!req.file) throw new BadRequestError("No file uploaded");
  return req.file;
};

export const createDocumentController = (services: AppServices) => {
  const { documents, vectorStore, storage, processor } = services;

  const toFileStatus = async (doc: DocumentRecord): Promise<FileStatus> => ({
    file_id: doc.id,
    filename: doc.filename,
    status: doc.status,
    chunks_processed: await vectorStore.countByDocument(doc.id),
    total_chunks: typeof doc.metadata.chunk_count === "number" ? doc.metadata.chunk_count : null,
    error: doc.errorMessage,
    created_at: doc.createdAt.toISOString(),
  });

  const findOwned = async (req: Request, res: Response): Promise<DocumentRecord> => {
    const doc = await documents.findForUser(req.params.fileId, currentUserId(res));
    if (!doc) throw new NotFoundError("File not found");
    return doc;
  };

  /**
   * Stores the upload, records it as pending and answers 202 right away;
   * extraction and embedding run in the background.
   */
  const uploadDocument = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = currentUserId(res);
      const file = requireFile(req);
      const filename = path.basename(file.originalname);

      if (!isSupportedDocument(filename)) {
        throw new UnsupportedMediaTypeError("Only PDF, DOCX and TXT files are supported");
      }

      const id = randomUUID();
      const storageKey = documentKey(userId, id, filename);
      const mimeType = MIME_TYPES[fileExtension(filename)] ?? file.mimetype;

      await storage.put(storageKey, file.buffer, mimeType);
      const doc = await documents.create({
        id,
        userId,
        filename,
        mimeType,
        size: file.size,
        storageKey,
      });

      req.log.info({ docId: doc.id, filename, size: file.size }, "Document uploaded");
      res.status(202).json({ file_id: doc.id, filename: doc.filename, status: doc.status });

      void processor.enqueue(doc, file.buffer);
    } catch (error) {
      return next(error);
    }
  };

  const getUserDocuments = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const docs = await documents.listByUser(currentUserId(res));
      const files = await Promise.all(docs.map(toFileStatus));
      return res.status(200).json({ files });
    } catch (error) {
      return next(error);
    }
  };

  const getDocumentStatus = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await findOwned(req, res);
      return res.status(200).json(await toFileStatus(doc));
    } catch (error) {
      return next(error);
    }
  };

  const getDocumentFile = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await findOwned(req, res);
      const url = await storage.getDownloadUrl(doc.storageKey, {
        filename: doc.filename,
        contentType: doc.mimeType,
      });
      return res.status(200).json({ url });
    } catch (error) {
      return next(error);
    }
  };

  const deleteDocument = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await findOwned(req, res);

      await storage.delete(doc.storageKey);
      const removedChunks = await vectorStore.deleteByDocument(doc.id);
      await documents.delete(doc.id);

      req.log.info({ docId: doc.id, removedChunks }, "Document deleted");
      return res.status(200).json({ message: "File deleted successfully" });
    } catch (error) {
      return next(error);
    }
  };

  return {
    uploadDocument,
    getUserDocuments,
    getDocumentStatus,
    getDocumentFile,
    deleteDocument,
  };
};
