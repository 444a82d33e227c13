import { Router, type RequestHandler } from "express";
import type { AppConfig } from "../config/env.js";
import { createDocumentController, uploadMiddleware } from "../controllers/document_controllers.js";
import type { AppServices } from "../services/container.js";

export const createFileRoutes = (
  services: AppServices,
  config: AppConfig,
  requireAuth: RequestHandler,
  limitPerUser: RequestHandler
) => {
  const fileRoutes = Router();
  const documents = createDocumentController(services);

  fileRoutes.use(requireAuth);
  fileRoutes.post(
    "/upload",
    limitPerUser,
    uploadMiddleware(config.processing.maxFileSize),
    documents.uploadDocument
  );
  fileRoutes.get("/", documents.getUserDocuments);
  fileRoutes.get("/:fileId", documents.getDocumentStatus);
  fileRoutes.get("/:fileId/download", documents.getDocumentFile);
  fileRoutes.delete("/:fileId", documents.deleteDocument);

  return fileRoutes;
};
