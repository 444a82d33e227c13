import { Router, type RequestHandler } from "express";
import type { AppConfig } from "../config/env.js";
import { uploadMiddleware } from "../controllers/document_controllers.js";
import { createTemplateController } from "../controllers/template_controllers.js";
import type { TemplateService } from "../services/template_service.js";
import {
  listTemplatesValidator,
  templateProcessValidator,
  templateUpdateValidator,
  templateUploadValidator,
  validate,
} from "../utils/validators.js";

export const createTemplateRoutes = (
  templates: TemplateService,
  config: AppConfig,
  requireAuth: RequestHandler
) => {
  const templateRoutes = Router();
  const controller = createTemplateController(templates);
  const upload = uploadMiddleware(config.processing.maxFileSize);

  templateRoutes.use(requireAuth);
  templateRoutes.post("/upload", upload, validate(templateUploadValidator), controller.uploadTemplate);
  templateRoutes.get("/", validate(listTemplatesValidator), controller.listTemplates);
  templateRoutes.get("/:templateId", controller.getTemplate);
  templateRoutes.get("/:templateId/variables", controller.getTemplateVariables);
  templateRoutes.patch("/:templateId", validate(templateUpdateValidator), controller.updateTemplate);
  templateRoutes.put("/:templateId/file", upload, controller.replaceTemplateFile);
  templateRoutes.post(
    "/:templateId/process",
    validate(templateProcessValidator),
    controller.processTemplate
  );
  templateRoutes.delete("/:templateId", controller.deleteTemplate);

  return templateRoutes;
};
