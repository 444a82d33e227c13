import type { NextFunction, Request, Response } from "express";
import path from "path";
import type { TemplatePatch } from "../repositories/template_repository.js";
import { toTemplateView, type TemplateService } from "../services/template_service.js";
import { fileExtension } from "../services/text_extraction.js";
import { TEMPLATE_EXTENSION } from "../utils/constants.js";
import { UnsupportedMediaTypeError } from "../utils/errors.js";
import { currentUserId } from "../utils/token_manager.js";
import { requireFile } from "./document_controllers.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireDocx = (req: Request): Buffer => {
  const file = requireFile(req);
  if (fileExtension(path.basename(file.originalname)) !== TEMPLATE_EXTENSION) {
    throw new UnsupportedMediaTypeError("Only DOCX files are supported");
  }
  return file.buffer;
};

const toPatch = (body: Record<string, unknown>): TemplatePatch => {
  const patch: TemplatePatch = {};
  if (typeof body.name === "string") patch.name = body.name;
  if (typeof body.description === "string" || body.description === null) {
    patch.description = body.description;
  }
  if (isRecord(body.metadata)) patch.metadata = body.metadata;
  if (typeof body.is_active === "boolean") patch.isActive = body.is_active;
  return patch;
};

export const createTemplateController = (templates: TemplateService) => {
  const uploadTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = requireDocx(req);
      const body: Record<string, unknown> = req.body ?? {};
      const template = await templates.create({
        userId: currentUserId(res),
        name: typeof body.name === "string" ? body.name : "",
        description: typeof body.description === "string" && body.description ? body.description : null,
        file,
      });

      req.log.info({ templateId: template.id }, "Template uploaded");
      return res
        .status(201)
        .json({ template: toTemplateView(template), message: "Template uploaded successfully" });
    } catch (error) {
      return next(error);
    }
  };

  const listTemplates = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const includeInactive = req.query.include_inactive === "true";
      const list = await templates.list(currentUserId(res), includeInactive);
      return res.status(200).json({ templates: list.map(toTemplateView) });
    } catch (error) {
      return next(error);
    }
  };

  const getTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const template = await templates.get(req.params.templateId, currentUserId(res));
      return res
        .status(200)
        .json({ template: toTemplateView(template), message: "Template retrieved successfully" });
    } catch (error) {
      return next(error);
    }
  };

  const getTemplateVariables = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const template = await templates.get(req.params.templateId, currentUserId(res));
      return res.status(200).json({ variables: Object.keys(template.variables).sort() });
    } catch (error) {
      return next(error);
    }
  };

  const updateTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const template = await templates.update(
        req.params.templateId,
        currentUserId(res),
        toPatch(body)
      );
      return res
        .status(200)
        .json({ template: toTemplateView(template), message: "Template updated successfully" });
    } catch (error) {
      return next(error);
    }
  };

  const replaceTemplateFile = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = requireDocx(req);
      const template = await templates.replaceFile(req.params.templateId, currentUserId(res), file);

      req.log.info({ templateId: template.id, version: template.version }, "Template file replaced");
      return res
        .status(200)
        .json({ template: toTemplateView(template), message: "Template file updated successfully" });
    } catch (error) {
      return next(error);
    }
  };

  const processTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data: unknown = req.body;
      const { outputFile, downloadUrl } = await templates.process(
        req.params.templateId,
        currentUserId(res),
        isRecord(data) ? data : {}
      );
      return res.status(200).json({
        message: "Template processed successfully",
        output_file: outputFile,
        download_url: downloadUrl,
      });
    } catch (error) {
      return next(error);
    }
  };

  const deleteTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await templates.delete(req.params.templateId, currentUserId(res));
      return res.status(200).json({ message: "Template deleted successfully" });
    } catch (error) {
      return next(error);
    }
  };

  return {
    uploadTemplate,
    listTemplates,
    getTemplate,
    getTemplateVariables,
    updateTemplate,
    replaceTemplateFile,
    processTemplate,
    deleteTemplate,
  };
};
