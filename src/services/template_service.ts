import { randomUUID } from "crypto";
import type { TemplatePatch, TemplateRepository } from "../repositories/template_repository.js";
import type { TemplateRecord, TemplateView } from "../types/index.js";
import { DOCX_MIME_TYPE } from "../utils/constants.js";
import { BadRequestError, InvalidFileError, NotFoundError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { generatedKey, templateKey, type ObjectStorage } from "./storage.js";
import { extractVariables, renderTemplate, type TemplateData } from "./template_processor.js";

export interface NewTemplateUpload {
  userId: string;
  name: string;
  description: string | null;
  metadata?: Record<string, unknown>;
  file: Buffer;
}

export interface ProcessedTemplate {
  outputFile: string;
  downloadUrl: string;
}

export const toTemplateView = (template: TemplateRecord): TemplateView => ({
  id: template.id,
  name: template.name,
  description: template.description,
  variables: template.variables,
  metadata: template.metadata,
  version: template.version,
  is_active: template.isActive,
  created_at: template.createdAt.toISOString(),
  updated_at: template.updatedAt.toISOString(),
});

const variableMap = (names: string[]): Record<string, string> =>
  Object.fromEntries(names.map((name) => [name, ""]));

/** Placeholder map of an uploaded DOCX; an unreadable file is the caller's fault. */
const readVariables = (file: Buffer): Record<string, string> => {
  try {
    return variableMap(extractVariables(file));
  } catch (error) {
    if (error instanceof InvalidFileError) {
      throw new BadRequestError(`Invalid template: ${error.message}`);
    }
    throw error;
  }
};

/** Template CRUD plus rendering, over the template repository and object storage. */
export class TemplateService {
  constructor(
    private readonly templates: TemplateRepository,
    private readonly storage: ObjectStorage,
    private readonly log: Logger
  ) {}

  async create(upload: NewTemplateUpload): Promise<TemplateRecord> {
    const variables = readVariables(upload.file);
    const id = randomUUID();
    const storageKey = templateKey(upload.userId, id);

    await this.storage.put(storageKey, upload.file, DOCX_MIME_TYPE);

    return this.templates.create({
      id,
      userId: upload.userId,
      name: upload.name,
      description: upload.description,
      storageKey,
      variables,
      metadata: { ...(upload.metadata ?? {}), variables },
    });
  }

  list(userId: string, includeInactive = false): Promise<TemplateRecord[]> {
    return this.templates.listByUser(userId, { includeInactive });
  }

  async get(templateId: string, userId: string): Promise<TemplateRecord> {
    const template = await this.templates.findForUser(templateId, userId);
    if (!template) throw new NotFoundError("Template not found");
    return template;
  }

  async update(templateId: string, userId: string, patch: TemplatePatch): Promise<TemplateRecord> {
    const current = await this.get(templateId, userId);
    const next: TemplatePatch = { ...patch };
    if (patch.metadata) {
      next.metadata = { ...patch.metadata, variables: current.variables };
    }

    const updated = await this.templates.update(templateId, userId, next);
    if (!updated) throw new NotFoundError("Template not found");
    return updated;
  }

  /** Swaps the DOCX, re-reads its variables and bumps the version. */
  async replaceFile(templateId: string, userId: string, file: Buffer): Promise<TemplateRecord> {
    const current = await this.get(templateId, userId);
    const variables = readVariables(file);

    await this.storage.put(current.storageKey, file, DOCX_MIME_TYPE);

    const updated = await this.templates.update(
      templateId,
      userId,
      { variables, metadata: { ...current.metadata, variables } },
      { bumpVersion: true }
    );
    if (!updated) throw new NotFoundError("Template not found");
    return updated;
  }

  async delete(templateId: string, userId: string): Promise<void> {
    const template = await this.get(templateId, userId);
    await this.storage.delete(template.storageKey);
    await this.templates.delete(templateId, userId);
    this.log.info({ templateId, userId }, "Template deleted");
  }

  /**
   * Renders the template with `data`, stores the result under generated/ and
   * returns its key with a download URL.
   */
  async process(
    templateId: string,
    userId: string,
    data: TemplateData,
    { strict = true }: { strict?: boolean } = {}
  ): Promise<ProcessedTemplate> {
    const template = await this.get(templateId, userId);
    const source = await this.storage.get(template.storageKey);
    const output = renderTemplate(source, data, { strict });

    const outputFile = generatedKey(userId, templateId);
    await this.storage.put(outputFile, output, DOCX_MIME_TYPE);
    const downloadUrl = await this.storage.getDownloadUrl(outputFile, {
      filename: `processed_${template.name}.docx`,
      contentType: DOCX_MIME_TYPE,
    });

    this.log.info({ templateId, userId, outputFile }, "Template processed");
    return { outputFile, downloadUrl };
  }
}
