import type { NextFunction, Request, Response } from "express";
import type { ChatService } from "../services/chat_service.js";
import { BadRequestError } from "../utils/errors.js";
import { currentUserId } from "../utils/token_manager.js";

interface ChatRequestBody {
  query: string;
  templateId?: string;
  contextWindow: number;
  documentId?: string;
}

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

export const createChatController = (chat: ChatService, defaultContextWindow: number) => {
  const readBody = (req: Request): ChatRequestBody => {
    const body: Record<string, unknown> = req.body ?? {};
    return {
      query: typeof body.query === "string" ? body.query : "",
      templateId: optionalString(body.template_id),
      contextWindow: typeof body.context_window === "number" ? body.context_window : defaultContextWindow,
      documentId: optionalString(body.document_id),
    };
  };

  const queryDocuments = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, contextWindow, documentId } = readBody(req);
      const response = await chat.query({
        query,
        userId: currentUserId(res),
        contextWindow,
        documentId,
      });
      return res.status(200).json(response);
    } catch (error) {
      return next(error);
    }
  };

  const generateFromTemplate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, templateId, contextWindow, documentId } = readBody(req);
      if (!templateId) throw new BadRequestError("Template ID is required");

      const response = await chat.generateFromTemplate({
        query,
        templateId,
        userId: currentUserId(res),
        contextWindow,
        documentId,
      });
      return res.status(200).json(response);
    } catch (error) {
      return next(error);
    }
  };

  return { queryDocuments, generateFromTemplate };
};
