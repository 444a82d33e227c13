import { Router, type RequestHandler } from "express";
import type { AppConfig } from "../config/env.js";
import { createChatController } from "../controllers/chat_controllers.js";
import type { ChatService } from "../services/chat_service.js";
import { chatQueryValidator, validate } from "../utils/validators.js";

export const createChatRoutes = (
  chat: ChatService,
  config: AppConfig,
  requireAuth: RequestHandler,
  limitPerUser: RequestHandler
) => {
  const chatRoutes = Router();
  const { queryDocuments, generateFromTemplate } = createChatController(
    chat,
    config.retrieval.maxResults
  );

  chatRoutes.use(requireAuth);
  chatRoutes.post("/query", limitPerUser, validate(chatQueryValidator), queryDocuments);
  chatRoutes.post("/template", limitPerUser, validate(chatQueryValidator), generateFromTemplate);

  return chatRoutes;
};
