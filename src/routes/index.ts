import { Router } from "express";
import type { AppConfig } from "../config/env.js";
import type { AppServices } from "../services/container.js";
import { SlidingWindowRateLimiter, rateLimit } from "../utils/rate_limiter.js";
import { verifyToken } from "../utils/token_manager.js";
import { createAuthRoutes } from "./auth_routes.js";
import { createChatRoutes } from "./chat_routes.js";
import { createFileRoutes } from "./file_routes.js";
import { createTemplateRoutes } from "./template_routes.js";

export const createAppRouter = (services: AppServices, config: AppConfig) => {
  const appRouter = Router();

  const requireAuth = verifyToken(config.auth.jwtSecret, services.users);
  // one budget per user, shared by uploads and chat
  const apiLimiter = new SlidingWindowRateLimiter({ limit: config.apiRateLimitRpm, windowMs: 60_000 });
  const limitPerUser = rateLimit(apiLimiter, (req, res) => res.locals.jwtData?.sub ?? req.ip ?? "anonymous");

  appRouter.use("/auth", createAuthRoutes(services.users, config));
  appRouter.use("/files", createFileRoutes(services, config, requireAuth, limitPerUser));
  appRouter.use("/chat", createChatRoutes(services.chat, config, requireAuth, limitPerUser));
  appRouter.use("/templates", createTemplateRoutes(services.templates, config, requireAuth));

  return appRouter;
};
