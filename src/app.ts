import express, { type ErrorRequestHandler } from "express";
import cookieParser from "cookie-parser";
import cors from "cors";
import helmet from "helmet";
import multer from "multer";

/* ─────────── structured logging ─────────── */
import { pinoHttp } from "pino-http";
import { v4 as uuid } from "uuid";
import logger from "./utils/logger.js";
/* ─────────────────────────────────────────── */

import type { AppConfig } from "./config/env.js";
import type { AppServices } from "./services/container.js";
import { createAppRouter } from "./routes/index.js";
import { SERVICE_NAME } from "./utils/constants.js";
import { AppError, PayloadTooLargeError, TooManyRequestsError } from "./utils/errors.js";

const CORS_REJECTION = "Not allowed by CORS";

export const createApp = (services: AppServices, config: AppConfig) => {
  const app = express();

  // -------- CORS allow-list ------------
  const allowed = new Set(config.server.corsOrigins);

  const corsOptions: cors.CorsOptions = {
    origin(origin, cb) {
      // curl / server-to-server calls carry no Origin
      const ok = !origin || allowed.has(origin);
      cb(ok ? null : new Error(CORS_REJECTION), ok);
    },
    credentials: true,
    methods: "GET,POST,PUT,PATCH,DELETE,OPTIONS",
    allowedHeaders: "Content-Type,Authorization",
    exposedHeaders: "X-Request-ID,Retry-After",
  };

  /* middle-ware chain ------------------------------------------------------ */
  app.set("trust proxy", 1);
  app.use(
    pinoHttp({
      logger,
      genReqId: () => uuid(),
      serializers: { res: (res: { statusCode: number }) => ({ statusCode: res.statusCode }) },
      customLogLevel(_req, res, err) {
        if (err || res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    })
  );

  app.use((req, res, next) => {
    res.setHeader("X-Request-ID", String(req.id));
    next();
  });

  app.use(helmet());
  app.use(cors(corsOptions));
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false, limit: "10mb" }));
  app.use(cookieParser(config.auth.cookieSecret));

  /* routes ----------------------------------------------------------------- */
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "healthy", service: SERVICE_NAME });
  });
  app.use("/api/v1", createAppRouter(services, config));

  app.use((_req, res) => {
    res.status(404).json({ message: "Not Found" });
  });

  /* error handlers --------------------------------------------------------- */
  const corsErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
    if (err instanceof Error && err.message === CORS_REJECTION) {
      req.log.warn({ origin: req.headers.origin }, "CORS blocked request");
      return res.status(403).json({ message: "CORS Error: This origin is not allowed." });
    }
    next(err);
  };

  const uploadErrorHandler: ErrorRequestHandler = (err, _req, _res, next) => {
    if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
      return next(
        new PayloadTooLargeError(
          `File size exceeds maximum allowed size (${config.processing.maxFileSize} bytes)`
        )
      );
    }
    if (err instanceof multer.MulterError) {
      return next(new AppError(400, `Upload error: ${err.message}`));
    }
    next(err);
  };

  const appErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
    if (!(err instanceof AppError)) return next(err);

    if (err.statusCode === 401) res.setHeader("WWW-Authenticate", "Bearer");
    if (err instanceof TooManyRequestsError) {
      res.setHeader("Retry-After", String(err.retryAfterSeconds));
    }
    if (err.statusCode >= 500) req.log.error({ err }, err.message);

    return res
      .status(err.statusCode)
      .json(err.details === undefined ? { message: err.message } : { message: err.message, details: err.details });
  };

  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status
  const clientErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (
      typeof err === "object" &&
      err !== null &&
      "type" in err &&
      "status" in err &&
      typeof err.status === "number" &&
      err.status >= 400 &&
      err.status < 500
    ) {
      return res.status(err.status).json({ message: err instanceof Error ? err.message : "Bad Request" });
    }
    next(err);
  };

  const fallbackErrorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    (req.log ?? logger).error({ err }, "Unhandled error");
    res.status(500).json({ message: "Internal Server Error" });
  };

  app.use(corsErrorHandler, uploadErrorHandler, appErrorHandler, clientErrorHandler, fallbackErrorHandler);

  return app;
};
