import type http from "http";
import { Server, type Socket } from "socket.io";
import jwt from "jsonwebtoken";
import cookieParser from "cookie-parser";
import type { AppConfig } from "../config/env.js";
import type { DocumentRecord } from "../types/index.js";
import { COOKIE_NAME } from "./constants.js";
import logger from "./logger.js";

/** Where the document pipeline reports its outcome. */
export interface DocumentEvents {
  documentReady(document: DocumentRecord): void;
  documentFailed(document: DocumentRecord, error: string): void;
}

export const noopDocumentEvents: DocumentEvents = {
  documentReady: () => undefined,
  documentFailed: () => undefined,
};

/** Emits to the owner's room; every socket of a user joins the room named after their id. */
export class SocketDocumentEvents implements DocumentEvents {
  constructor(private readonly io: Server) {}

  documentReady(document: DocumentRecord): void {
    this.io.to(document.userId).emit("document-ready", {
      docId: document.id,
      filename: document.filename,
    });
    logger.debug({ docId: document.id, room: document.userId }, "emitted document-ready");
  }

  documentFailed(document: DocumentRecord, error: string): void {
    this.io.to(document.userId).emit("document-failed", {
      docId: document.id,
      filename: document.filename,
      error,
    });
    logger.debug({ docId: document.id, room: document.userId }, "emitted document-failed");
  }
}

export function parseCookies(header: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of header.split(";")) {
    const [k, ...v] = pair.split("=");
    if (k && v.length > 0) {
      try {
        out[k.trim()] = decodeURIComponent(v.join("=").trim());
      } catch {
        out[k.trim()] = v.join("=").trim();
      }
    }
  }
  return out;
}

export interface HandshakeCredentials {
  /** `socket.handshake.auth` */
  auth: Record<string, unknown>;
  authorizationHeader?: string;
  cookieHeader?: string;
}

/**
 * Resolves the user id behind a handshake: an explicit `auth.token` wins,
 * then a bearer header, then the signed auth cookie. Returns null when none verifies.
 */
export function resolveSocketUserId(
  handshake: HandshakeCredentials,
  secrets: { jwtSecret: string; cookieSecret: string }
): string | null {
  let token: string | undefined;

  const bearer = /^Bearer\s+(\S+)\s*$/i.exec(handshake.authorizationHeader ?? "");

  if (typeof handshake.auth.token === "string" && handshake.auth.token) {
    token = handshake.auth.token;
  } else if (bearer) {
    token = bearer[1];
  } else {
    const raw = parseCookies(handshake.cookieHeader ?? "")[COOKIE_NAME];
    if (raw?.startsWith("s:")) {
      const unsigned = cookieParser.signedCookie(raw, secrets.cookieSecret);
      if (typeof unsigned === "string") token = unsigned;
    }
  }

  if (!token) return null;

  try {
    const decoded = jwt.verify(token, secrets.jwtSecret, { algorithms: ["HS256"] });
    return typeof decoded === "object" && typeof decoded.sub === "string" ? decoded.sub : null;
  } catch {
    return null;
  }
}

/** Attaches socket.io to the HTTP server; call before server.listen(). */
export const initializeWebSocket = (server: http.Server, config: AppConfig): Server => {
  const io = new Server(server, {
    cors: {
      origin: config.server.corsOrigins,
      methods: ["GET", "POST"],
      credentials: true,
    },
  });

  io.use((socket, next) => {
    const userId = resolveSocketUserId(
      {
        auth: socket.handshake.auth,
        authorizationHeader: socket.request.headers.authorization,
        cookieHeader: socket.request.headers.cookie,
      },
      { jwtSecret: config.auth.jwtSecret, cookieSecret: config.auth.cookieSecret }
    );
    if (!userId) {
      logger.debug({ socketId: socket.id }, "socket handshake rejected");
      return next(new Error("Authentication error"));
    }
    socket.data.userId = userId;
    next();
  });

  io.on("connection", (socket: Socket) => {
    const uid: unknown = socket.data.userId;
    if (typeof uid !== "string") {
      socket.disconnect(true);
      return;
    }

    void socket.join(uid);
    logger.debug({ userId: uid, socketId: socket.id }, "WS connected");

    socket.on("disconnect", (reason) =>
      logger.debug({ userId: uid, socketId: socket.id, reason }, "socket disconnected")
    );
  });

  logger.info("WebSocket server ready");
  return io;
};
