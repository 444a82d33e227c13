import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import type { UserRepository } from "../repositories/user_repository.js";
import type { JwtData } from "../types/index.js";
import { COOKIE_NAME } from "./constants.js";
import { UnauthorizedError } from "./errors.js";

export const createToken = (
  user: { id: string; username: string },
  secret: string,
  expiresInMinutes: number
): string => {
  const payload: JwtData = { sub: user.id, username: user.username };
  return jwt.sign(payload, secret, { algorithm: "HS256", expiresIn: expiresInMinutes * 60 });
};

/** Decodes and checks a token; null for anything that is not a valid access token. */
export const decodeToken = (token: string, secret: string): JwtData | null => {
  try {
    const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
    if (typeof decoded !== "object" || typeof decoded.sub !== "string") return null;
    return {
      sub: decoded.sub,
      username: typeof decoded.username === "string" ? decoded.username : "",
    };
  } catch {
    return null;
  }
};

/** Bearer header first, then the signed auth cookie. */
export const readToken = (req: Request): string | undefined => {
  const match = /^Bearer\s+(\S+)\s*$/i.exec(req.headers.authorization ?? "");
  if (match) return match[1];

  const cookies: Record<string, unknown> = req.signedCookies ?? {};
  const cookie = cookies[COOKIE_NAME];
  return typeof cookie === "string" && cookie.trim() !== "" ? cookie : undefined;
};

/**
 * Guards a route: the caller must present a valid token for a user that
 * still exists. Fills `res.locals.jwtData` and tags `req.log` with the user id.
 */
export const verifyToken = (secret: string, users: UserRepository) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = readToken(req);
      const data = token ? decodeToken(token, secret) : null;
      if (!data) throw new UnauthorizedError();

      const user = await users.findById(data.sub);
      if (!user) throw new UnauthorizedError();

      res.locals.jwtData = { sub: user.id, username: user.username };
      req.log = req.log.child({ userId: user.id });
      return next();
    } catch (error) {
      return next(error);
    }
  };
};

/** User id of the authenticated caller; only valid behind verifyToken. */
export const currentUserId = (res: Response): string => {
  const data = res.locals.jwtData;
  if (!data) throw new UnauthorizedError();
  return data.sub;
};
