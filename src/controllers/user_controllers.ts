import type { CookieOptions, NextFunction, Request, Response } from "express";
import { hash, compare } from "bcrypt";
import type { AppConfig } from "../config/env.js";
import type { UserRepository } from "../repositories/user_repository.js";
import { createToken, currentUserId } from "../utils/token_manager.js";
import { COOKIE_NAME } from "../utils/constants.js";
import { UnauthorizedError } from "../utils/errors.js";

const SALT_ROUNDS = 10;

const readCredentials = (req: Request): { username: string; password: string } => {
  const body: Record<string, unknown> = req.body ?? {};
  return {
    username: typeof body.username === "string" ? body.username.trim() : "",
    password: typeof body.password === "string" ? body.password : "",
  };
};

export const createUserController = (users: UserRepository, config: AppConfig) => {
  const isProduction = config.server.nodeEnv === "production";
  const cookieOptions: CookieOptions = {
    path: "/",
    httpOnly: true,
    secure: isProduction,
    sameSite: isProduction ? "none" : "lax",
    signed: true,
  };

  const userSignup = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = readCredentials(req);
      const passwordHash = await hash(password, SALT_ROUNDS);
      const user = await users.create({ username, passwordHash });

      req.log.info({ userId: user.id }, "User registered");
      return res.status(201).json({ user_id: user.id, username: user.username });
    } catch (error) {
      return next(error);
    }
  };

  const userLogin = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = readCredentials(req);
      const user = await users.findByUsername(username);
      if (!user || !(await compare(password, user.passwordHash))) {
        throw new UnauthorizedError("Incorrect username or password");
      }

      const expiresIn = config.auth.accessTokenExpireMinutes * 60;
      const token = createToken(user, config.auth.jwtSecret, config.auth.accessTokenExpireMinutes);

      res.clearCookie(COOKIE_NAME, cookieOptions);
      res.cookie(COOKIE_NAME, token, {
        ...cookieOptions,
        expires: new Date(Date.now() + expiresIn * 1000),
      });

      return res.status(200).json({ access_token: token, token_type: "bearer", expires_in: expiresIn });
    } catch (error) {
      return next(error);
    }
  };

  const verifyUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await users.findById(currentUserId(res));
      if (!user) throw new UnauthorizedError();
      return res.status(200).json({ user_id: user.id, username: user.username });
    } catch (error) {
      return next(error);
    }
  };

  const userLogout = (_req: Request, res: Response) => {
    res.clearCookie(COOKIE_NAME, cookieOptions);
    return res.status(200).json({ message: "Logged out" });
  };

  return { userSignup, userLogin, verifyUser, userLogout };
};
