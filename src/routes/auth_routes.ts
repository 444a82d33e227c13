import { Router } from "express";
import type { AppConfig } from "../config/env.js";
import { createUserController } from "../controllers/user_controllers.js";
import type { UserRepository } from "../repositories/user_repository.js";
import { verifyToken } from "../utils/token_manager.js";
import { signupValidator, tokenValidator, validate } from "../utils/validators.js";

export const createAuthRoutes = (users: UserRepository, config: AppConfig) => {
  const authRoutes = Router();
  const { userSignup, userLogin, verifyUser, userLogout } = createUserController(users, config);
  const requireAuth = verifyToken(config.auth.jwtSecret, users);

  authRoutes.post("/signup", validate(signupValidator), userSignup);
  authRoutes.post("/token", validate(tokenValidator), userLogin);
  authRoutes.get("/me", requireAuth, verifyUser);
  authRoutes.post("/logout", requireAuth, userLogout);

  return authRoutes;
};
