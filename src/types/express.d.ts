import type { JwtData } from "./index.js";

declare global {
  namespace Express {
    interface Locals {
      /** Set by verifyToken once the bearer token or auth cookie checks out. */
      jwtData?: JwtData;
    }
  }
}

export {};
