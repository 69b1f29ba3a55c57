import type { AuthUser } from "../modules/auth/types";

declare global {
  namespace Express {
    interface Request {
      // set by requireAuth
      user?: AuthUser;
    }
  }
}

export {};
