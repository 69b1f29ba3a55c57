import type { Request, RequestHandler } from "express";
import { UnauthorizedError } from "../lib/errors";
import { asyncRoute } from "../lib/http";
import type { AuthService } from "../modules/auth/services/authService";
import type { AuthUser } from "../modules/auth/types";

const BEARER_RE = /^Bearer\s+(\S+)\s*$/i;

export function requireAuth(
  auth: Pick<AuthService, "authenticate">
): RequestHandler {
  return asyncRoute(async (req, _res, next) => {
    const match = BEARER_RE.exec(req.header("authorization") ?? "");
    if (!match) {
      throw new UnauthorizedError("Not authenticated");
    }
    req.user = await auth.authenticate(match[1]);
    next();
  });
}

export function currentUser(req: Request): AuthUser {
  if (!req.user) {
    throw new UnauthorizedError("Not authenticated");
  }
  return req.user;
}
