import { Router } from "express";
import { asyncRoute } from "../../../lib/http";
import { parseOrThrow } from "../../../lib/validation";
import type { AuthService } from "../services/authService";
import { loginSchema, registerSchema } from "../validators";

export function createAuthRouter(auth: AuthService): Router {
  const router = Router();

  // POST /register -> create account, returns { id, email }
  router.post(
    "/register",
    asyncRoute(async (req, res) => {
      const body = parseOrThrow(registerSchema, req.body);
      const user = await auth.register(body);
      res.json(user);
    })
  );

  // POST /login -> password grant; username carries the email
  router.post(
    "/login",
    asyncRoute(async (req, res) => {
      const { username, password } = parseOrThrow(loginSchema, req.body);
      res.json(await auth.login(username, password));
    })
  );

  return router;
}
