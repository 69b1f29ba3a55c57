import cors from "cors";
import express, { Router, type Express } from "express";
import type { AppConfig } from "./config";
import { requireAuth } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createAuthRouter } from "./modules/auth/routes";
import type { AuthService } from "./modules/auth/services/authService";
import { createRfpsRouter } from "./modules/rfps/routes";
import type { RfpService } from "./modules/rfps/services/rfpService";

export type AppDeps = {
  config: Pick<AppConfig, "http" | "uploads">;
  auth: AuthService;
  rfps: RfpService;
};

export function createApp({ config, auth, rfps }: AppDeps): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(
    cors({
      // a list, so other origins get no Access-Control-Allow-Origin at all
      origin: [config.http.corsOrigin],
      credentials: true,
    })
  );
  app.use(express.json({ limit: "2mb" }));
  // /login takes an OAuth2-style password form
  app.use(express.urlencoded({ extended: false }));

  const api = Router();

  // Health
  api.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  api.use(createAuthRouter(auth));
  api.use(
    createRfpsRouter({
      rfps,
      requireAuth: requireAuth(auth),
      maxUploadBytes: config.uploads.maxBytes,
    })
  );

  app.use(config.http.basePath || "/", api);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
