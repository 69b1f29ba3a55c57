// src/config/index.ts
// Reads the environment once at startup. Everything downstream receives the
// resulting AppConfig instead of touching process.env.

import path from "path";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../lib/logger";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string({
    required_error: "DATABASE_URL is missing. Check your .env file.",
  }),
  JWT_SECRET: z
    .string({ required_error: "JWT_SECRET is missing. Check your .env file." })
    .min(32, "JWT_SECRET must be at least 32 characters"),
  JWT_EXPIRES_MINUTES: intFromEnv(60),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: intFromEnv(60_000),
  OPENAI_MAX_RETRIES: intFromEnv(2),
  UPLOAD_DIR: z.string().min(1).default(path.join("data", "uploads")),
  MAX_UPLOAD_BYTES: intFromEnv(25 * 1024 * 1024),
  CORS_ORIGIN: z.string().min(1).default("http://localhost:3000"),
  API_BASE_PATH: z
    .string()
    .default("")
    .refine((v) => v === "" || (v.startsWith("/") && !v.endsWith("/")), {
      message: "API_BASE_PATH must be empty or look like /api",
    }),
  BCRYPT_ROUNDS: intFromEnv(12),
  PORT: intFromEnv(3001),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = {
  databaseUrl: string;
  logLevel: LogLevel;
  auth: {
    jwtSecret: string;
    tokenTtlMinutes: number;
    bcryptRounds: number;
  };
  openai: {
    apiKey: string | null;
    model: string;
    timeoutMs: number;
    maxRetries: number;
  };
  uploads: {
    dir: string;
    maxBytes: number;
  };
  http: {
    port: number;
    corsOrigin: string;
    basePath: string;
  };
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  // Treat blank values in .env as unset so defaults apply
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === "string" && v.trim() !== "") cleaned[k] = v.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === "production" ? "info" : "debug"),
    auth: {
      jwtSecret: e.JWT_SECRET,
      tokenTtlMinutes: e.JWT_EXPIRES_MINUTES,
      bcryptRounds: e.BCRYPT_ROUNDS,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY ?? null,
      model: e.OPENAI_MODEL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
      maxRetries: e.OPENAI_MAX_RETRIES,
    },
    uploads: {
      dir: path.resolve(cwd, e.UPLOAD_DIR),
      maxBytes: e.MAX_UPLOAD_BYTES,
    },
    http: {
      port: e.PORT,
      corsOrigin: e.CORS_ORIGIN,
      basePath: e.API_BASE_PATH,
    },
  };
}
