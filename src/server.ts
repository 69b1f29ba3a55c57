import "dotenv/config";
import { createApp } from "./app";
import { ConfigError, loadConfig } from "./config";
import { applySchema, createPool } from "./db";
import { createOpenAIClient } from "./lib/openaiClient";
import { errorContext, logger, setLogLevel } from "./lib/logger";
import { createBcryptHasher } from "./modules/auth/lib/passwords";
import { createTokenService } from "./modules/auth/lib/tokens";
import { AuthService } from "./modules/auth/services/authService";
import { PgUserRepository } from "./modules/auth/services/userRepository";
import { pdfTextExtractor } from "./modules/rfps/lib/textExtractor";
import { OpenAIDraftGenerator } from "./modules/rfps/services/draftGenerator";
import { LocalFileStore } from "./modules/rfps/services/fileStore";
import { PgRfpRepository } from "./modules/rfps/services/rfpRepository";
import { RfpService } from "./modules/rfps/services/rfpService";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const pool = createPool(config);
  await applySchema(pool);

  const auth = new AuthService({
    users: new PgUserRepository(pool),
    hasher: createBcryptHasher(config.auth.bcryptRounds),
    tokens: createTokenService({
      secret: config.auth.jwtSecret,
      ttlMinutes: config.auth.tokenTtlMinutes,
    }),
  });

  const openai = createOpenAIClient(config.openai);
  if (!openai) {
    logger.warn("OPENAI_API_KEY is not set; draft generation will fail");
  }

  const rfps = new RfpService({
    rfps: new PgRfpRepository(pool),
    files: new LocalFileStore(config.uploads.dir),
    extractor: pdfTextExtractor,
    generator: new OpenAIDraftGenerator(openai, {
      model: config.openai.model,
      maxRetries: config.openai.maxRetries,
    }),
  });

  const app = createApp({ config, auth, rfps });

  const server = app.listen(config.http.port, () => {
    logger.info("API listening", {
      url: `http://localhost:${config.http.port}${config.http.basePath}`,
      upload_dir: config.uploads.dir,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("Error closing database pool", errorContext(err));
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error("Invalid configuration", { problems: err.problems });
  } else {
    logger.error("Startup failed", errorContext(err));
  }
  process.exit(1);
});
