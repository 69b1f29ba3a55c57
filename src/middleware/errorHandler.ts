/**
 * Error handler middleware
 *
 * Maps the HttpError taxonomy to `{ detail }` JSON. Anything unrecognised is
 * logged with its stack and answered with a generic 500.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { MulterError } from "multer";
import { HttpError, ValidationError } from "../lib/errors";
import { errorContext, logger } from "../lib/logger";

export type ErrorResponse = {
  detail: string;
  issues?: { path: string; message: string }[];
};

function hasType(err: unknown, type: string): boolean {
  return (
    typeof err === "object" && err !== null && "type" in err && err.type === type
  );
}

// body-parser and multer report their own failures; fold them into ValidationError
function normalize(err: unknown): unknown {
  if (err instanceof MulterError) {
    return new ValidationError(
      err.code === "LIMIT_FILE_SIZE" ? "File too large" : err.message
    );
  }
  if (hasType(err, "entity.parse.failed")) {
    return new ValidationError("Malformed request body");
  }
  if (hasType(err, "entity.too.large")) {
    return new ValidationError("Request body too large");
  }
  return err;
}

export const errorHandler: ErrorRequestHandler = (rawErr, req, res, next) => {
  if (res.headersSent) {
    next(rawErr);
    return;
  }

  const err = normalize(rawErr);

  if (err instanceof HttpError) {
    const log = err.status >= 500 ? logger.error : logger.debug;
    log("Request failed", {
      status: err.status,
      path: req.path,
      method: req.method,
      ...errorContext(err),
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    });

    if (err.status === 401) {
      res.setHeader("WWW-Authenticate", "Bearer");
    }

    const body: ErrorResponse = { detail: err.message };
    if (err instanceof ValidationError && err.issues.length > 0) {
      body.issues = err.issues;
    }
    res.status(err.status).json(body);
    return;
  }

  logger.error("Unhandled error", {
    path: req.path,
    method: req.method,
    ...errorContext(err),
  });
  res.status(500).json({ detail: "Internal server error" } satisfies ErrorResponse);
};

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ detail: "Not Found" } satisfies ErrorResponse);
};
