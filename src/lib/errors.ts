/**
 * HTTP-facing error taxonomy.
 *
 * Services throw these; the error middleware turns them into
 * `{ detail }` responses with the matching status code.
 */

export type ValidationIssue = {
  path: string;
  message: string;
};

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class ValidationError extends HttpError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super(400, message);
    this.name = "ValidationError";
  }
}

// Duplicate registration is reported as 400, same as any other bad request.
export class ConflictError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = "ConflictError";
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Could not validate credentials") {
    super(401, message);
    this.name = "UnauthorizedError";
  }
}

/**
 * Also used when the resource exists but belongs to someone else:
 * callers must not be able to probe for other users' records.
 */
export class NotFoundError extends HttpError {
  constructor(message = "RFP not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class UnprocessableDocumentError extends HttpError {
  constructor(message = "Could not extract text from RFP file") {
    super(422, message);
    this.name = "UnprocessableDocumentError";
  }
}

/**
 * The upstream message is kept on `cause` for logging only; `message` is
 * what the client sees.
 */
export class UpstreamError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(502, message);
    this.name = "UpstreamError";
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}
