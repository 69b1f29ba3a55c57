import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import { UpstreamError } from "../../../lib/errors";
import { errorContext, logger } from "../../../lib/logger";
import { withRetry } from "../../../lib/retry";
import type { ChatMessage } from "../prompts/executive_summary_v1";

export interface DraftGenerator {
  complete(messages: ChatMessage[]): Promise<string>;
}

/**
 * Worth another attempt: the request never got a response, or the server
 * failed. Any 4xx (429 included) is final.
 */
export function isTransientGeneratorError(err: unknown): boolean {
  if (err instanceof APIConnectionError) return true;
  if (err instanceof APIError) {
    return typeof err.status === "number" && err.status >= 500;
  }
  return false;
}

/** Client-facing message; upstream detail stays in the logs. */
export function describeGeneratorFailure(err: unknown): string {
  if (err instanceof APIConnectionTimeoutError) {
    return "Draft generation timed out";
  }
  if (err instanceof APIError && err.status === 429) {
    return "Draft generator is busy, try again later";
  }
  return "Draft generation failed";
}

type OpenAIDraftGeneratorOptions = {
  model: string;
  maxRetries: number;
  retryDelayMs?: number;
};

export class OpenAIDraftGenerator implements DraftGenerator {
  constructor(
    private readonly client: OpenAI | null,
    private readonly opts: OpenAIDraftGeneratorOptions
  ) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new UpstreamError("Draft generator is not configured");
    }

    let text: string;
    try {
      text = await withRetry(
        async () => {
          const completion = await client.chat.completions.create({
            model: this.opts.model,
            messages,
          });
          return completion.choices?.[0]?.message?.content ?? "";
        },
        {
          retries: this.opts.maxRetries,
          delayMs: this.opts.retryDelayMs,
          shouldRetry: isTransientGeneratorError,
          onRetry: (err, attempt) =>
            logger.warn("Draft generator retry", {
              attempt,
              model: this.opts.model,
              ...errorContext(err),
            }),
        }
      );
    } catch (err) {
      throw new UpstreamError(describeGeneratorFailure(err), { cause: err });
    }

    if (!text.trim()) {
      throw new UpstreamError("Draft generator returned an empty response");
    }
    return text;
  }
}
