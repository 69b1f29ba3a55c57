import OpenAI from "openai";
import type { AppConfig } from "../config";

/**
 * Returns null when no key is configured so the server can still boot;
 * draft generation then fails with a 502 instead.
 */
export function createOpenAIClient(config: AppConfig["openai"]): OpenAI | null {
  if (!config.apiKey) {
    return null;
  }
  return new OpenAI({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    // retries are ours (see draftGenerator), the SDK would also retry 429s
    maxRetries: 0,
  });
}
