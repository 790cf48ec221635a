import OpenAI, { APIError, APIUserAbortError } from "openai";
import { OpenAIConfig } from "../config/app.config";

export function createOpenAIClient(config: OpenAIConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  return error instanceof APIUserAbortError || Boolean(signal?.aborted);
}

export function describeOpenAIError(error: unknown): string {
  if (error instanceof APIError) {
    return error.status ? `OpenAI responded with ${error.status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
