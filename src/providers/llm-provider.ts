import type { AppIdentity } from "../core/appIdentity.js";

/** Backend tags accepted in `api_type`. */
export const API_TYPES = ["ollama", "openai"] as const;
export type ApiType = (typeof API_TYPES)[number];

/** Normalized completion returned by every backend. */
export interface GenerateResult {
  text: string;
}

/**
 * LLMProvider interface – the one capability callers depend on.
 * Adapters translate it to their wire protocol; callers never reach
 * into adapter-specific fields.
 */
export interface LLMProvider<R extends GenerateResult = GenerateResult> {
  readonly name: string;
  readonly apiType: ApiType;

  /**
   * Generate a completion for a system prompt and a user prompt.
   * `wantJson` asks the backend for JSON output where it supports that.
   */
  generate(model: string, systemPrompt: string, userPrompt: string, wantJson?: boolean): Promise<R>;

  /** Release the underlying connection pool. */
  close(): Promise<void>;
}

export interface ProviderOptions {
  identity?: AppIdentity;
}
