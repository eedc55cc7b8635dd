/**
 * Provider factory – maps a server's `api_type` to its backend adapter.
 *
 *   "ollama" → OllamaLLM  (API key optional)
 *   "openai" → OpenAILLM  (API key required)
 *
 * Any other tag fails with UnsupportedBackendError; there is no default.
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider(server, apiKey);
 */
export { OllamaLLM, type OllamaGenerateResult } from "./ollama-llm.js";
export { OpenAILLM } from "./openai-llm.js";
export { API_TYPES } from "./llm-provider.js";
export type { ApiType, GenerateResult, LLMProvider, ProviderOptions } from "./llm-provider.js";

import type { ServerConfig } from "../core/config/settings.schema.js";
import { UnsupportedBackendError } from "../core/errors/index.js";
import { API_TYPES, type ApiType, type LLMProvider, type ProviderOptions } from "./llm-provider.js";
import { OllamaLLM } from "./ollama-llm.js";
import { OpenAILLM } from "./openai-llm.js";

export function isApiType(value: string): value is ApiType {
  return API_TYPES.some((apiType) => apiType === value);
}

export function createLLMProvider(
  server: ServerConfig,
  apiKey?: string,
  options?: ProviderOptions,
): LLMProvider {
  const apiType = server.api_type;
  if (!isApiType(apiType)) {
    throw new UnsupportedBackendError(apiType, API_TYPES);
  }

  switch (apiType) {
    case "ollama":
      return new OllamaLLM(server, apiKey, options);
    case "openai":
      return new OpenAILLM(server, apiKey, options);
    default: {
      const unreachable: never = apiType;
      throw new UnsupportedBackendError(unreachable, API_TYPES);
    }
  }
}
