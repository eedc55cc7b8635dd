import pino from "pino";
import { z } from "zod";
import type { ServerConfig } from "../core/config/settings.schema.js";
import { ParseError } from "../core/errors/index.js";
import type { HttpTransport } from "../core/transport/httpTransport.js";
import { buildTransport, parseBaseUrl, resolveApiUrl } from "./backend-setup.js";
import type { GenerateResult, LLMProvider, ProviderOptions } from "./llm-provider.js";

const logger = pino({ name: "ollama-llm" });

const GENERATE_PATH = "/api/generate";
const EMBEDDINGS_PATH = "/api/embeddings";
const TEMPERATURE = 0.3;
const KEEP_ALIVE = "10m";
const JSON_FORMAT = "json";

// ── Wire shapes ───────────────────────────────────────────────────────
interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system: string;
  raw: false;
  stream: false;
  temperature: number;
  format?: string;
  keep_alive: string;
}

const counter = z.number().int().nonnegative().nullish();

const OllamaGenerateResponseSchema = z.object({
  model: z.string(),
  created_at: z.string(),
  response: z.string(),
  done: z.boolean(),
  done_reason: z.string().nullish(),
  context: z.array(z.number().int()).nullish(),
  total_duration: counter,
  load_duration: counter,
  prompt_eval_count: counter,
  prompt_eval_duration: counter,
  eval_count: counter,
  eval_duration: counter,
});

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

/** Completion plus the timing and token counters the backend reports. */
export interface OllamaGenerateResult extends GenerateResult {
  model: string;
  createdAt: string;
  done: boolean;
  doneReason?: string;
  context: number[];
  /** Nanoseconds */
  totalDuration?: number;
  loadDuration?: number;
  promptEvalCount?: number;
  promptEvalDuration?: number;
  evalCount?: number;
  evalDuration?: number;
}

/**
 * Ollama provider – talks to a self-hosted `/api/generate` endpoint.
 *
 * The API key is optional: without one no Authorization header is sent.
 */
export class OllamaLLM implements LLMProvider<OllamaGenerateResult> {
  readonly name: string;
  readonly apiType = "ollama" as const;
  private readonly transport: HttpTransport;
  private readonly baseUrl: URL;

  constructor(server: ServerConfig, apiKey?: string, options?: ProviderOptions) {
    this.baseUrl = parseBaseUrl(server);
    this.transport = buildTransport(server, apiKey, options);
    this.name = `Ollama/${server.name}`;
  }

  async generate(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    wantJson = false,
  ): Promise<OllamaGenerateResult> {
    const url = resolveApiUrl(this.baseUrl, GENERATE_PATH);
    const request: OllamaGenerateRequest = {
      model,
      prompt: userPrompt,
      system: systemPrompt,
      raw: false,
      stream: false,
      temperature: TEMPERATURE,
      ...(wantJson ? { format: JSON_FORMAT } : {}),
      keep_alive: KEEP_ALIVE,
    };

    logger.debug({ provider: this.name, model, wantJson }, "Sending generate request");
    const body = await this.transport.post(url, request);

    const parsed = OllamaGenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Failed to parse generate response: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    return {
      text: data.response,
      model: data.model,
      createdAt: data.created_at,
      done: data.done,
      doneReason: data.done_reason ?? undefined,
      context: data.context ?? [],
      totalDuration: data.total_duration ?? undefined,
      loadDuration: data.load_duration ?? undefined,
      promptEvalCount: data.prompt_eval_count ?? undefined,
      promptEvalDuration: data.prompt_eval_duration ?? undefined,
      evalCount: data.eval_count ?? undefined,
      evalDuration: data.eval_duration ?? undefined,
    };
  }

  /** Embedding vector for a piece of text. */
  async embed(model: string, text: string): Promise<number[]> {
    const url = resolveApiUrl(this.baseUrl, EMBEDDINGS_PATH);
    const body = await this.transport.post(url, { model, prompt: text });

    const parsed = OllamaEmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Failed to parse embeddings response: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data.embedding;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}
