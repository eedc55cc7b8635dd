import pino from "pino";
import { z } from "zod";
import type { ServerConfig } from "../core/config/settings.schema.js";
import { CompletionFailedError, InvalidApiKeyError } from "../core/errors/index.js";
import type { HttpTransport } from "../core/transport/httpTransport.js";
import { buildTransport, parseBaseUrl, resolveApiUrl } from "./backend-setup.js";
import type { GenerateResult, LLMProvider, ProviderOptions } from "./llm-provider.js";

const logger = pino({ name: "openai-llm" });

const CHAT_COMPLETIONS_PATH = "/v1/chat/completions";

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      index: z.number().int(),
      message: z.object({
        role: z.string(),
        content: z.string(),
      }),
    }),
  ),
});

/**
 * OpenAI-compatible provider – any server exposing `/v1/chat/completions`.
 *
 * An API key is required; there is no anonymous mode.
 */
export class OpenAILLM implements LLMProvider {
  readonly name: string;
  readonly apiType = "openai" as const;
  private readonly transport: HttpTransport;
  private readonly baseUrl: URL;

  constructor(server: ServerConfig, apiKey: string | undefined, options?: ProviderOptions) {
    if (!apiKey) {
      throw new InvalidApiKeyError("API key cannot be empty");
    }

    this.baseUrl = parseBaseUrl(server);
    this.transport = buildTransport(server, apiKey, options);
    this.name = `OpenAI/${server.name}`;
  }

  /**
   * `wantJson` is accepted but not sent.
   * TODO: map it to response_format once JSON mode is agreed for OpenAI-compatible servers.
   */
  async generate(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    wantJson = false,
  ): Promise<GenerateResult> {
    return { text: await this.chatCompletion(model, systemPrompt, userPrompt, wantJson) };
  }

  /** Content of the first assistant message in the response. */
  async chatCompletion(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    wantJson = false,
  ): Promise<string> {
    const url = resolveApiUrl(this.baseUrl, CHAT_COMPLETIONS_PATH);
    const request: ChatCompletionRequest = {
      model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    };

    logger.debug({ provider: this.name, model, wantJson }, "Sending chat completion request");
    const body = await this.transport.post(url, request);

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CompletionFailedError(
        `Failed to parse chat completion response: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }

    const choice = parsed.data.choices.find((c) => c.message.role === "assistant");
    if (!choice) {
      throw new CompletionFailedError("No assistant response found");
    }

    return choice.message.content;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}
