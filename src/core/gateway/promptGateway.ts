import pino from "pino";
import { v4 as uuidv4 } from "uuid";
import { createLLMProvider, type GenerateResult, type LLMProvider } from "../../providers/index.js";
import type { AppIdentity } from "../appIdentity.js";
import type { Secrets } from "../config/secrets.js";
import type { Settings } from "../config/settings.js";
import type { ServerConfig } from "../config/settings.schema.js";
import { ConfigError, errorMessage } from "../errors/index.js";

const logger = pino({ name: "prompt-gateway" });

export type ProviderFactory = (
  server: ServerConfig,
  apiKey: string | undefined,
  options: { identity?: AppIdentity },
) => LLMProvider;

export interface PromptGatewayConfig {
  settings: Settings;
  /** Omit when no server references a secret. */
  secrets?: Secrets;
  identity?: AppIdentity;
  /** Defaults to createLLMProvider. */
  createProvider?: ProviderFactory;
}

export interface RunOptions {
  /** Appended to the endpoint's user prompt after a blank line. */
  input?: string;
  json?: boolean;
}

export interface GatewayResponse {
  requestId: string;
  endpoint: string;
  server: string;
  template: string;
  result: GenerateResult;
}

export interface EndpointSummary {
  path: string;
  server: string;
  template: string;
}

/**
 * PromptGateway – routes a configured endpoint path to its backend.
 *
 *   path → endpoint → server → secret → provider → generate
 *
 * One provider is created per server on first use and reused afterwards.
 */
export class PromptGateway {
  private readonly settings: Settings;
  private readonly secrets: Secrets | undefined;
  private readonly identity: AppIdentity | undefined;
  private readonly createProvider: ProviderFactory;
  private readonly providers = new Map<string, LLMProvider>();

  constructor(config: PromptGatewayConfig) {
    this.settings = config.settings;
    this.secrets = config.secrets;
    this.identity = config.identity;
    this.createProvider = config.createProvider ?? createLLMProvider;
  }

  async run(path: string, options: RunOptions = {}): Promise<GatewayResponse> {
    const requestId = uuidv4();
    const endpoint = this.settings.getEndpointByPath(path);
    const server = this.settings.findServerConfig(endpoint.server);
    if (!server) {
      logger.error({ requestId, endpoint: path, server: endpoint.server }, "Unknown server");
      throw new ConfigError(`Endpoint ${path} references unknown server ${endpoint.server}`);
    }
    const provider = this.getProvider(server);

    const userPrompt = options.input
      ? `${endpoint.user_prompt}\n\n${options.input}`
      : endpoint.user_prompt;

    logger.info({ requestId, endpoint: path, server: server.name }, "Generate started");

    try {
      const result = await provider.generate(
        server.model,
        endpoint.system_prompt,
        userPrompt,
        options.json ?? false,
      );
      logger.info({ requestId, endpoint: path }, "Generate completed");
      return { requestId, endpoint: path, server: server.name, template: endpoint.template, result };
    } catch (error) {
      logger.error({ requestId, endpoint: path, error: errorMessage(error) }, "Generate failed");
      throw error;
    }
  }

  listEndpoints(): EndpointSummary[] {
    return this.settings.endpoints.map((e) => ({
      path: e.path,
      server: e.server,
      template: e.template,
    }));
  }

  /** Close every cached provider. */
  async close(): Promise<void> {
    const providers = Array.from(this.providers.values());
    this.providers.clear();
    await Promise.all(providers.map((p) => p.close()));
  }

  private getProvider(server: ServerConfig): LLMProvider {
    const cached = this.providers.get(server.name);
    if (cached) {
      logger.debug({ server: server.name }, "Using cached provider");
      return cached;
    }

    const provider = this.createProvider(server, this.resolveApiKey(server), {
      identity: this.identity,
    });
    this.providers.set(server.name, provider);
    return provider;
  }

  /** A missing secret is a server-side misconfiguration; its name stays in the log. */
  private resolveApiKey(server: ServerConfig): string | undefined {
    if (!server.secret) return undefined;
    const secret = this.secrets?.find(server.secret);
    if (!secret) {
      logger.error({ server: server.name, secret: server.secret }, "Secret not found");
      throw new ConfigError(`Server ${server.name} has no usable secret`);
    }
    return secret.value;
  }
}
