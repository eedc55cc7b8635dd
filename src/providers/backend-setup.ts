import pino from "pino";
import type { ServerConfig } from "../core/config/settings.schema.js";
import { InvalidApiKeyError, InvalidInputError, errorMessage } from "../core/errors/index.js";
import { HttpTransport } from "../core/transport/httpTransport.js";
import type { ProviderOptions } from "./llm-provider.js";

const logger = pino({ name: "backend-setup" });

/**
 * Build the transport for one backend server. A non-empty apiKey becomes the
 * bearer Authorization header; a header failure is reported as an API key error.
 */
export function buildTransport(
  server: ServerConfig,
  apiKey: string | undefined,
  options: ProviderOptions = {},
): HttpTransport {
  logger.debug(
    {
      server: server.name,
      connectionTimeout: server.connection_timeout ?? "none",
      deadlineTimeout: server.deadline_timeout ?? "none",
    },
    "Setting transport timeouts",
  );

  const transport = new HttpTransport({
    connectionTimeout: server.connection_timeout,
    deadlineTimeout: server.deadline_timeout,
    identity: options.identity,
  });

  if (apiKey) {
    try {
      transport.addHeader("Authorization", `Bearer ${apiKey}`);
    } catch (error) {
      throw new InvalidApiKeyError(`Failed to add header to transport: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  return transport;
}

/** Parse a server's base URL; only http and https are accepted. */
export function parseBaseUrl(server: ServerConfig): URL {
  let url: URL;
  try {
    url = new URL(server.base_api_url);
  } catch (error) {
    throw new InvalidInputError(
      `Failed to parse base API URL (${server.base_api_url}): ${errorMessage(error)}`,
    );
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidInputError(
      `Failed to parse base API URL (${server.base_api_url}): unsupported protocol ${url.protocol}`,
    );
  }

  return url;
}

/** Resolve an absolute API path against the base URL (replaces any base path). */
export function resolveApiUrl(baseUrl: URL, apiPath: string): URL {
  try {
    return new URL(apiPath, baseUrl);
  } catch (error) {
    throw new InvalidInputError(`Invalid URL: ${errorMessage(error)}`);
  }
}
