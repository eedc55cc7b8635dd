/**
 * Error taxonomy shared by the transport, the backend adapters and the
 * configuration layer. Every failure carries a stable `code`.
 */
export type GatewayErrorCode =
  | "INVALID_INPUT"
  | "INVALID_API_KEY"
  | "HEADER_CREATION"
  | "CLIENT_CREATION"
  | "POST_FAILED"
  | "PARSE_ERROR"
  | "COMPLETION_FAILED"
  | "UNSUPPORTED_BACKEND"
  | "CONFIG_ERROR"
  | "NOT_FOUND";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(message: string, code: GatewayErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
  }
}

/** Malformed URL or config value, detected before any network call. */
export class InvalidInputError extends GatewayError {
  constructor(detail: string) {
    super(`Invalid input: ${detail}`, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

export class InvalidApiKeyError extends GatewayError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Invalid API key: ${detail}`, "INVALID_API_KEY", options);
    this.name = "InvalidApiKeyError";
  }
}

export class HeaderCreationError extends GatewayError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Header creation error: ${detail}`, "HEADER_CREATION", options);
    this.name = "HeaderCreationError";
  }
}

export class ClientCreationError extends GatewayError {
  constructor(detail: string) {
    super(`Client creation error: ${detail}`, "CLIENT_CREATION");
    this.name = "ClientCreationError";
  }
}

/**
 * Network failure or non-2xx response. `status` and `body` are set when the
 * server answered; `cause` when the request never completed.
 */
export class PostFailedError extends GatewayError {
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(detail: string, options?: { status?: number; body?: string; cause?: unknown }) {
    super(`POST request failed: ${detail}`, "POST_FAILED", { cause: options?.cause });
    this.name = "PostFailedError";
    this.status = options?.status;
    this.body = options?.body;
  }
}

export class ParseError extends GatewayError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Parse error: ${detail}`, "PARSE_ERROR", options);
    this.name = "ParseError";
  }
}

export class CompletionFailedError extends GatewayError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Completion failed: ${detail}`, "COMPLETION_FAILED", options);
    this.name = "CompletionFailedError";
  }
}

export class UnsupportedBackendError extends GatewayError {
  readonly apiType: string;

  constructor(apiType: string, supported: readonly string[]) {
    super(
      `Unsupported backend api_type '${apiType}' (expected one of: ${supported.join(", ")})`,
      "UNSUPPORTED_BACKEND",
    );
    this.name = "UnsupportedBackendError";
    this.apiType = apiType;
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** Message of an unknown thrown value, the way the rest of the code reports it. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
