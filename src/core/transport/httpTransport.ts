import { validateHeaderName, validateHeaderValue } from "node:http";
import pino from "pino";
import { Agent, fetch, type Response } from "undici";
import { DEFAULT_APP_IDENTITY, userAgentFor, type AppIdentity } from "../appIdentity.js";
import {
  ClientCreationError,
  HeaderCreationError,
  ParseError,
  PostFailedError,
  errorMessage,
} from "../errors/index.js";

const logger = pino({ name: "http-transport" });

export interface HttpTransportOptions {
  /** Seconds allowed for the TCP/TLS connect. */
  connectionTimeout?: number;
  /** Seconds allowed for the whole request, body transfer included. */
  deadlineTimeout?: number;
  identity?: AppIdentity;
}

/**
 * Immutable snapshot used by `post`. Header changes build a new one.
 */
interface HttpClient {
  readonly headers: Readonly<Record<string, string>>;
  readonly deadlineMs: number | undefined;
}

/**
 * HttpTransport – JSON-over-HTTP POST client shared by every backend adapter.
 *
 *   • addHeader(name, value) – validate, store, rebuild the client snapshot
 *   • post(url, payload)     – send JSON, return the parsed JSON response
 *   • close()                – release pooled connections
 *
 * Redirects are never followed.
 */
export class HttpTransport {
  private headerMap: Map<string, string>;
  private client: HttpClient;
  private readonly dispatcher: Agent;
  private readonly deadlineMs: number | undefined;

  constructor(options: HttpTransportOptions = {}) {
    const connectMs = toMilliseconds("connection", options.connectionTimeout);
    this.deadlineMs = toMilliseconds("deadline", options.deadlineTimeout);

    this.dispatcher = createAgent(connectMs);

    this.headerMap = new Map([
      ["content-type", "application/json"],
      ["user-agent", userAgentFor(options.identity ?? DEFAULT_APP_IDENTITY)],
    ]);
    this.client = this.buildClient(this.headerMap);
  }

  /** Headers the next request will carry, keyed by lower-cased name. */
  get headers(): Readonly<Record<string, string>> {
    return this.client.headers;
  }

  /**
   * Add or overwrite a default header. Throws HeaderCreationError on an
   * invalid name or value and keeps the previous client in that case.
   */
  addHeader(name: string, value: string): this {
    try {
      validateHeaderName(name);
    } catch (error) {
      throw new HeaderCreationError(`Invalid header name \`${name}\`: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      validateHeaderValue(name, value);
    } catch (error) {
      throw new HeaderCreationError(`Invalid header value for \`${name}\`: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const next = new Map(this.headerMap);
    next.set(name.toLowerCase(), value);

    this.client = this.buildClient(next);
    this.headerMap = next;
    return this;
  }

  async post(url: URL, payload: unknown): Promise<unknown> {
    const client = this.client;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: client.headers,
        body: JSON.stringify(payload),
        redirect: "manual",
        dispatcher: this.dispatcher,
        signal: client.deadlineMs === undefined ? undefined : AbortSignal.timeout(client.deadlineMs),
      });
    } catch (error) {
      throw new PostFailedError(`HTTP POST error: ${describeFailure(error, client)}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new PostFailedError(`Error reading response body: ${describeFailure(error, client)}`, {
        cause: error,
      });
    }

    logger.info({ url: url.toString(), status: response.status }, "Response status");

    if (!response.ok) {
      throw new PostFailedError(`Server returned error status ${response.status}: ${text}`, {
        status: response.status,
        body: text,
      });
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new ParseError(`Failed to parse JSON response: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private buildClient(headers: ReadonlyMap<string, string>): HttpClient {
    return Object.freeze({
      headers: Object.freeze(Object.fromEntries(headers)),
      deadlineMs: this.deadlineMs,
    });
  }
}

function createAgent(connectMs: number | undefined): Agent {
  try {
    return new Agent(connectMs === undefined ? {} : { connect: { timeout: connectMs } });
  } catch (error) {
    throw new ClientCreationError(`Failed to create HTTP client: ${errorMessage(error)}`);
  }
}

function toMilliseconds(label: string, seconds: number | undefined): number | undefined {
  if (seconds === undefined) return undefined;
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ClientCreationError(`Invalid ${label} timeout: ${seconds}`);
  }
  return seconds * 1000;
}

function describeFailure(error: unknown, client: HttpClient): string {
  if (error instanceof Error && error.name === "TimeoutError" && client.deadlineMs !== undefined) {
    return `request exceeded deadline of ${client.deadlineMs / 1000}s`;
  }
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}
