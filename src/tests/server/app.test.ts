import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildServer, statusForError } from "../../server/app.js";
import { PromptGateway } from "../../core/gateway/promptGateway.js";
import { Settings } from "../../core/config/settings.js";
import {
  CompletionFailedError,
  ConfigError,
  InvalidApiKeyError,
  NotFoundError,
  PostFailedError,
} from "../../core/errors/index.js";
import type { LLMProvider } from "../../providers/index.js";

function makeSettings(): Settings {
  return new Settings({
    servers: [
      { name: "local", model: "llama3.1", api_type: "ollama", base_api_url: "http://127.0.0.1:1" },
    ],
    endpoints: [
      {
        path: "/summarize",
        template: "summary",
        server: "local",
        system_prompt: "You summarize.",
        user_prompt: "Summarize this.",
      },
      {
        path: "/v1/nested/route",
        template: "nested",
        server: "local",
        system_prompt: "sys",
        user_prompt: "usr",
      },
    ],
  });
}

describe("HTTP server", () => {
  let generate: ReturnType<typeof vi.fn<LLMProvider["generate"]>>;
  let close: ReturnType<typeof vi.fn<LLMProvider["close"]>>;
  let server: ReturnType<typeof buildServer>;
  let closed: boolean;

  beforeEach(() => {
    generate = vi.fn<LLMProvider["generate"]>(async () => ({ text: "A short summary." }));
    close = vi.fn<LLMProvider["close"]>(async () => undefined);
    const gateway = new PromptGateway({
      settings: makeSettings(),
      createProvider: () => ({ name: "Stub", apiType: "ollama", generate, close }),
    });
    server = buildServer({ gateway, logger: false });
    closed = false;
  });

  afterEach(async () => {
    if (!closed) await server.close();
  });

  it("should report health", async () => {
    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", endpoints: 2 });
  });

  it("should list configured endpoints", async () => {
    const res = await server.inject({ method: "GET", url: "/endpoints" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      endpoints: [
        { path: "/summarize", server: "local", template: "summary" },
        { path: "/v1/nested/route", server: "local", template: "nested" },
      ],
      count: 2,
    });
  });

  it("should run an endpoint by path", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/summarize",
      payload: { input: "Some text.", json: true },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.result).toEqual({ text: "A short summary." });
    expect(body.server).toBe("local");
    expect(body.template).toBe("summary");
    expect(generate).toHaveBeenCalledWith(
      "llama3.1",
      "You summarize.",
      "Summarize this.\n\nSome text.",
      true,
    );
  });

  it("should run an endpoint without a body", async () => {
    const res = await server.inject({ method: "POST", url: "/summarize" });

    expect(res.statusCode).toBe(200);
    expect(generate).toHaveBeenCalledWith("llama3.1", "You summarize.", "Summarize this.", false);
  });

  it("should match multi-segment paths", async () => {
    const res = await server.inject({ method: "POST", url: "/v1/nested/route", payload: {} });

    expect(res.statusCode).toBe(200);
    expect(res.json().endpoint).toBe("/v1/nested/route");
  });

  it("should return 404 for an unknown endpoint", async () => {
    const res = await server.inject({ method: "POST", url: "/missing", payload: {} });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Endpoint /missing not found", code: "NOT_FOUND" });
  });

  it("should return 400 for a malformed body", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/summarize",
      payload: { json: "yes" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("INVALID_INPUT");
    expect(generate).not.toHaveBeenCalled();
  });

  it("should return 502 when the backend fails", async () => {
    generate.mockRejectedValueOnce(
      new PostFailedError('Server returned error status 500: {"error":"boom"}', {
        status: 500,
        body: '{"error":"boom"}',
      }),
    );

    const res = await server.inject({ method: "POST", url: "/summarize", payload: {} });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      error: 'POST request failed: Server returned error status 500: {"error":"boom"}',
      code: "POST_FAILED",
    });
  });

  it("should close cached providers when the server closes", async () => {
    await server.inject({ method: "POST", url: "/summarize", payload: {} });
    await server.close();
    closed = true;

    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe("HTTP server with a misconfigured backend", () => {
  let server: ReturnType<typeof buildServer>;

  beforeEach(() => {
    const settings = new Settings({
      servers: [
        {
          name: "cloud",
          model: "gpt-4o-mini",
          api_type: "openai",
          base_api_url: "https://api.example.com",
          secret: "cloud-key",
        },
      ],
      endpoints: [
        {
          path: "/classify",
          template: "classification",
          server: "cloud",
          system_prompt: "You classify.",
          user_prompt: "Classify this.",
        },
        {
          path: "/dangling",
          template: "t",
          server: "ghost",
          system_prompt: "sys",
          user_prompt: "usr",
        },
      ],
    });
    const gateway = new PromptGateway({
      settings,
      createProvider: () => {
        throw new Error("provider should not be created");
      },
    });
    server = buildServer({ gateway, logger: false });
  });

  afterEach(async () => {
    await server.close();
  });

  it("should return 500 without naming the secret when it is missing", async () => {
    const res = await server.inject({ method: "POST", url: "/classify", payload: {} });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: "Server cloud has no usable secret",
      code: "CONFIG_ERROR",
    });
  });

  it("should return 500 when an endpoint names an unknown server", async () => {
    const res = await server.inject({ method: "POST", url: "/dangling", payload: {} });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: "Endpoint /dangling references unknown server ghost",
      code: "CONFIG_ERROR",
    });
  });

  it("should still return 404 for an unknown endpoint", async () => {
    const res = await server.inject({ method: "POST", url: "/nope", payload: {} });

    expect(res.statusCode).toBe(404);
  });
});

describe("statusForError", () => {
  it("should map gateway errors to HTTP status codes", () => {
    expect(statusForError(new NotFoundError("gone"))).toBe(404);
    expect(statusForError(new PostFailedError("down"))).toBe(502);
    expect(statusForError(new CompletionFailedError("No assistant response found"))).toBe(502);
    expect(statusForError(new InvalidApiKeyError("API key cannot be empty"))).toBe(500);
    expect(statusForError(new ConfigError("Server cloud has no usable secret"))).toBe(500);
    expect(statusForError(new Error("other"))).toBe(500);
  });
});
