import { describe, it, expect } from "vitest";
import * as gateway from "../index.js";

describe("package entry point", () => {
  it("should expose the gateway, config loaders and backend factory", () => {
    expect(typeof gateway.PromptGateway).toBe("function");
    expect(typeof gateway.Settings.load).toBe("function");
    expect(typeof gateway.Secrets.load).toBe("function");
    expect(typeof gateway.readTomlFile).toBe("function");
    expect(typeof gateway.createLLMProvider).toBe("function");
    expect(gateway.API_TYPES).toEqual(["ollama", "openai"]);
  });
});
