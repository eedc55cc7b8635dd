import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { loadGatewayFromEnv, readGatewayEnv } from "../../core/gateway/loadGateway.js";
import { ConfigError } from "../../core/errors/index.js";

const SETTINGS_TOML = `
[[servers]]
name = "cloud"
model = "gpt-4o-mini"
api_type = "openai"
base_api_url = "https://api.example.com"
secret = "cloud-key"

[[endpoints]]
path = "/classify"
template = "classification"
server = "cloud"
system_prompt = "You classify."
user_prompt = "Classify this."
`;

describe("readGatewayEnv", () => {
  it("should default both paths", () => {
    expect(readGatewayEnv({})).toEqual({
      SETTINGS_PATH: "config/settings.toml",
      SECRETS_PATH: "config/secrets.toml",
    });
  });

  it("should treat empty values as unset", () => {
    expect(readGatewayEnv({ SETTINGS_PATH: "", SECRETS_PATH: "/etc/gw/secrets.toml" })).toEqual({
      SETTINGS_PATH: "config/settings.toml",
      SECRETS_PATH: "/etc/gw/secrets.toml",
    });
  });
});

describe("loadGatewayFromEnv", () => {
  let tempDir: string;
  let settingsPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "gateway-loader-test-"));
    settingsPath = path.join(tempDir, "settings.toml");
    await fs.writeFile(settingsPath, SETTINGS_TOML, "utf-8");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should load settings without a secrets file", async () => {
    const gateway = await loadGatewayFromEnv({
      SETTINGS_PATH: settingsPath,
      SECRETS_PATH: path.join(tempDir, "absent.toml"),
    });

    expect(gateway.listEndpoints()).toEqual([
      { path: "/classify", server: "cloud", template: "classification" },
    ]);
    await expect(gateway.run("/classify")).rejects.toThrow("Server cloud has no usable secret");
    await gateway.close();
  });

  it("should fail when the settings file is missing", async () => {
    await expect(
      loadGatewayFromEnv({ SETTINGS_PATH: path.join(tempDir, "nope.toml") }),
    ).rejects.toThrow(ConfigError);
  });
});
