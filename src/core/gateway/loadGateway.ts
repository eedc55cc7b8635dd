import * as fs from "node:fs/promises";
import * as path from "node:path";
import pino from "pino";
import { z } from "zod";
import { loadAppIdentity } from "../appIdentity.js";
import { Secrets } from "../config/secrets.js";
import { Settings } from "../config/settings.js";
import { PromptGateway } from "./promptGateway.js";

const logger = pino({ name: "gateway-loader" });

const GatewayEnvSchema = z.object({
  SETTINGS_PATH: z.string().min(1).default("config/settings.toml"),
  SECRETS_PATH: z.string().min(1).default("config/secrets.toml"),
});
export type GatewayEnv = z.infer<typeof GatewayEnvSchema>;

export function readGatewayEnv(env: NodeJS.ProcessEnv = process.env): GatewayEnv {
  return GatewayEnvSchema.parse({
    SETTINGS_PATH: env["SETTINGS_PATH"] || undefined,
    SECRETS_PATH: env["SECRETS_PATH"] || undefined,
  });
}

/**
 * Build a PromptGateway from settings.toml and (when present) secrets.toml.
 * Relative paths resolve against the working directory.
 */
export async function loadGatewayFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<PromptGateway> {
  const config = readGatewayEnv(env);
  const settingsPath = path.resolve(process.cwd(), config.SETTINGS_PATH);
  const secretsPath = path.resolve(process.cwd(), config.SECRETS_PATH);

  const settings = await Settings.load(settingsPath);
  logger.info(
    { settingsPath, servers: settings.servers.length, endpoints: settings.endpoints.length },
    "Settings loaded",
  );

  let secrets: Secrets | undefined;
  if (await fileExists(secretsPath)) {
    secrets = await Secrets.load(secretsPath);
    logger.info({ secretsPath }, "Secrets loaded");
  } else {
    logger.warn({ secretsPath }, "No secrets file, servers that need a secret will fail");
  }

  return new PromptGateway({
    settings,
    secrets,
    identity: loadAppIdentity(new URL("../../../package.json", import.meta.url)),
  });
}

async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}
