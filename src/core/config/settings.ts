import { NotFoundError } from "../errors/index.js";
import {
  SettingsFileSchema,
  type Endpoint,
  type EndpointConfig,
  type ServerConfig,
  type SettingsFile,
} from "./settings.schema.js";
import { readTomlFile } from "./tomlFile.js";

/**
 * Servers and endpoints loaded from settings.toml.
 *
 * ```toml
 * [[servers]]
 * name = "local"
 * model = "llama3.1"
 * api_type = "ollama"
 * base_api_url = "http://localhost:11434"
 *
 * [[endpoints]]
 * path = "/summarize"
 * template = "summary"
 * server = "local"
 * system_prompt = "..."
 * user_prompt = "..."
 * ```
 */
export class Settings {
  readonly servers: readonly ServerConfig[];
  readonly endpoints: readonly EndpointConfig[];

  constructor(file: SettingsFile) {
    this.servers = file.servers;
    this.endpoints = file.endpoints;
  }

  static async load(filepath: string): Promise<Settings> {
    return new Settings(await readTomlFile(filepath, SettingsFileSchema));
  }

  getEndpointByPath(path: string): Endpoint {
    const endpoint = this.endpoints.find((e) => e.path === path);
    if (!endpoint) {
      throw new NotFoundError(`Endpoint ${path} not found`);
    }
    const { path: _path, ...rest } = endpoint;
    return rest;
  }

  findServerConfig(name: string): ServerConfig | undefined {
    return this.servers.find((s) => s.name === name);
  }

  getServerConfigByName(name: string): ServerConfig {
    const server = this.findServerConfig(name);
    if (!server) {
      throw new NotFoundError(`Server ${name} not found`);
    }
    return server;
  }
}
