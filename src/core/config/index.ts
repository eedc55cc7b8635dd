export { Settings } from "./settings.js";
export { Secrets } from "./secrets.js";
export { readTomlFile } from "./tomlFile.js";
export {
  ServerConfigSchema,
  EndpointConfigSchema,
  SettingsFileSchema,
  SecretsFileSchema,
  type ServerConfig,
  type EndpointConfig,
  type Endpoint,
  type SettingsFile,
  type Secret,
  type SecretsFile,
} from "./settings.schema.js";
