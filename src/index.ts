export * from "./providers/index.js";
export * from "./core/config/index.js";
export * from "./core/errors/index.js";
export { HttpTransport, type HttpTransportOptions } from "./core/transport/httpTransport.js";
export {
  DEFAULT_APP_IDENTITY,
  loadAppIdentity,
  userAgentFor,
  type AppIdentity,
} from "./core/appIdentity.js";
export {
  PromptGateway,
  type EndpointSummary,
  type GatewayResponse,
  type PromptGatewayConfig,
  type ProviderFactory,
  type RunOptions,
} from "./core/gateway/promptGateway.js";
export { loadGatewayFromEnv, readGatewayEnv, type GatewayEnv } from "./core/gateway/loadGateway.js";
