import { z } from "zod";

// ── Backend server ────────────────────────────────────────────────────
export const ServerConfigSchema = z.object({
  /** Unique server name, referenced by endpoints */
  name: z.string().min(1),
  /** Model passed to the backend on every call */
  model: z.string().min(1),
  /** Backend tag, resolved by createLLMProvider */
  api_type: z.string().min(1),
  /** Parsed by the adapter (InvalidInputError on failure) */
  base_api_url: z.string(),
  /** Name of the entry in secrets.toml holding the bearer token */
  secret: z.string().min(1).optional(),
  /** Seconds */
  connection_timeout: z.number().int().nonnegative().optional(),
  /** Seconds */
  deadline_timeout: z.number().int().nonnegative().optional(),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ── Endpoint ──────────────────────────────────────────────────────────
export const EndpointConfigSchema = z.object({
  path: z.string().min(1).startsWith("/", "Endpoint path must start with '/'"),
  template: z.string(),
  server: z.string().min(1),
  system_prompt: z.string(),
  user_prompt: z.string(),
});
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;

/** What callers see of an endpoint once it has been matched by path. */
export type Endpoint = Omit<EndpointConfig, "path">;

// ── settings.toml ─────────────────────────────────────────────────────
export const SettingsFileSchema = z
  .object({
    servers: z.array(ServerConfigSchema),
    endpoints: z.array(EndpointConfigSchema),
  })
  .superRefine((file, ctx) => {
    const names = new Set(file.servers.map((s) => s.name));
    file.endpoints.forEach((endpoint, index) => {
      if (!names.has(endpoint.server)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["endpoints", index, "server"],
          message: `Unknown server '${endpoint.server}'`,
        });
      }
    });
  });
export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// ── secrets.toml ──────────────────────────────────────────────────────
export const SecretSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});
export type Secret = z.infer<typeof SecretSchema>;

export const SecretsFileSchema = z.object({
  secret: z.array(SecretSchema),
});
export type SecretsFile = z.infer<typeof SecretsFileSchema>;
