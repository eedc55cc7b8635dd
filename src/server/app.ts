import Fastify from "fastify";
import { z } from "zod";
import { GatewayError, errorMessage } from "../core/errors/index.js";
import type { PromptGateway } from "../core/gateway/promptGateway.js";

export const RunRequestSchema = z.object({
  input: z.string().optional(),
  json: z.boolean().optional(),
});
export type RunRequest = z.infer<typeof RunRequestSchema>;

export interface ServerOptions {
  gateway: PromptGateway;
  /** Fastify logger; on by default. */
  logger?: boolean;
}

/** HTTP status for a gateway failure. */
export function statusForError(error: unknown): number {
  if (!(error instanceof GatewayError)) return 500;
  switch (error.code) {
    case "NOT_FOUND":
      return 404;
    case "POST_FAILED":
    case "PARSE_ERROR":
    case "COMPLETION_FAILED":
      return 502;
    default:
      return 500;
  }
}

export function buildServer(options: ServerOptions) {
  const { gateway } = options;
  const fastify = Fastify({ logger: options.logger ?? true });

  fastify.addHook("onClose", async () => {
    await gateway.close();
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return {
      status: "ok",
      endpoints: gateway.listEndpoints().length,
      timestamp: new Date().toISOString(),
    };
  });

  // ── GET /endpoints ────────────────────────────────────────────────
  fastify.get("/endpoints", async (_req, reply) => {
    const endpoints = gateway.listEndpoints();
    return reply.code(200).send({ endpoints, count: endpoints.length });
  });

  // ── POST /<endpoint path> ─────────────────────────────────────────
  fastify.post<{ Params: { "*": string } }>("/*", async (req, reply) => {
    const parsed = RunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.message, code: "INVALID_INPUT" });
    }

    const path = `/${req.params["*"]}`;
    try {
      const response = await gateway.run(path, parsed.data);
      return reply.code(200).send(response);
    } catch (error) {
      const code = error instanceof GatewayError ? error.code : "INTERNAL";
      return reply.code(statusForError(error)).send({ error: errorMessage(error), code });
    }
  });

  return fastify;
}
