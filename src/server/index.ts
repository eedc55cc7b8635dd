import "dotenv/config";
import { buildServer } from "./app.js";
import { loadGatewayFromEnv } from "../index.js";

const PORT = parseInt(process.env["PORT"] ?? "3100", 10);
const HOST = process.env["HOST"] ?? "0.0.0.0";

async function main(): Promise<void> {
  const gateway = await loadGatewayFromEnv();
  const server = buildServer({ gateway });

  try {
    await server.listen({ port: PORT, host: HOST });
    console.log(`prompt-gateway listening on http://${HOST}:${PORT}`);
    for (const endpoint of gateway.listEndpoints()) {
      console.log(`   POST ${endpoint.path} → ${endpoint.server}`);
    }
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
