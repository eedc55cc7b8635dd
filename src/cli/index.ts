#!/usr/bin/env node
import "dotenv/config";
import { loadGatewayFromEnv } from "../core/gateway/loadGateway.js";
import { errorMessage } from "../core/errors/index.js";
import { parseCliArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (!args) {
    console.error('Usage: npm run cli -- <endpoint-path> ["input text"] [--json] [--verbose]');
    process.exit(1);
  }

  const gateway = await loadGatewayFromEnv();

  try {
    const response = await gateway.run(args.path, {
      input: args.input || undefined,
      json: args.json,
    });

    if (args.verbose) {
      console.log("───────────────────────────────────────────────────────");
      console.log(`  Endpoint:   ${response.endpoint}`);
      console.log(`  Server:     ${response.server}`);
      console.log(`  Template:   ${response.template}`);
      console.log(`  Request ID: ${response.requestId}`);
      console.log("───────────────────────────────────────────────────────\n");
      console.log(JSON.stringify(response.result, null, 2));
    } else {
      console.log(response.result.text);
    }
  } catch (error) {
    console.error(`Request failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await gateway.close();
  }
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
