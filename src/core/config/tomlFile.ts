import * as fs from "node:fs/promises";
import { parse } from "smol-toml";
import { ZodError, type ZodTypeAny, type z } from "zod";
import { ConfigError, errorMessage } from "../errors/index.js";

/**
 * Read a TOML file and validate it against a schema.
 * Every failure is reported as a ConfigError.
 */
export async function readTomlFile<S extends ZodTypeAny>(
  filepath: string,
  schema: S,
): Promise<z.infer<S>> {
  try {
    await fs.access(filepath);
  } catch {
    throw new ConfigError("Configuration was not found.");
  }

  let contents: string;
  try {
    contents = await fs.readFile(filepath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Unable to read configuration. ${errorMessage(error)}`, { cause: error });
  }

  try {
    return schema.parse(parse(contents));
  } catch (error) {
    const detail = error instanceof ZodError ? formatIssues(error) : errorMessage(error);
    throw new ConfigError(`Unable to parse configuration. ${detail}`, { cause: error });
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
