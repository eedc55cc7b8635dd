import * as fs from "node:fs";
import { z } from "zod";

/**
 * Name and version sent in the user agent of every backend request.
 * Read once at startup by the server and CLI.
 */
export interface AppIdentity {
  readonly name: string;
  readonly version: string;
}

export const DEFAULT_APP_IDENTITY: AppIdentity = Object.freeze({
  name: "prompt-gateway",
  version: "0.0.0",
});

const PackageManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

export function userAgentFor(identity: AppIdentity): string {
  return `${identity.name} ${identity.version}`;
}

/** Read name/version from a package.json, falling back to the defaults. */
export function loadAppIdentity(manifestUrl: URL): AppIdentity {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(manifestUrl, "utf-8"));
    const parsed = PackageManifestSchema.safeParse(raw);
    if (!parsed.success) return DEFAULT_APP_IDENTITY;
    return Object.freeze({ name: parsed.data.name, version: parsed.data.version });
  } catch {
    return DEFAULT_APP_IDENTITY;
  }
}
