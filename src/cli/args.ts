/** Parsed `prompt-gateway <endpoint-path> [input…] [--json] [--verbose]`. */
export interface CliArgs {
  path: string;
  input: string;
  json: boolean;
  verbose: boolean;
}

const FLAGS = new Set(["--json", "--verbose", "-v"]);

/**
 * Only the known flags are consumed; any other word, `-5` included, is input.
 * Everything after `--` is input.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs | null {
  const flags = new Set<string>();
  const positional: string[] = [];
  let flagsEnded = false;

  for (const arg of argv) {
    if (!flagsEnded && arg === "--") {
      flagsEnded = true;
    } else if (!flagsEnded && FLAGS.has(arg)) {
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  const [rawPath, ...rest] = positional;
  if (!rawPath) return null;

  return {
    path: rawPath.startsWith("/") ? rawPath : `/${rawPath}`,
    input: rest.join(" "),
    json: flags.has("--json"),
    verbose: flags.has("--verbose") || flags.has("-v"),
  };
}
