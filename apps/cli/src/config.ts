export type OutputFormat = "text" | "json";

export interface CliConfig {
  /** Result line format; `--json` overrides it per run. */
  output: OutputFormat;
  /** Trace parsed hands on stderr. */
  verbose: boolean;
}

function envStr(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return (env[key] ?? "").trim() || fallback;
}

function envBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes";
}

function isOutputFormat(v: string): v is OutputFormat {
  return v === "text" || v === "json";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const output = envStr(env, "WILDHAND_OUTPUT", "text").toLowerCase();
  if (!isOutputFormat(output)) {
    throw new Error(`WILDHAND_OUTPUT must be "text" or "json", got ${JSON.stringify(output)}`);
  }

  return {
    output,
    verbose: envBool(env, "WILDHAND_VERBOSE", false)
  };
}
