/**
 * config.ts - Builds a validated RunConfig from CLI input and environment
 *
 * Precedence for each setting: CLI option, then environment variable, then
 * default.
 *
 *   --output-dir   OCI_DISCOVER_OUTPUT_DIR   "."
 *   --auth         OCI_CLI_AUTH              "instance_principal"
 *   --profile      OCI_CLI_PROFILE           (unset)
 *   --config-file  OCI_CLI_CONFIG_FILE       (unset)
 *   --timeout      OCI_DISCOVER_TIMEOUT_MS   30000
 *   --user                                   "opc"
 *   --port                                   22
 */

import { z } from "zod";
import { DEFAULT_OCI_TIMEOUT_MS } from "./utils/oci";
import type { RunConfig } from "./pipeline/types";

export const DEFAULT_AUTH_METHOD = "instance_principal";

/**
 * Raw input as commander hands it over: positionals plus string options.
 */
export interface CliInput {
  compartmentId: string;
  region: string;
  filters: string[];
  outputDir?: string;
  auth?: string;
  profile?: string;
  configFile?: string;
  timeout?: string;
  user?: string;
  port?: string;
}

export const RunConfigSchema = z.object({
  compartmentId: z.string().trim().min(1, "Compartment OCID cannot be empty"),
  region: z.string().trim().min(1, "Region cannot be empty"),
  filters: z.array(z.string().min(1, "Filter patterns cannot be empty")),
  outputDir: z.string().min(1),
  authMethod: z.string().min(1),
  profile: z.string().min(1).optional(),
  configFile: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive("Timeout must be a positive number of milliseconds"),
  connection: z.object({
    user: z.string().min(1, "User cannot be empty"),
    port: z.coerce
      .number()
      .int()
      .min(1, "Port must be between 1 and 65535")
      .max(65535, "Port must be between 1 and 65535"),
  }),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Validates CLI input merged with environment defaults.
 *
 * @param input - Positionals and options from the command line
 * @param env - Environment to read fallbacks from (injectable for tests)
 * @throws ConfigError listing every invalid field
 */
export function loadRunConfig(
  input: CliInput,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const parsed = RunConfigSchema.safeParse({
    compartmentId: input.compartmentId,
    region: input.region,
    filters: input.filters,
    outputDir: input.outputDir ?? env.OCI_DISCOVER_OUTPUT_DIR ?? ".",
    authMethod: input.auth ?? env.OCI_CLI_AUTH ?? DEFAULT_AUTH_METHOD,
    profile: input.profile ?? env.OCI_CLI_PROFILE,
    configFile: input.configFile ?? env.OCI_CLI_CONFIG_FILE,
    timeoutMs: input.timeout ?? env.OCI_DISCOVER_TIMEOUT_MS ?? DEFAULT_OCI_TIMEOUT_MS,
    connection: {
      user: input.user ?? "opc",
      port: input.port ?? 22,
    },
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  return parsed.data;
}
