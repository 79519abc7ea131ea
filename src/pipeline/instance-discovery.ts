/**
 * instance-discovery.ts - Fetches the RUNNING instance inventory
 *
 * One bulk query per run:
 *   oci compute instance list --compartment-id <c> --all --lifecycle-state RUNNING
 *     --query 'data[].{id:id,"display-name":"display-name","lifecycle-state":"lifecycle-state"}'
 *
 * The --query projection keeps only the fields read here, so metadata, tags
 * and user data never reach stdout.
 *
 * --all makes the CLI follow every page, so callers always see the complete
 * inventory. Filters partition this single snapshot; they never trigger
 * another fetch.
 *
 * There is no partial-inventory mode: any failure here is a DiscoveryError
 * and ends the run before an artifact is written.
 */

import { z } from "zod";
import { executeOci as defaultOci } from "../utils/oci";
import { DiscoveryError } from "./errors";
import type { DiscoveredInstance, OciCallOptions, OciContext } from "./types";

// ---------------------------------------------------------------------------
// Payload schema
// ---------------------------------------------------------------------------

/** JMESPath projection passed to --query */
export const INSTANCE_LIST_QUERY =
  'data[].{id:id,"display-name":"display-name","lifecycle-state":"lifecycle-state"}';

const InstanceRecordSchema = z.object({
  id: z.string().nullish(),
  "display-name": z.string().nullish(),
  "lifecycle-state": z.string().nullish(),
});

/**
 * The part of `oci compute instance list` output we read: the bare array the
 * --query projection prints, or the full `{ data: [...] }` envelope.
 * The CLI emits kebab-case keys; other fields are stripped.
 */
export const InstanceListSchema = z.union([
  z.array(InstanceRecordSchema),
  z.object({ data: z.array(InstanceRecordSchema) }),
]);

// ---------------------------------------------------------------------------
// Pure functions (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Builds the flags every oci call in a run shares: region, auth, and the
 * optional profile and config file.
 */
export function buildContextArgs(context: OciContext): string[] {
  const args = ["--region", context.region, "--auth", context.authMethod];
  if (context.profile) {
    args.push("--profile", context.profile);
  }
  if (context.configFile) {
    args.push("--config-file", context.configFile);
  }
  return args;
}

/**
 * Builds the args for the inventory query.
 */
export function buildInstanceListArgs(context: OciContext): string[] {
  return [
    "compute",
    "instance",
    "list",
    "--compartment-id",
    context.compartmentId,
    "--all",
    "--lifecycle-state",
    "RUNNING",
    "--query",
    INSTANCE_LIST_QUERY,
    ...buildContextArgs(context),
  ];
}

/**
 * Parses `oci compute instance list` JSON into DiscoveredInstance[].
 *
 * Provider order is preserved. Records without an id or a display name are
 * dropped, as are any not in RUNNING state (the query already asks for
 * RUNNING only; this guards against a state change racing the listing).
 *
 * @throws Error if the output is not JSON or doesn't have the expected shape
 */
export function parseInstanceList(json: string): DiscoveredInstance[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(
      `Failed to parse instance list: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = InstanceListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Unexpected instance list format: ${parsed.error.issues.map((i) => i.message).join("; ")}`
    );
  }

  const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.data;

  const instances: DiscoveredInstance[] = [];
  for (const record of records) {
    const id = record.id;
    const name = record["display-name"];
    const state = record["lifecycle-state"];
    if (!id || !name) continue;
    if (state && state !== "RUNNING") continue;
    instances.push({ id, name });
  }
  return instances;
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/**
 * Fetches every RUNNING instance in the compartment/region.
 *
 * @param context - Compartment, region, auth and timeout for the oci call
 * @param options - Injectable oci executor
 * @returns Instances in provider order
 * @throws DiscoveryError if the call fails or returns no parsable payload
 */
export async function discoverInstances(
  context: OciContext,
  options?: OciCallOptions
): Promise<DiscoveredInstance[]> {
  const oci = options?.oci ?? defaultOci;

  const result = oci(buildInstanceListArgs(context), context.timeoutMs);
  if (result.isError) {
    throw new DiscoveryError(
      `Failed to retrieve instances from compartment ${context.compartmentId} in region ${context.region}: ${result.output}`,
      context.compartmentId,
      context.region
    );
  }

  if (!result.output.trim()) {
    throw new DiscoveryError(
      `Failed to retrieve instances from compartment ${context.compartmentId} in region ${context.region}: empty response`,
      context.compartmentId,
      context.region
    );
  }

  try {
    return parseInstanceList(result.output);
  } catch (err) {
    throw new DiscoveryError(
      `Failed to retrieve instances from compartment ${context.compartmentId} in region ${context.region}: ${err instanceof Error ? err.message : String(err)}`,
      context.compartmentId,
      context.region,
      { cause: err }
    );
  }
}
