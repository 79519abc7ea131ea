/**
 * address-resolution.ts - Resolves an instance's private IP
 *
 * Two sequential lookups:
 * 1. oci compute vnic-attachment list --instance-id <id>  → first attachment's vnic-id
 * 2. oci network vnic get --vnic-id <vnic>                → private-ip
 *
 * Both are best-effort. A failed call, a timeout, unparsable output and a
 * missing field all mean the same thing: that step found nothing. Step 2 is
 * skipped when step 1 finds nothing. No retries.
 */

import { z } from "zod";
import { executeOci as defaultOci } from "../utils/oci";
import { buildContextArgs } from "./instance-discovery";
import type { OciCallOptions, OciContext, ResolutionResult } from "./types";

const VnicAttachmentListSchema = z.object({
  data: z.array(z.object({ "vnic-id": z.string().nullish() })),
});

const VnicSchema = z.object({
  data: z.object({ "private-ip": z.string().nullish() }),
});

/**
 * Parses JSON output against a schema, returning undefined on any mismatch.
 */
function parseOptional<T>(
  json: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Extracts the first attachment's VNIC id, if any.
 * The CLI prints nothing at all when the list is empty.
 */
export function parseVnicId(json: string): string | undefined {
  if (!json.trim()) return undefined;
  const parsed = parseOptional(json, VnicAttachmentListSchema);
  return parsed?.data[0]?.["vnic-id"] || undefined;
}

/**
 * Extracts the VNIC's private IP, if any.
 */
export function parsePrivateIp(json: string): string | undefined {
  if (!json.trim()) return undefined;
  const parsed = parseOptional(json, VnicSchema);
  return parsed?.data["private-ip"] || undefined;
}

/**
 * Resolves one instance's private IP.
 *
 * @param instanceId - Instance OCID
 * @param context - Compartment, region, auth and timeout for the oci calls
 * @param options - Injectable oci executor
 */
export async function resolvePrivateAddress(
  instanceId: string,
  context: OciContext,
  options?: OciCallOptions
): Promise<ResolutionResult> {
  const oci = options?.oci ?? defaultOci;
  const contextArgs = buildContextArgs(context);

  const attachments = oci(
    [
      "compute",
      "vnic-attachment",
      "list",
      "--compartment-id",
      context.compartmentId,
      "--instance-id",
      instanceId,
      ...contextArgs,
    ],
    context.timeoutMs
  );
  const vnicId = attachments.isError ? undefined : parseVnicId(attachments.output);
  if (!vnicId) {
    return { kind: "no-attachment" };
  }

  const vnic = oci(
    ["network", "vnic", "get", "--vnic-id", vnicId, ...contextArgs],
    context.timeoutMs
  );
  const address = vnic.isError ? undefined : parsePrivateIp(vnic.output);
  if (!address) {
    return { kind: "no-address" };
  }

  return { kind: "resolved", address };
}

/**
 * Short form for progress output: the address, or the failure marker.
 */
export function describeResolution(result: ResolutionResult): string {
  switch (result.kind) {
    case "resolved":
      return result.address;
    case "no-attachment":
      return "NO_VNIC";
    case "no-address":
      return "NO_IP";
  }
}
