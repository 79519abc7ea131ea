/**
 * partitioner.ts - Writes one artifact for one filter
 *
 * For a filter pattern and the run's inventory:
 * 1. Compile the pattern (invalid → FilterPatternError, nothing written)
 * 2. Select instances whose display name matches, in inventory order
 * 3. Resolve each match's private IP, one at a time
 * 4. Write header + rows to the output path, replacing any previous file
 *
 * A filter that matches nothing still gets a header-only artifact, with a
 * warning rather than an error.
 */

import * as fs from "fs";
import {
  describeResolution,
  resolvePrivateAddress,
} from "./address-resolution";
import { DEFAULT_CONNECTION, renderArtifact, writeArtifact } from "./artifact";
import type { OutputRecord } from "./artifact";
import { FilterPatternError } from "./errors";
import { consoleProgress } from "./progress";
import type {
  DiscoveredInstance,
  OciContext,
  PartitionOptions,
  PartitionResult,
} from "./types";

/**
 * Compiles a filter pattern into an unanchored RegExp.
 *
 * @throws FilterPatternError if the pattern is not a valid regular expression
 */
export function compileFilter(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new FilterPatternError(pattern, { cause: err });
  }
}

/**
 * Instances whose display name matches, in their original order.
 */
export function selectMatching(
  inventory: DiscoveredInstance[],
  matcher: RegExp
): DiscoveredInstance[] {
  return inventory.filter((instance) => matcher.test(instance.name));
}

/**
 * Produces the complete artifact for one filter.
 *
 * @param filter - Regular expression over instance display names
 * @param outputPath - CSV path; an existing file there is replaced
 * @param inventory - The run's instance snapshot
 * @param context - Settings for the resolver's oci calls
 * @param options - Injectable oci executor, row login fields, progress callback
 * @throws FilterPatternError for an invalid pattern
 */
export async function partitionFilter(
  filter: string,
  outputPath: string,
  inventory: DiscoveredInstance[],
  context: OciContext,
  options?: PartitionOptions
): Promise<PartitionResult> {
  const onProgress = options?.onProgress ?? consoleProgress;
  const connection = options?.connection ?? DEFAULT_CONNECTION;

  onProgress(`Processing filter: '${filter}' -> ${outputPath}`);

  const exists = fs.existsSync(outputPath);

  let matcher: RegExp;
  try {
    matcher = compileFilter(filter);
  } catch (err) {
    // A stale artifact from an earlier run must not pass for this run's output
    if (exists) {
      fs.rmSync(outputPath, { force: true });
    }
    throw err;
  }

  if (exists) {
    onProgress(`  Overwriting existing file: ${outputPath}`);
  }

  const matching = selectMatching(inventory, matcher);

  if (matching.length === 0) {
    onProgress(`  Warning: No instances matching pattern '${filter}' found.`, "warn");
    writeArtifact(outputPath, renderArtifact([], connection));
    onProgress(`  Created empty file: ${outputPath}`);
    return { filter, outputPath, matched: 0, resolved: 0, failed: 0 };
  }

  onProgress(
    `  Found ${matching.length} instances for filter '${filter}', resolving IPs...`
  );

  const records: OutputRecord[] = [];
  let resolved = 0;
  for (const instance of matching) {
    const resolution = await resolvePrivateAddress(instance.id, context, {
      oci: options?.oci,
    });
    onProgress(`    Processing: ${instance.name} ... IP: ${describeResolution(resolution)}`);
    if (resolution.kind === "resolved") {
      resolved++;
    }
    records.push({ name: instance.name, resolution });
  }

  writeArtifact(outputPath, renderArtifact(records, connection));
  onProgress(`  Created: ${outputPath}`);

  return {
    filter,
    outputPath,
    matched: matching.length,
    resolved,
    failed: matching.length - resolved,
  };
}
