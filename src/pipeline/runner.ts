/**
 * runner.ts - Discovery run orchestration
 *
 * 1. Fetch the RUNNING inventory once (fatal on failure)
 * 2. For each filter, in the order given:
 *    sanitize → <outputDir>/<name>.csv → partition
 * 3. Re-read each artifact written and report its row count
 *
 * A bad filter is recorded and skipped; it never stops the remaining filters.
 * Two filters that sanitize to the same name write the same file, and the
 * later one wins.
 */

import * as fs from "fs";
import * as path from "path";
import { countArtifactRows } from "./artifact";
import { sanitizeFilterName, MATCH_ALL_FILTER } from "./filter-name";
import { discoverInstances } from "./instance-discovery";
import { partitionFilter } from "./partitioner";
import { consoleProgress } from "./progress";
import type {
  ArtifactSummary,
  FilterFailure,
  PartitionResult,
  RunConfig,
  RunOptions,
  RunSummary,
} from "./types";

/** Expected prefix of a compartment OCID */
const COMPARTMENT_OCID_PATTERN = /^ocid1\.compartment\.oc1\./;

/**
 * The filters a run processes: the configured list, or match-all when empty.
 */
export function effectiveFilters(filters: string[]): string[] {
  return filters.length > 0 ? filters : [MATCH_ALL_FILTER];
}

/**
 * Runs discovery end to end.
 *
 * @param config - Context for oci calls plus filters, output directory and row login fields
 * @param options - Injectable oci executor, progress callback, fallback-name generator
 * @returns Inventory size, artifacts written and filters that failed
 * @throws DiscoveryError if the inventory can't be fetched
 */
export async function runDiscovery(
  config: RunConfig,
  options?: RunOptions
): Promise<RunSummary> {
  const onProgress = options?.onProgress ?? consoleProgress;
  const filters = effectiveFilters(config.filters);

  if (!COMPARTMENT_OCID_PATTERN.test(config.compartmentId)) {
    onProgress(
      "Warning: Compartment ID format doesn't match expected pattern (ocid1.compartment.oc1.). Continuing anyway...",
      "warn"
    );
  }

  onProgress("Discovering running instances...");
  const inventory = await discoverInstances(config, { oci: options?.oci });
  onProgress(`Found ${inventory.length} total running instances`);

  const produced: PartitionResult[] = [];
  const failures: FilterFailure[] = [];

  for (const filter of filters) {
    const baseName = sanitizeFilterName(filter, {
      fallbackName: options?.fallbackName,
    });
    const outputPath = path.join(config.outputDir, `${baseName}.csv`);

    try {
      const result = await partitionFilter(filter, outputPath, inventory, config, {
        oci: options?.oci,
        connection: config.connection,
        onProgress,
      });
      produced.push(result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      onProgress(`  Error: ${message}`, "error");
      failures.push({ filter, message });
    }
  }

  // Counts come from the files themselves, so a later filter that overwrote
  // an earlier one's artifact is reflected in both entries. A file removed
  // by a later invalid filter with the same name is no longer listed.
  const artifacts: ArtifactSummary[] = produced
    .filter((result) => fs.existsSync(result.outputPath))
    .map((result) => ({
      filter: result.filter,
      path: result.outputPath,
      rows: countArtifactRows(result.outputPath),
    }));

  return { discovered: inventory.length, artifacts, failures };
}

/**
 * Renders the end-of-run report, one line per artifact.
 */
export function formatSummary(summary: RunSummary): string[] {
  const lines = ["Discovery complete! Generated CSV files:"];
  for (const artifact of summary.artifacts) {
    lines.push(`  ${artifact.path} (${artifact.rows} instances)`);
  }
  if (summary.failures.length > 0) {
    lines.push(`Skipped ${summary.failures.length} filter(s):`);
    for (const failure of summary.failures) {
      lines.push(`  '${failure.filter}': ${failure.message}`);
    }
  }
  return lines;
}
