/**
 * types.ts - Shared data types for the discovery pipeline
 *
 * These types flow through the pipeline stages:
 * - Inventory (instance-discovery.ts) produces DiscoveredInstance[]
 * - Resolution (address-resolution.ts) turns one instance id into a ResolutionResult
 * - Partitioning (partitioner.ts) consumes both and writes one artifact per filter
 * - The runner (runner.ts) ties them together and produces a RunSummary
 */

import type { OciExecutor } from "../utils/oci";

/**
 * A RUNNING compute instance as returned by the inventory query.
 * Both fields are non-empty; records missing either are dropped while parsing.
 */
export interface DiscoveredInstance {
  /** Instance OCID */
  id: string;
  /** Display name, not guaranteed unique */
  name: string;
}

/**
 * Connection settings shared by every oci call in a run.
 *
 * Passed explicitly to the fetcher and resolver rather than read from
 * globals.
 */
export interface OciContext {
  /** Compartment OCID the instances live in */
  compartmentId: string;
  /** OCI region identifier (e.g., "ap-singapore-2") */
  region: string;
  /** Value for the oci --auth flag (e.g., "instance_principal", "api_key") */
  authMethod: string;
  /** Optional --profile for the oci config file */
  profile?: string;
  /** Optional --config-file path */
  configFile?: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Outcome of resolving one instance's private IP.
 *
 * The two failure cases stay distinct until the artifact is written:
 * - no-attachment: no VNIC attachment (or the lookup failed)
 * - no-address: VNIC found but no private IP on record (or the lookup failed)
 */
export type ResolutionResult =
  | { kind: "resolved"; address: string }
  | { kind: "no-attachment" }
  | { kind: "no-address" };

/**
 * Fixed login fields written on every artifact row.
 */
export interface ConnectionDefaults {
  user: string;
  port: number;
}

/**
 * Options accepted by the fetcher and the resolver.
 */
export interface OciCallOptions {
  /**
   * Injectable oci executor for testing.
   * Defaults to the real executeOci from utils/oci.
   */
  oci?: OciExecutor;
}

/** Severity of a progress message; the CLI sends warn and error to stderr */
export type ProgressLevel = "info" | "warn" | "error";

/** Progress callback shared by the run and each partition. Level defaults to info. */
export type ProgressReporter = (message: string, level?: ProgressLevel) => void;

/**
 * Options for partitionFilter.
 */
export interface PartitionOptions extends OciCallOptions {
  /** Login fields written on every row; defaults to opc/22 */
  connection?: ConnectionDefaults;
  /**
   * Progress callback, called once per resolved instance and for warnings.
   * Defaults to consoleProgress.
   */
  onProgress?: ProgressReporter;
}

/**
 * What one filter produced.
 */
export interface PartitionResult {
  filter: string;
  outputPath: string;
  /** Instances whose name matched the filter */
  matched: number;
  /** Rows with a private IP */
  resolved: number;
  /** Rows annotated with a resolution error */
  failed: number;
}

/**
 * Everything a run needs. Built by config.ts from CLI options and env.
 */
export interface RunConfig extends OciContext {
  /** Filter patterns in processing order; empty means match-all */
  filters: string[];
  /** Directory the CSV artifacts are written into */
  outputDir: string;
  connection: ConnectionDefaults;
}

/**
 * Options for runDiscovery.
 */
export interface RunOptions extends OciCallOptions {
  /** Progress callback for the whole run. Defaults to consoleProgress. */
  onProgress?: ProgressReporter;
  /** Injectable fallback-name generator for filters that sanitize to nothing */
  fallbackName?: () => string;
}

/** One artifact listed in the run summary */
export interface ArtifactSummary {
  filter: string;
  path: string;
  /** Data rows in the file, header excluded */
  rows: number;
}

/** A filter that produced no artifact */
export interface FilterFailure {
  filter: string;
  message: string;
}

/**
 * Summary of a run.
 */
export interface RunSummary {
  /** RUNNING instances in the inventory */
  discovered: number;
  /** Artifacts written, in filter order */
  artifacts: ArtifactSummary[];
  /** Filters skipped because of an error */
  failures: FilterFailure[];
}
