/**
 * pipeline/index.ts - Public API for the discovery pipeline
 *
 * Re-exports everything other modules need from the pipeline.
 *
 * Usage:
 *   import { runDiscovery, formatSummary, type RunConfig } from "./pipeline";
 */

export type {
  DiscoveredInstance,
  OciContext,
  ResolutionResult,
  ConnectionDefaults,
  OciCallOptions,
  PartitionOptions,
  PartitionResult,
  RunConfig,
  RunOptions,
  RunSummary,
  ArtifactSummary,
  FilterFailure,
  ProgressLevel,
  ProgressReporter,
} from "./types";

export { DiscoveryError, FilterPatternError, DISCOVERY_HINTS } from "./errors";

export {
  sanitizeFilterName,
  MATCH_ALL_FILTER,
  MATCH_ALL_NAME,
} from "./filter-name";

export {
  discoverInstances,
  parseInstanceList,
  buildContextArgs,
} from "./instance-discovery";

export {
  resolvePrivateAddress,
  describeResolution,
} from "./address-resolution";

export {
  CSV_HEADER,
  ERROR_MARKER,
  DEFAULT_CONNECTION,
  renderArtifact,
  countArtifactRows,
} from "./artifact";

export { consoleProgress } from "./progress";

export { partitionFilter, compileFilter } from "./partitioner";

export { runDiscovery, formatSummary, effectiveFilters } from "./runner";
