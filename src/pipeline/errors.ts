/**
 * errors.ts - Error types for the discovery pipeline
 *
 * Only two failures are exceptions:
 * - DiscoveryError is fatal: the inventory could not be fetched, nothing is written
 * - FilterPatternError is local to one filter: the run moves on to the next one
 *
 * Per-instance resolution failures are data (see ResolutionResult), not errors.
 */

/**
 * Hints printed with a DiscoveryError.
 */
export const DISCOVERY_HINTS = [
  "Compartment OCID is correct",
  "Region is valid",
  "OCI CLI authentication is working",
  "You have permissions to list instances in this compartment",
] as const;

export class DiscoveryError extends Error {
  readonly compartmentId: string;
  readonly region: string;
  readonly hints: readonly string[] = DISCOVERY_HINTS;

  constructor(
    message: string,
    compartmentId: string,
    region: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DiscoveryError";
    this.compartmentId = compartmentId;
    this.region = region;
  }
}

export class FilterPatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : "invalid pattern";
    super(`Filter '${pattern}' is not a valid regular expression: ${reason}`, options);
    this.name = "FilterPatternError";
    this.pattern = pattern;
  }
}
