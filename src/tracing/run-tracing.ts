/**
 * run-tracing.ts - Root span for a discovery run
 *
 * Wraps a whole run in an INTERNAL span so every oci subprocess span created
 * during the run nests under it:
 *
 *   oci-discover.run
 *   ├── oci compute instance list
 *   ├── oci compute vnic-attachment list
 *   ├── oci network vnic get
 *   └── ...
 *
 * The oci calls are synchronous and run inside the active context, so the
 * parent link comes from startActiveSpan alone.
 */

import { type Span, SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "./index";

/** Run-level attributes recorded on the root span */
export interface RunTraceAttributes {
  compartmentId: string;
  region: string;
  filters: string[];
}

/**
 * Runs fn inside the root span, recording success or the thrown error.
 *
 * @example
 * ```typescript
 * const summary = await withRunTracing(
 *   { compartmentId, region, filters },
 *   () => runDiscovery(config)
 * );
 * ```
 */
export async function withRunTracing<T>(
  attributes: RunTraceAttributes,
  fn: () => Promise<T>
): Promise<T> {
  const tracer = getTracer();

  return tracer.startActiveSpan(
    "oci-discover.run",
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        "oci.compartment_id": attributes.compartmentId,
        "oci.region": attributes.region,
        "oci_discover.filters": attributes.filters,
        "oci_discover.filter_count": attributes.filters.length,
      },
    },
    async (span: Span) => {
      try {
        const result = await fn();
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        if (error instanceof Error) {
          span.recordException(error);
        }
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
