/**
 * tracing/index.ts - OpenTelemetry initialization for oci-discover
 *
 * Sets up OpenTelemetry tracing so a discovery run can be inspected: one root
 * span per run, and one CLIENT span per oci subprocess call underneath it.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API returns a no-op tracer.
 *
 * Graceful degradation:
 * The SDK packages (@opentelemetry/sdk-trace-node, @opentelemetry/exporter-trace-otlp-proto)
 * are loaded via optional-deps.ts. When absent, initialization is skipped and
 * all tracing calls fall through to the API's no-op implementations.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT over HTTP/protobuf
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "oci-discover";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * Throws with install instructions when the requested exporter's package
 * is not available.
 */
function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes to avoid double-slash in URL
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.log(`[OTel] Using OTLP exporter → ${base}`); // eslint-disable-line no-console
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.log("[OTel] Using console exporter"); // eslint-disable-line no-console
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Flushes and stops the registered provider. Replaced once tracing is
 * initialized; a no-op otherwise.
 */
let shutdownProvider: () => Promise<void> = async () => {};

/**
 * Initialize tracing when enabled and the SDK is installed.
 *
 * A SimpleSpanProcessor exports each span as it ends, which suits a
 * short-lived CLI better than batching.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console

    const exporter = createSpanExporter();
    const provider = new sdkTraceNode.NodeTracerProvider();
    provider.addSpanProcessor(new sdkTraceNode.SimpleSpanProcessor(exporter));
    provider.register();

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console

    shutdownProvider = async () => {
      await provider.shutdown();
    };

    const onSignal = () => {
      shutdownTracing().catch((error: unknown) => {
        console.error("[OTel] Error shutting down tracing:", error);
      });
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  }
}

/**
 * Get a tracer from the global TracerProvider (no-op when tracing is off).
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Flush pending spans. The CLI awaits this before exiting.
 */
export async function shutdownTracing(): Promise<void> {
  await shutdownProvider();
}

export { isTracingEnabled };
