/**
 * optional-deps.ts - Dynamic loaders for optional OTel SDK packages
 *
 * Wraps CJS require() calls for optional dependencies in try/catch.
 * Returns the module on success or null when the package isn't installed.
 * Rethrows non-MODULE_NOT_FOUND errors so real faults (syntax errors,
 * permission issues, broken installations) surface during startup.
 *
 * Keeping the require() calls here lets tests vi.mock("./optional-deps") to
 * simulate packages being absent.
 */

/**
 * Returns true if the error is a MODULE_NOT_FOUND for the expected package.
 */
function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error as NodeJS.ErrnoException).code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/**
 * Load @opentelemetry/sdk-trace-node.
 * Provides the NodeTracerProvider, SimpleSpanProcessor and ConsoleSpanExporter.
 */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  try {
    return require("@opentelemetry/sdk-trace-node");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/sdk-trace-node")) return null;
    throw error;
  }
}

/**
 * Load @opentelemetry/exporter-trace-otlp-proto.
 * Provides OTLPTraceExporter for sending spans to OTLP backends (Jaeger, Datadog Agent).
 */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  try {
    return require("@opentelemetry/exporter-trace-otlp-proto");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/exporter-trace-otlp-proto")) return null;
    throw error;
  }
}
