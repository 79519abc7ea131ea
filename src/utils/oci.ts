/**
 * oci.ts - Executes OCI CLI commands as subprocesses
 *
 * How it works:
 * 1. Takes an array of oci arguments (e.g., ["compute", "instance", "list", ...])
 * 2. Spawns the oci binary as a child process
 * 3. Returns stdout, or an error message if the command failed
 *
 * spawnSync with an args array bypasses the shell, so instance names, filter
 * patterns and OCIDs are passed through as single arguments and never
 * interpreted as shell syntax.
 *
 * Every call is blocking and bounded by a timeout. A timed-out call is reported
 * the same way as any other failure (isError: true); callers decide what a
 * failure means for them.
 *
 * OpenTelemetry instrumentation:
 * Each execution creates a CLIENT span named "oci {service} {resource} {action}"
 * with OTel semconv process.* attributes plus oci.* attributes for the region
 * and duration.
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/** Default per-call timeout for the oci binary */
export const DEFAULT_OCI_TIMEOUT_MS = 30_000;

/** Output cap per call (spawnSync defaults to 1 MiB) */
export const OCI_MAX_BUFFER_BYTES = 64 * 1024 * 1024;

/**
 * Result from executing an oci command.
 *
 * The error state comes from the exit code rather than from inspecting the
 * output, since the CLI prints warnings to stderr even on success.
 */
export interface OciResult {
  output: string;
  isError: boolean;
}

/** Signature shared by the real executor and test doubles */
export type OciExecutor = (args: string[], timeoutMs?: number) => OciResult;

/**
 * Metadata extracted from the args for span naming.
 */
interface OciMetadata {
  service: string; // compute, network
  resource: string; // instance, vnic-attachment, vnic
  action: string; // list, get
  region: string | undefined; // from --region
}

function extractOciMetadata(args: string[]): OciMetadata {
  const regionIndex = args.indexOf("--region");
  const region =
    regionIndex !== -1 && args[regionIndex + 1]
      ? args[regionIndex + 1]
      : undefined;

  return {
    service: args[0] || "unknown",
    resource: args[1] || "unknown",
    action: args[2] || "unknown",
    region,
  };
}

/**
 * Executes an oci command and returns a structured result.
 *
 * @param args - Arguments to pass to oci (without "oci" itself)
 * @param timeoutMs - Kill the subprocess after this many milliseconds
 *
 * Example:
 *   executeOci(["network", "vnic", "get", "--vnic-id", "ocid1.vnic..."])
 *   // Returns: { output: '{"data": {...}}', isError: false }
 */
export function executeOci(
  args: string[],
  timeoutMs: number = DEFAULT_OCI_TIMEOUT_MS
): OciResult {
  const tracer = getTracer();
  const metadata = extractOciMetadata(args);
  const startTime = Date.now();

  // For messages only, never executed through a shell
  const command = `oci ${args.join(" ")}`;

  return tracer.startActiveSpan(
    `oci ${metadata.service} ${metadata.resource} ${metadata.action}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("oci.service", metadata.service);
      span.setAttribute("oci.resource", metadata.resource);
      span.setAttribute("oci.action", metadata.action);
      if (metadata.region) {
        span.setAttribute("oci.region", metadata.region);
      }
      span.setAttribute("process.executable.name", "oci");
      span.setAttribute("process.command_args", ["oci", ...args]);

      try {
        const result = spawnSync("oci", args, {
          encoding: "utf-8",
          timeout: timeoutMs,
          maxBuffer: OCI_MAX_BUFFER_BYTES,
        });

        span.setAttribute("oci.duration_ms", Date.now() - startTime);

        // Spawn errors: binary missing, or killed by the timeout (ETIMEDOUT),
        // or output over maxBuffer (ENOBUFS)
        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: result.error.message,
          });

          return {
            output: `Error executing "${command}": ${result.error.message}`,
            isError: true,
          };
        }

        span.setAttribute("process.exit.code", result.status ?? -1);

        if (result.status !== 0) {
          const errorMessage = result.stderr || "Unknown error";
          span.setAttribute("error.type", "OciCliError");
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: errorMessage,
          });

          return {
            output: `Error executing "${command}": ${errorMessage}`,
            isError: true,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });

        return {
          output: result.stdout,
          isError: false,
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.setAttribute("oci.duration_ms", Date.now() - startTime);
        span.setAttribute("process.exit.code", -1);
        span.setAttribute(
          "error.type",
          error instanceof Error ? error.name : "UnknownError"
        );
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });

        return {
          output: `Error executing "${command}": ${message}`,
          isError: true,
        };
      } finally {
        span.end();
      }
    }
  );
}
