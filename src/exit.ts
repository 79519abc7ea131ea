/**
 * exit.ts - Process exit that flushes tracing first
 *
 * Spans of a failed run are exported before the process ends, even when the
 * provider's shutdown itself fails.
 */

import { shutdownTracing } from "./tracing";

export async function flushAndExit(code: number): Promise<never> {
  try {
    await shutdownTracing();
  } finally {
    process.exit(code);
  }
}
