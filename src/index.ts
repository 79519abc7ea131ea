#!/usr/bin/env node
/**
 * index.ts - CLI entry point for oci-discover
 *
 * Discovers RUNNING OCI compute instances, resolves their private IPs, and
 * writes one CSV per name filter:
 *
 *   oci-discover <compartment-id> <region> [filters...]
 *
 *   oci-discover ocid1.compartment.oc1..aaa ap-singapore-2
 *     → all_instances.csv
 *   oci-discover ocid1.compartment.oc1..aaa ap-singapore-2 'web.*' '.*db.*'
 *     → webwildcard.csv, wildcarddbwildcard.csv
 *
 * Exit codes: 0 when discovery ran (even if some filters were skipped),
 * 1 on invalid configuration, a missing oci binary, or a failed inventory fetch.
 */

// Initialize OpenTelemetry tracing before any other imports
import { shutdownTracing } from "./tracing";

import { Command } from "commander";
import { execSync } from "child_process";
import { ConfigError, DEFAULT_AUTH_METHOD, loadRunConfig } from "./config";
import { flushAndExit } from "./exit";
import type { CliInput } from "./config";
import { consoleProgress, DiscoveryError, formatSummary, runDiscovery } from "./pipeline";
import type { RunConfig } from "./pipeline";
import { withRunTracing } from "./tracing/run-tracing";

// ---------------------------------------------------------------------------
// Environment validation
// ---------------------------------------------------------------------------

/**
 * Validates that the oci CLI is available.
 */
function validateOciCli(): void {
  try {
    execSync("oci --version", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    console.error("Error: the OCI CLI (oci) is not installed or not in PATH.");
    console.error("");
    console.error("Install the OCI CLI:");
    console.error(
      "  https://docs.oracle.com/en-us/iaas/Content/API/SDKDocs/cliinstall.htm"
    );
    process.exit(1);
  }
}

/**
 * Validates the command line, exiting with the list of problems if invalid.
 */
function loadConfigOrExit(input: CliInput): RunConfig {
  try {
    return loadRunConfig(input);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

type DiscoverOptions = Omit<CliInput, "compartmentId" | "region" | "filters">;

/**
 * Main function - sets up the CLI and runs discovery
 */
async function main() {
  const program = new Command();

  program
    .name("oci-discover")
    .description(
      "Discover running OCI instances, resolve their private IPs, and write one CSV per name filter"
    )
    .version("0.1.0")
    .argument("<compartment-id>", "OCI compartment OCID")
    .argument("<region>", "OCI region (e.g., ap-singapore-2)")
    .argument(
      "[filters...]",
      "Regular expressions over instance names, one CSV each (default: '.*' → all_instances.csv)"
    )
    .option("-o, --output-dir <dir>", "Directory for the CSV files (default: OCI_DISCOVER_OUTPUT_DIR or .)")
    .option("--auth <method>", `oci --auth method (default: OCI_CLI_AUTH or ${DEFAULT_AUTH_METHOD})`)
    .option("--profile <name>", "oci config profile (default: OCI_CLI_PROFILE)")
    .option("--config-file <path>", "oci config file (default: OCI_CLI_CONFIG_FILE)")
    .option("--timeout <ms>", "Per-call oci timeout in milliseconds (default: 30000)")
    .option("--user <name>", "Login user written on every row (default: opc)")
    .option("--port <port>", "SSH port written on every row (default: 22)")
    .addHelpText(
      "after",
      `
Examples:
  $ oci-discover 'ocid1.compartment.oc1..aaa' 'ap-singapore-2'
  $ oci-discover 'ocid1.compartment.oc1..aaa' 'ap-singapore-2' 'web.*' '.*db.*'
  $ oci-discover 'ocid1.compartment.oc1..aaa' 'us-ashburn-1' '^prod-.*' '^test-.*'

Note: with no filters, all instances are written to all_instances.csv.
Existing CSV files with the same names are overwritten.`
    )
    .action(
      async (
        compartmentId: string,
        region: string,
        filters: string[],
        options: DiscoverOptions
      ) => {
        const config = loadConfigOrExit({ compartmentId, region, filters, ...options });

        validateOciCli();

        console.log("OCI Instance Discovery with IP Resolution"); // eslint-disable-line no-console
        console.log("========================================"); // eslint-disable-line no-console
        console.log(`Compartment: ${config.compartmentId}`); // eslint-disable-line no-console
        console.log(`Region: ${config.region}`); // eslint-disable-line no-console
        console.log(`Filters: ${config.filters.length > 0 ? config.filters.join(" ") : ".*"}`); // eslint-disable-line no-console
        console.log("Output: Multiple CSV files (overwrite existing)\n"); // eslint-disable-line no-console

        try {
          const summary = await withRunTracing(
            {
              compartmentId: config.compartmentId,
              region: config.region,
              filters: config.filters,
            },
            () => runDiscovery(config, { onProgress: consoleProgress })
          );

          console.log(); // eslint-disable-line no-console
          for (const line of formatSummary(summary)) {
            console.log(line); // eslint-disable-line no-console
          }
        } catch (error) {
          if (error instanceof DiscoveryError) {
            console.error(`\nError: ${error.message}`);
            console.error("Please check:");
            for (const hint of error.hints) {
              console.error(`  - ${hint}`);
            }
            await flushAndExit(1);
          }
          throw error;
        }

        await shutdownTracing();
      }
    );

  await program.parseAsync(process.argv);
}

main().catch(async (error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  await flushAndExit(1);
});
