/**
 * artifact.ts - CSV encoding and writing for discovery artifacts
 *
 * Format consumed by the session-file generator:
 *
 *   Name,PrivateIP,User,Port
 *   "web-01","10.0.0.5","opc","22"
 *   "web-02","ERROR: NO_VNIC","opc","22"
 *
 * The header is unquoted; every data field is double-quoted. Failed
 * resolutions keep their row, with "ERROR: <marker>" in the PrivateIP column
 * so consumers can spot them by prefix.
 */

import * as fs from "fs";
import * as path from "path";
import type { ConnectionDefaults, ResolutionResult } from "./types";

export const CSV_HEADER = "Name,PrivateIP,User,Port";

/** Prefix of the PrivateIP field on failed rows */
export const ERROR_MARKER = "ERROR: ";

/** Login fields used when none are configured */
export const DEFAULT_CONNECTION: ConnectionDefaults = { user: "opc", port: 22 };

/**
 * One data row of an artifact.
 */
export interface OutputRecord {
  name: string;
  resolution: ResolutionResult;
}

/** Quotes a field, doubling any embedded quotes */
export function quoteField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Renders the PrivateIP column. Failures are only flattened to text here.
 */
export function formatAddressField(result: ResolutionResult): string {
  switch (result.kind) {
    case "resolved":
      return result.address;
    case "no-attachment":
      return `${ERROR_MARKER}NO_VNIC`;
    case "no-address":
      return `${ERROR_MARKER}NO_IP`;
  }
}

export function formatRecord(
  record: OutputRecord,
  connection: ConnectionDefaults = DEFAULT_CONNECTION
): string {
  return [
    record.name,
    formatAddressField(record.resolution),
    connection.user,
    String(connection.port),
  ]
    .map(quoteField)
    .join(",");
}

/**
 * Renders a complete artifact: header plus one line per record, newline-terminated.
 */
export function renderArtifact(
  records: OutputRecord[],
  connection: ConnectionDefaults = DEFAULT_CONNECTION
): string {
  const lines = [CSV_HEADER, ...records.map((r) => formatRecord(r, connection))];
  return lines.join("\n") + "\n";
}

/**
 * Writes content to filePath, replacing whatever was there.
 *
 * The content goes to a temp file in the same directory first and is then
 * renamed over the target, so a reader sees either the old artifact or the
 * new one, never a mix.
 */
export function writeArtifact(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );
  try {
    fs.writeFileSync(tempPath, content, "utf-8");
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Counts data rows in an artifact on disk: non-empty lines minus the header.
 */
export function countArtifactRows(filePath: string): number {
  const lines = fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter((line) => line.trim() !== "");
  return Math.max(lines.length - 1, 0);
}
