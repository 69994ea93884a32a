/**
 * Step outputs — `name=value` lines appended to the file named by
 * `$GITHUB_OUTPUT`. Multi-line values must be base64-encoded by the caller.
 */

import { appendFileSync } from "fs";

export interface OutputEntry {
  name: string;
  value: string | undefined;
}

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

export function decodeBase64(encoded: string): string {
  return Buffer.from(encoded, "base64").toString("utf-8");
}

export function formatOutputLine(name: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new Error(`Output ${name} contains a line break; encode it first`);
  }
  return `${name}=${value}\n`;
}

/**
 * Append every entry with a non-empty value. Returns the number of lines
 * written; without an output file nothing is written.
 */
export function appendOutputs(
  entries: readonly OutputEntry[],
  outputFile: string | undefined,
): number {
  if (!outputFile) return 0;
  const lines = entries
    .filter((e): e is { name: string; value: string } => Boolean(e.value))
    .map((e) => formatOutputLine(e.name, e.value));
  if (lines.length > 0) {
    appendFileSync(outputFile, lines.join(""), "utf-8");
  }
  return lines.length;
}
