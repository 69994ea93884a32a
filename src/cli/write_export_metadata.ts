#!/usr/bin/env tsx
/**
 * CLI: metadata:write
 *
 * Usage: [DEST=<dir>] ARTIFACT_NAME=<name> [...] npm run metadata:write
 *
 * Writes <DEST>/export-metadata.json from the export and template step outputs.
 */

import path from "path";
import { fileURLToPath } from "url";
import { loadMetadataEnv } from "../shared/env.js";
import { error, info } from "../shared/log.js";
import { writeExportMetadata } from "../exports/metadata.js";

export function main(env: Record<string, string | undefined> = process.env): string {
  const metadataPath = writeExportMetadata(loadMetadataEnv(env));
  info(`Export metadata written to ${metadataPath}`);
  return metadataPath;
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  try {
    main();
  } catch (err) {
    error(`Could not write export metadata: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
