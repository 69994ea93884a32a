#!/usr/bin/env tsx
/**
 * CLI: template:prepare
 *
 * Usage: ARTIFACT_DIR=<dir> [FALLBACK_TEMPLATE_PATH=<file>] npm run template:prepare
 *
 * Finds the override template inside the downloaded artifacts (expanding
 * zips as needed), parses its key=value overrides, and writes the results to
 * $GITHUB_OUTPUT. `icf_template_status` is always written.
 */

import path from "path";
import { fileURLToPath } from "url";
import { loadTemplateEnv } from "../shared/env.js";
import { error } from "../shared/log.js";
import { appendOutputs } from "../outputs/github_output.js";
import { prepareTemplate, templateOutputs } from "../templates/resolver.js";
import type { TemplateResult } from "../templates/types.js";

export function main(env: Record<string, string | undefined> = process.env): TemplateResult {
  const config = loadTemplateEnv(env);
  const result = prepareTemplate({
    artifactDir: config.artifactDir,
    fallbackPath: config.fallbackPath,
  });
  appendOutputs(templateOutputs(result), config.outputFile);
  return result;
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  try {
    main();
  } catch (err) {
    error(`Template preparation failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
