#!/usr/bin/env tsx
/**
 * CLI: release:create
 *
 * Usage: GITHUB_TOKEN=<token> GITHUB_REPOSITORY=<owner/repo> RUN_ID=<id> [...] npm run release:create
 *
 * Creates, or updates on re-run, the GitHub Release that summarises a
 * deployment run: plan, per-environment results, artifacts and approvals.
 */

import path from "path";
import { fileURLToPath } from "url";
import type { Dispatcher } from "undici";
import { loadReleaseEnv } from "../shared/env.js";
import { error, info } from "../shared/log.js";
import { buildReleasePayload } from "../release/announcement.js";
import { GitHubClient, type Release } from "../release/github_client.js";

export async function main(
  env: Record<string, string | undefined> = process.env,
  dispatcher?: Dispatcher,
): Promise<Release> {
  const config = loadReleaseEnv(env);
  const client = new GitHubClient({
    token: config.token,
    repository: config.repository,
    apiUrl: config.apiUrl,
    dispatcher,
  });

  const approvals = await client.listRunApprovals(config.runId);
  const payload = buildReleasePayload(config, approvals);
  const { release, created } = await client.ensureRelease(payload);
  info(`${created ? "Created" : "Updated"} release ${payload.tagName} (${payload.name})`);
  return release;
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    error(`Could not create the release: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
