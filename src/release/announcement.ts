/**
 * Release Announcement — the markdown body, tag and name of the release
 * that records a deployment run.
 *
 * Tag names are stable per run (`deploy-app-<app>-<runId>`), so re-running
 * the job updates the same release instead of creating another.
 */

import type { ReleaseEnv } from "../shared/env.js";

export type DeployPlan = "dev-to-qa" | "dev-qa-prod" | "qa-to-prod";
export type TargetEnvironment = "qa" | "prod";

export const PLAN_LABELS: Record<DeployPlan, string> = {
  "dev-to-qa": "Dev → QA",
  "dev-qa-prod": "Dev → QA → Prod",
  "qa-to-prod": "QA → Prod",
};

export const PLAN_TARGETS: Record<DeployPlan, TargetEnvironment[]> = {
  "dev-to-qa": ["qa"],
  "dev-qa-prod": ["qa", "prod"],
  "qa-to-prod": ["prod"],
};

const STATUS_ICONS: Record<string, string> = {
  success: "✅",
  skipped: "⚪",
  cancelled: "⏭️",
  failure: "❌",
};

export interface Approval {
  user: string;
  state: string;
}

export interface ReleasePayload {
  tagName: string;
  name: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
  targetCommitish: string;
}

function isDeployPlan(plan: string): plan is DeployPlan {
  return Object.prototype.hasOwnProperty.call(PLAN_LABELS, plan);
}

export function planLabel(plan: string): string {
  if (isDeployPlan(plan)) return PLAN_LABELS[plan];
  return plan || "unknown plan";
}

/** Tag-safe slug: runs of anything outside `[A-Za-z0-9._-]` collapse to one dash. */
export function sanitizeSlug(text: string): string {
  const clean = text
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  return clean || "run";
}

export function statusIcon(result: string): string {
  return `${STATUS_ICONS[result] ?? "ℹ️"} ${result || "unknown"}`;
}

/** Branch for repository links: explicit ref name, then `refs/heads/*`, then the raw ref. */
export function deriveBranch(refName: string, ref: string): string {
  if (refName) return refName;
  if (ref.startsWith("refs/heads/")) return ref.slice("refs/heads/".length);
  return ref || "main";
}

/** ISO timestamp → `YYYY-MM-DD HH:MM:SS UTC`; unparseable input is returned as-is. */
export function formatStartedAt(value: string): string {
  if (!value) return "";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

function environmentLines(env: ReleaseEnv): string[] {
  const targets = isDeployPlan(env.plan) ? PLAN_TARGETS[env.plan] : [];
  return targets.map((target) => {
    if (target === "qa") return `- QA: ${statusIcon(env.promoteQa)}`;
    return `- Prod: ${statusIcon(env.promoteProdAfterQa || env.promoteProdFromQa)}`;
  });
}

function summaryLines(env: ReleaseEnv, label: string): string[] {
  const run = env.runNumber || env.runId;
  const lines = [
    env.runUrl ? `- Run: [${run}](${env.runUrl})` : `- Run: ${run}`,
    `- Plan: \`${env.plan || "unknown"}\` (${label})`,
    `- Kind: ${env.deployKind}`,
  ];
  if (env.triggeringActor) lines.push(`- Triggered by: @${env.triggeringActor}`);
  const startedAt = formatStartedAt(env.runStartedAt);
  if (startedAt) lines.push(`- Started at: ${startedAt}`);
  if (env.appName) lines.push(`- App: ${env.appName}`);
  if (env.deployKind === "package" && env.packageName) {
    lines.push(`- Package: ${env.packageName}`);
  }
  if (env.gitRef) lines.push(`- Ref: \`${env.gitRef}\` @ ${env.gitSha.slice(0, 7)}`);
  return lines;
}

function artifactLines(env: ReleaseEnv): string[] {
  const repoUrl = `https://github.com/${env.repository}`;
  const branch = deriveBranch(env.gitRefName, env.gitRef);
  const link = (kind: "tree" | "blob", p: string) =>
    `[${p}](${repoUrl}/${kind}/${branch}/${p.replace(/^[./]+/, "")})`;

  const lines: string[] = [];
  if (env.artifactName) lines.push(`- Export artifact: \`${env.artifactName}\``);
  if (env.artifactDir) lines.push(`- Sandbox dir: ${link("tree", env.artifactDir)}`);
  if (env.metadataPath) lines.push(`- Metadata JSON: ${link("blob", env.metadataPath)}`);
  if (env.packageArtifactName) {
    lines.push(`- Package artifact: \`${env.packageArtifactName}\``);
  }
  if (env.packageFileName) {
    lines.push(
      env.artifactDir
        ? `- Package file: ${link("blob", `${env.artifactDir}/${env.packageFileName}`)}`
        : `- Package file: \`${env.packageFileName}\``,
    );
  }
  if (env.packageStatus) lines.push(`- Package status: ${env.packageStatus}`);
  if (env.templateStatus) {
    if (env.templateFile && env.artifactDir) {
      const templatePath = `${env.artifactDir}/${env.templateFile}`;
      lines.push(`- ICF template: ${env.templateStatus} ${link("blob", templatePath)}`);
    } else {
      lines.push(`- ICF template: ${env.templateStatus} ${env.templateFile || "(no file)"}`);
    }
  }
  if (env.runUrl) {
    lines.push(`- Artifacts (run): [view in GitHub Actions](${env.runUrl}#artifacts)`);
  }
  return lines;
}

export function releaseTag(env: ReleaseEnv): string {
  const root =
    env.deployKind === "package"
      ? `deploy-package-${sanitizeSlug(env.packageName || "package")}`
      : `deploy-app-${sanitizeSlug(env.appName || "app")}`;
  return `${root}-${env.runId || env.runNumber || "run"}`;
}

export function releaseName(env: ReleaseEnv): string {
  const prefix =
    env.deployKind === "package"
      ? `Deploy Package · ${env.packageName || "unknown package"}`
      : "Deploy App";
  return `${prefix} · ${planLabel(env.plan)}`;
}

export function buildReleaseBody(env: ReleaseEnv, approvals: readonly Approval[]): string {
  const sections = ["## Summary", summaryLines(env, planLabel(env.plan)).join("\n")];

  const environments = environmentLines(env);
  if (environments.length > 0) {
    sections.push("\n## Results by environment", environments.join("\n"));
  }
  const artifacts = artifactLines(env);
  if (artifacts.length > 0) {
    sections.push("\n## Artifacts", artifacts.join("\n"));
  }
  sections.push(
    "\n## Approvals",
    approvals.length > 0
      ? approvals.map((a) => `- @${a.user} (${a.state})`).join("\n")
      : "_No approvals recorded_",
    "\n## Change summary (to complete)",
    "_Edit this release and document the promoted changes._",
    "\n---\n_Generated automatically by GitHub Actions._",
  );
  return sections.join("\n\n");
}

export function buildReleasePayload(env: ReleaseEnv, approvals: readonly Approval[]): ReleasePayload {
  return {
    tagName: releaseTag(env),
    name: releaseName(env),
    body: buildReleaseBody(env, approvals),
    draft: false,
    prerelease: false,
    targetCommitish: env.gitSha || env.gitRef || "main",
  };
}
