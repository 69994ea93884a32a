/**
 * Release Announcement Tests
 *
 * Verifies:
 * - Tag and release naming for app and package deployments
 * - Summary, per-environment, artifact and approval sections of the body
 * - Helper formatting (slugs, status icons, branches, timestamps)
 */

import { describe, it, expect } from "vitest";
import {
  buildReleaseBody,
  buildReleasePayload,
  deriveBranch,
  formatStartedAt,
  planLabel,
  sanitizeSlug,
  statusIcon,
} from "../src/release/announcement.js";
import { loadReleaseEnv } from "../src/shared/env.js";

const BASE_ENV = {
  GITHUB_TOKEN: "test-token",
  GITHUB_REPOSITORY: "acme/deployments",
};

const APP_RUN = {
  ...BASE_ENV,
  PLAN: "dev-qa-prod",
  RUN_ID: "1234",
  RUN_NUMBER: "56",
  RUN_URL: "https://github.com/acme/deployments/actions/runs/1234",
  APP_NAME: "Billing App",
  GIT_REF: "refs/heads/release/2.0",
  GIT_SHA: "abcdef1234567",
  ARTIFACT_NAME: "billing-export",
  ARTIFACT_DIR: "./exports/billing",
  ICF_TEMPLATE_STATUS: "ready",
  ICF_TEMPLATE_FILE: "icf.properties",
  PROMOTE_QA_RESULT: "success",
  PROMOTE_PROD_FROM_QA_RESULT: "failure",
  TRIGGERING_ACTOR: "octo",
};

describe("helpers", () => {
  it("sanitizeSlug collapses unsafe characters", () => {
    expect(sanitizeSlug("Billing App")).toBe("Billing-App");
    expect(sanitizeSlug("  core/lib v2!! ")).toBe("core-lib-v2");
    expect(sanitizeSlug("***")).toBe("run");
  });

  it("statusIcon maps known results and defaults the rest", () => {
    expect(statusIcon("success")).toBe("✅ success");
    expect(statusIcon("skipped")).toBe("⚪ skipped");
    expect(statusIcon("")).toBe("ℹ️ unknown");
    expect(statusIcon("weird")).toBe("ℹ️ weird");
  });

  it("deriveBranch prefers the ref name, then refs/heads, then the ref", () => {
    expect(deriveBranch("main", "refs/heads/other")).toBe("main");
    expect(deriveBranch("", "refs/heads/feature/x")).toBe("feature/x");
    expect(deriveBranch("", "refs/tags/v1")).toBe("refs/tags/v1");
    expect(deriveBranch("", "")).toBe("main");
  });

  it("formatStartedAt renders UTC and passes through unparseable input", () => {
    expect(formatStartedAt("2024-05-01T10:15:30Z")).toBe("2024-05-01 10:15:30 UTC");
    expect(formatStartedAt("2024-05-01T12:15:30+02:00")).toBe("2024-05-01 10:15:30 UTC");
    expect(formatStartedAt("yesterday")).toBe("yesterday");
    expect(formatStartedAt("")).toBe("");
  });

  it("planLabel knows the three plans", () => {
    expect(planLabel("dev-to-qa")).toBe("Dev → QA");
    expect(planLabel("custom")).toBe("custom");
    expect(planLabel("")).toBe("unknown plan");
  });
});

describe("buildReleasePayload — app deployment", () => {
  const env = loadReleaseEnv(APP_RUN);
  const payload = buildReleasePayload(env, [{ user: "lead", state: "approved" }]);
  const lines = payload.body.split("\n");

  it("names the tag and release after the app and plan", () => {
    expect(payload.tagName).toBe("deploy-app-Billing-App-1234");
    expect(payload.name).toBe("Deploy App · Dev → QA → Prod");
    expect(payload.targetCommitish).toBe("abcdef1234567");
    expect(payload.draft).toBe(false);
    expect(payload.prerelease).toBe(false);
  });

  it("opens with the run summary", () => {
    expect(lines.slice(0, 9)).toEqual([
      "## Summary",
      "",
      "- Run: [56](https://github.com/acme/deployments/actions/runs/1234)",
      "- Plan: `dev-qa-prod` (Dev → QA → Prod)",
      "- Kind: app",
      "- Triggered by: @octo",
      "- App: Billing App",
      "- Ref: `refs/heads/release/2.0` @ abcdef1",
      "",
    ]);
  });

  it("reports each target environment", () => {
    expect(lines).toContain("- QA: ✅ success");
    expect(lines).toContain("- Prod: ❌ failure");
  });

  it("links artifacts on the deployed branch", () => {
    expect(lines).toContain("- Export artifact: `billing-export`");
    expect(lines).toContain(
      "- Sandbox dir: [./exports/billing](https://github.com/acme/deployments/tree/release/2.0/exports/billing)",
    );
    expect(lines).toContain(
      "- ICF template: ready [./exports/billing/icf.properties](https://github.com/acme/deployments/blob/release/2.0/exports/billing/icf.properties)",
    );
    expect(lines).toContain(
      "- Artifacts (run): [view in GitHub Actions](https://github.com/acme/deployments/actions/runs/1234#artifacts)",
    );
  });

  it("lists approvals and ends with the footer", () => {
    expect(lines).toContain("- @lead (approved)");
    expect(payload.body.endsWith("\n\n\n---\n_Generated automatically by GitHub Actions._")).toBe(true);
  });

  it("orders the sections", () => {
    const headings = lines.filter((l) => l.startsWith("## "));
    expect(headings).toEqual([
      "## Summary",
      "## Results by environment",
      "## Artifacts",
      "## Approvals",
      "## Change summary (to complete)",
    ]);
  });
});

describe("buildReleasePayload — package deployment", () => {
  it("uses the package name for tag and release name", () => {
    const env = loadReleaseEnv({
      ...BASE_ENV,
      DEPLOY_KIND: "package",
      PACKAGE_NAME: "core/lib v2",
      PLAN: "qa-to-prod",
      RUN_NUMBER: "7",
      GIT_REF: "refs/heads/main",
    });

    const payload = buildReleasePayload(env, []);

    expect(payload.tagName).toBe("deploy-package-core-lib-v2-7");
    expect(payload.name).toBe("Deploy Package · core/lib v2 · QA → Prod");
    expect(payload.targetCommitish).toBe("refs/heads/main");
    expect(payload.body.split("\n")).toContain("- Package: core/lib v2");
    expect(payload.body.split("\n")).toContain("- Prod: ℹ️ unknown");
  });
});

describe("buildReleaseBody — sparse environment", () => {
  it("falls back to placeholders when little is known", () => {
    const env = loadReleaseEnv({
      ...BASE_ENV,
      PACKAGE_FILE_NAME: "pkg.zip",
      ICF_TEMPLATE_STATUS: "missing",
    });

    const body = buildReleaseBody(env, []);
    const lines = body.split("\n");

    expect(lines).toContain("- Run: ");
    expect(lines).toContain("- Plan: `unknown` (unknown plan)");
    expect(lines).toContain("- Package file: `pkg.zip`");
    expect(lines).toContain("- ICF template: missing (no file)");
    expect(lines).toContain("_No approvals recorded_");
    expect(lines).not.toContain("## Results by environment");
    expect(buildReleasePayload(env, []).tagName).toBe("deploy-app-app-run");
    expect(buildReleasePayload(env, []).targetCommitish).toBe("main");
  });
});
