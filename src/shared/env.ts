/**
 * Environment Configuration
 *
 * Each CLI reads its inputs from environment variables set by the workflow
 * step. Values are trimmed and empty strings count as unset, since the
 * workflow passes `${{ ... }}` expressions that often expand to "".
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

const optionalVar = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

function requiredVar(name: string) {
  return optionalVar.refine((v): v is string => v !== undefined, {
    message: `${name} is required`,
  });
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => i.message).join("; ");
    throw new ConfigError(issues);
  }
  return parsed.data;
}

// ── prepare-template ────────────────────────────────────────────────

export const TemplateEnvSchema = z
  .object({
    ARTIFACT_DIR: optionalVar,
    FALLBACK_TEMPLATE_PATH: optionalVar,
    GITHUB_OUTPUT: optionalVar,
  })
  .transform((e) => ({
    artifactDir: e.ARTIFACT_DIR,
    fallbackPath: e.FALLBACK_TEMPLATE_PATH,
    outputFile: e.GITHUB_OUTPUT,
  }));

export type TemplateEnv = z.output<typeof TemplateEnvSchema>;

export function loadTemplateEnv(env: Env = process.env): TemplateEnv {
  return parseEnv(TemplateEnvSchema, env);
}

// ── write-export-metadata ───────────────────────────────────────────

export const MetadataEnvSchema = z
  .object({
    DEST: optionalVar,
    ARTIFACT_NAME: optionalVar,
    ARTIFACT_PATH: optionalVar,
    MANIFEST_PATH: optionalVar,
    RAW_RESPONSE_PATH: optionalVar,
    DEPLOYMENT_UUID: optionalVar,
    DEPLOYMENT_STATUS: optionalVar,
    DATABASE_SCRIPTS_JSON: optionalVar,
    DOWNLOADED_FILES_JSON: optionalVar,
    PLUGINS_ZIP: optionalVar,
    CUSTOMIZATION_FILE: optionalVar,
    CUSTOMIZATION_TEMPLATE: optionalVar,
    ICF_TEMPLATE_STATUS: optionalVar,
    ICF_TEMPLATE_FILE: optionalVar,
    ICF_OVERRIDES_JSON_B64: optionalVar,
  })
  .transform((e) => ({
    destDir: e.DEST ?? ".",
    artifactName: e.ARTIFACT_NAME ?? "",
    artifactPath: e.ARTIFACT_PATH,
    manifestPath: e.MANIFEST_PATH,
    rawResponsePath: e.RAW_RESPONSE_PATH,
    deploymentUuid: e.DEPLOYMENT_UUID ?? "",
    deploymentStatus: e.DEPLOYMENT_STATUS ?? "",
    databaseScriptsJson: e.DATABASE_SCRIPTS_JSON,
    downloadedFilesJson: e.DOWNLOADED_FILES_JSON,
    pluginsZip: e.PLUGINS_ZIP ?? "",
    customizationFile: e.CUSTOMIZATION_FILE ?? "",
    customizationTemplate: e.CUSTOMIZATION_TEMPLATE ?? "",
    templateStatus: e.ICF_TEMPLATE_STATUS ?? "missing",
    templateFile: e.ICF_TEMPLATE_FILE ?? "",
    overridesJsonB64: e.ICF_OVERRIDES_JSON_B64,
  }));

export type MetadataEnv = z.output<typeof MetadataEnvSchema>;

export function loadMetadataEnv(env: Env = process.env): MetadataEnv {
  return parseEnv(MetadataEnvSchema, env);
}

// ── create-release ──────────────────────────────────────────────────

export const ReleaseEnvSchema = z
  .object({
    GITHUB_TOKEN: requiredVar("GITHUB_TOKEN"),
    GITHUB_REPOSITORY: optionalVar,
    REPOSITORY: optionalVar,
    GITHUB_API_URL: optionalVar,
    DEPLOY_KIND: optionalVar,
    PLAN: optionalVar,
    RUN_ID: optionalVar,
    RUN_NUMBER: optionalVar,
    RUN_URL: optionalVar,
    RUN_STARTED_AT: optionalVar,
    GIT_REF: optionalVar,
    GIT_SHA: optionalVar,
    GIT_REF_NAME: optionalVar,
    APP_NAME: optionalVar,
    PACKAGE_NAME: optionalVar,
    ARTIFACT_NAME: optionalVar,
    ARTIFACT_DIR: optionalVar,
    METADATA_PATH: optionalVar,
    PACKAGE_ARTIFACT_NAME: optionalVar,
    PACKAGE_FILE_NAME: optionalVar,
    PACKAGE_STATUS: optionalVar,
    ICF_TEMPLATE_STATUS: optionalVar,
    ICF_TEMPLATE_FILE: optionalVar,
    PROMOTE_QA_RESULT: optionalVar,
    PROMOTE_PROD_AFTER_QA_RESULT: optionalVar,
    PROMOTE_PROD_FROM_QA_RESULT: optionalVar,
    TRIGGERING_ACTOR: optionalVar,
    TRIGGER_ACTOR: optionalVar,
    INITIATED_BY: optionalVar,
  })
  .transform((e) => ({
    token: e.GITHUB_TOKEN,
    repository: e.GITHUB_REPOSITORY ?? e.REPOSITORY,
    apiUrl: e.GITHUB_API_URL ?? "https://api.github.com",
    deployKind: e.DEPLOY_KIND ?? "app",
    plan: e.PLAN ?? "",
    runId: e.RUN_ID ?? "",
    runNumber: e.RUN_NUMBER ?? "",
    runUrl: e.RUN_URL ?? "",
    runStartedAt: e.RUN_STARTED_AT ?? "",
    gitRef: e.GIT_REF ?? "",
    gitSha: e.GIT_SHA ?? "",
    gitRefName: e.GIT_REF_NAME ?? "",
    appName: e.APP_NAME ?? "",
    packageName: e.PACKAGE_NAME ?? "",
    artifactName: e.ARTIFACT_NAME ?? "",
    artifactDir: e.ARTIFACT_DIR ?? "",
    metadataPath: e.METADATA_PATH ?? "",
    packageArtifactName: e.PACKAGE_ARTIFACT_NAME ?? "",
    packageFileName: e.PACKAGE_FILE_NAME ?? "",
    packageStatus: e.PACKAGE_STATUS ?? "",
    templateStatus: e.ICF_TEMPLATE_STATUS ?? "",
    templateFile: e.ICF_TEMPLATE_FILE ?? "",
    promoteQa: e.PROMOTE_QA_RESULT ?? "",
    promoteProdAfterQa: e.PROMOTE_PROD_AFTER_QA_RESULT ?? "",
    promoteProdFromQa: e.PROMOTE_PROD_FROM_QA_RESULT ?? "",
    triggeringActor: e.TRIGGERING_ACTOR ?? e.TRIGGER_ACTOR ?? e.INITIATED_BY ?? "",
  }))
  .refine((c) => c.repository !== undefined && c.repository.includes("/"), {
    message: "GITHUB_REPOSITORY is not set",
  });

export type ReleaseEnv = z.output<typeof ReleaseEnvSchema> & { repository: string };

export function loadReleaseEnv(env: Env = process.env): ReleaseEnv {
  const parsed = parseEnv(ReleaseEnvSchema, env);
  const repository = parsed.repository;
  if (repository === undefined) {
    throw new ConfigError("GITHUB_REPOSITORY is not set");
  }
  return { ...parsed, repository };
}
