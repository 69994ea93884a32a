/**
 * Export Metadata — the JSON record left next to an exported artifact,
 * combining the export step's outputs with the template step's results.
 *
 * Written to `<DEST>/export-metadata.json`; later jobs read it instead of
 * re-deriving paths.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import type { MetadataEnv } from "../shared/env.js";
import { decodeBase64 } from "../outputs/github_output.js";

export const METADATA_FILE_NAME = "export-metadata.json";

export interface ExportMetadata {
  artifact_name: string;
  artifact_path: string;
  artifact_dir: string;
  manifest_path: string;
  raw_response_path: string;
  deployment_uuid: string;
  deployment_status: string;
  database_scripts: unknown;
  plugins_zip: string;
  customization_file: string;
  customization_template: string;
  downloaded_files: unknown;
  icf_template_status: string;
  icf_template_file: string;
  icf_overrides_present: boolean;
  database_scripts_present: boolean;
}

/** `destDir/<basename of outputValue>`, or `destDir/fallbackName` when unset. */
export function resolvedPath(destDir: string, outputValue: string | undefined, fallbackName: string): string {
  if (!outputValue) return path.join(destDir, fallbackName);
  return path.join(destDir, path.basename(outputValue));
}

export function parseJsonValue(value: string | undefined, fallback: unknown): unknown {
  if (!value) return fallback;
  try {
    return JSON.parse(value) as unknown;
  } catch {
    return fallback;
  }
}

/** Truthiness with JSON semantics: empty arrays, objects and strings are false. */
export function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value !== null && typeof value === "object") return Object.keys(value).length > 0;
  return Boolean(value);
}

/** Whether a base64 JSON overrides payload holds anything. Undecodable input counts as absent. */
export function overridesPresent(encoded: string | undefined): boolean {
  if (!encoded) return false;
  return isPresent(parseJsonValue(decodeBase64(encoded), null));
}

export function buildExportMetadata(env: MetadataEnv): ExportMetadata {
  const destDir = env.destDir;
  const artifactZipName = env.artifactPath
    ? path.basename(env.artifactPath)
    : `${env.artifactName}.zip`;
  const databaseScripts = parseJsonValue(env.databaseScriptsJson, []);

  return {
    artifact_name: env.artifactName,
    artifact_path: path.join(destDir, artifactZipName),
    artifact_dir: destDir,
    manifest_path: resolvedPath(destDir, env.manifestPath, "export-manifest.json"),
    raw_response_path: resolvedPath(destDir, env.rawResponsePath, "export-response.json"),
    deployment_uuid: env.deploymentUuid,
    deployment_status: env.deploymentStatus,
    database_scripts: databaseScripts,
    plugins_zip: env.pluginsZip,
    customization_file: env.customizationFile,
    customization_template: env.customizationTemplate,
    downloaded_files: parseJsonValue(env.downloadedFilesJson, []),
    icf_template_status: env.templateStatus,
    icf_template_file: env.templateFile,
    icf_overrides_present: overridesPresent(env.overridesJsonB64),
    database_scripts_present: isPresent(databaseScripts),
  };
}

/** Build the record and write it under `DEST`, creating the directory. Returns the file path. */
export function writeExportMetadata(env: MetadataEnv): string {
  const metadata = buildExportMetadata(env);
  mkdirSync(env.destDir, { recursive: true });
  const metadataPath = path.join(env.destDir, METADATA_FILE_NAME);
  writeFileSync(metadataPath, JSON.stringify(metadata, null, 2), "utf-8");
  return metadataPath;
}
