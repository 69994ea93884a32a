/**
 * Template Resolver
 *
 * Pipeline:
 *   search roots → collectFiles → selectCandidate → read → parseOverrides
 *
 * When the artifacts hold no usable template the caller's fallback file is
 * read instead. The result always carries a status so the workflow can
 * branch on it, even when nothing was found.
 */

import { readFileSync, statSync } from "fs";
import path from "path";
import { collectFiles, templateSearchRoots } from "../artifacts/collector.js";
import { sha256String } from "../shared/hash.js";
import { info, notice } from "../shared/log.js";
import { encodeBase64, type OutputEntry } from "../outputs/github_output.js";
import { selectCandidate } from "./selector.js";
import { overridesToJson, parseOverrides } from "./overrides.js";
import type { PrepareInput, ResolveInput, TemplateResult, TemplateStatus } from "./types.js";

function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

function readText(p: string): string | undefined {
  try {
    return readFileSync(p, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    notice(`Could not read template ${p}: ${reason}`);
    return undefined;
  }
}

export function resolveTemplate(input: ResolveInput): TemplateResult {
  let status: TemplateStatus = "missing";
  let content: string | undefined;
  let sourcePath: string | undefined;

  const chosen = selectCandidate(input.files);
  if (chosen !== null) {
    info(`Template found: ${chosen}`);
    status = "ready";
    content = readText(chosen);
    if (content !== undefined) sourcePath = chosen;
  } else {
    notice(
      "No template found in the downloaded artifacts; the deployment will continue without overrides.",
    );
  }

  if (content === undefined && input.fallbackPath && isFile(input.fallbackPath)) {
    info(`Using fallback template ${input.fallbackPath}`);
    content = readText(input.fallbackPath);
    if (content !== undefined) {
      sourcePath = input.fallbackPath;
      // a chosen but unreadable candidate keeps its status
      if (status === "missing") status = "fallback";
    }
  }

  if (content === undefined || sourcePath === undefined) {
    const nothing: TemplateResult = { status: "missing", overrides: new Map<string, string>() };
    return Object.freeze(nothing);
  }

  const overrides = parseOverrides(content);
  if (overrides.size === 0) {
    if (status === "ready") status = "empty";
    notice(
      `The template (${sourcePath}) contains no key=value entries. ` +
        "No overrides will be generated; add 'key=value' lines to suggest some.",
    );
  } else {
    notice(`Generated ${overrides.size} override(s) from ${sourcePath}.`);
  }

  return Object.freeze({
    status,
    sourcePath,
    fileName: path.basename(sourcePath),
    content,
    contentSha256: sha256String(content),
    overrides,
  });
}

/** Search the artifact tree (if any) and resolve the template. */
export function prepareTemplate(input: PrepareInput): TemplateResult {
  let files = new Set<string>();
  if (input.artifactDir) {
    info(`Searching for templates in ${input.artifactDir}`);
    files = collectFiles(templateSearchRoots(input.artifactDir));
  } else {
    notice("ARTIFACT_DIR is not set; skipping the template search.");
  }
  return resolveTemplate({ files, fallbackPath: input.fallbackPath });
}

/**
 * Step outputs for a result. Content and overrides are base64-encoded; the
 * QA and Prod override outputs carry the same payload. Status comes last and
 * is always present.
 */
export function templateOutputs(result: TemplateResult): OutputEntry[] {
  if (result.content === undefined) {
    return [{ name: "icf_template_status", value: result.status }];
  }
  const overrides = encodeBase64(overridesToJson(result.overrides));
  return [
    { name: "icf_template_path", value: result.sourcePath },
    { name: "icf_template_source", value: result.sourcePath },
    { name: "icf_template_file", value: result.fileName },
    { name: "icf_template_content_b64", value: encodeBase64(result.content) },
    { name: "icf_overrides_json_b64", value: overrides },
    { name: "icf_overrides_qa_json_b64", value: overrides },
    { name: "icf_overrides_prod_json_b64", value: overrides },
    { name: "icf_template_sha256", value: result.contentSha256 },
    { name: "icf_template_status", value: result.status },
  ];
}
