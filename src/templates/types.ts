/**
 * Template engine result types.
 */

/**
 * - ready:    a template was found in the artifacts and declares overrides
 * - empty:    a template was found but declares no overrides
 * - fallback: nothing usable in the artifacts; the fallback template was read
 * - missing:  no template content at all
 */
export type TemplateStatus = "ready" | "empty" | "fallback" | "missing";

export interface TemplateResult {
  readonly status: TemplateStatus;
  /** Full path of the file the content came from. */
  readonly sourcePath?: string;
  readonly fileName?: string;
  readonly content?: string;
  /** SHA-256 of `content`. */
  readonly contentSha256?: string;
  readonly overrides: ReadonlyMap<string, string>;
}

export interface ResolveInput {
  /** Plain files collected from the artifact tree. */
  files: Iterable<string>;
  fallbackPath?: string;
}

export interface PrepareInput {
  artifactDir?: string;
  fallbackPath?: string;
}
