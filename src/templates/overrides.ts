/**
 * Override Parser — turns template text into `key=value` overrides.
 *
 * Template layout:
 *
 *   ## Explanatory header, never parsed
 *   ## ---------------- overrides ----------------
 *   #db.host=example.internal      <- commented example, still counted
 *   feature.flag=true
 *
 * Everything above the first `##` line containing `----` is ignored. Below
 * it, `##` lines are comments while single-`#` lines are read as entries
 * once the `#` run is stripped.
 */

/** Ordered key → value overrides; later duplicates replace earlier ones. */
export type OverrideMap = Map<string, string>;

// Every Unicode line boundary, not only CR/LF.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

function isSectionMarker(line: string): boolean {
  return line.trim().startsWith("##") && line.includes("----");
}

/** Index of the first line after the section marker, or 0 when there is none. */
export function findSectionStart(lines: readonly string[]): number {
  const marker = lines.findIndex(isSectionMarker);
  return marker === -1 ? 0 : marker + 1;
}

function parseLine(raw: string): [string, string] | null {
  let line = raw.trim();
  if (!line || line.startsWith("##")) return null;
  if (line.startsWith("#")) {
    line = line.replace(/^#+/, "").trim();
  }
  if (!line || line.startsWith("#")) return null;

  const eq = line.indexOf("=");
  if (eq === -1) return null;
  return [line.slice(0, eq).trim(), line.slice(eq + 1).trim()];
}

export function parseOverrides(text: string): OverrideMap {
  const lines = text.split(LINE_BREAK);
  const overrides: OverrideMap = new Map();
  for (const raw of lines.slice(findSectionStart(lines))) {
    const pair = parseLine(raw);
    if (pair) overrides.set(pair[0], pair[1]);
  }
  return overrides;
}

/** `key=value` lines, one per override, in insertion order. */
export function serializeOverrides(overrides: ReadonlyMap<string, string>): string {
  return [...overrides].map(([key, value]) => `${key}=${value}`).join("\n");
}

export function overridesToObject(overrides: ReadonlyMap<string, string>): Record<string, string> {
  return Object.fromEntries(overrides);
}

/** Flat JSON object with 2-space indentation, as consumed by the deploy job. */
export function overridesToJson(overrides: ReadonlyMap<string, string>): string {
  return JSON.stringify(overridesToObject(overrides), null, 2);
}
