/**
 * Candidate Selector — picks the one file to treat as the override template.
 *
 * Order of preference:
 *   1. `.properties` (the canonical template format)
 *   2. `.txt` / `.cfg`
 *   3. any other allow-listed extension
 * Ties go to the shorter name, then the lexicographically earlier one. Both
 * count Unicode code points, not UTF-16 units.
 */

import { readFileSync } from "fs";
import path from "path";

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([
  ".properties",
  ".cfg",
  ".conf",
  ".ini",
  ".env",
  ".txt",
]);

export type RankKey = readonly [priority: number, nameLength: number, name: string];

/** Whether the whole file decodes as UTF-8. Read failures count as "not text". */
export function isTextFile(filePath: string): boolean {
  try {
    new TextDecoder("utf-8", { fatal: true }).decode(readFileSync(filePath));
    return true;
  } catch {
    return false;
  }
}

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function rankKey(filePath: string): RankKey {
  const ext = extensionOf(filePath);
  const name = path.basename(filePath);
  let priority = 2;
  if (ext === ".properties") priority = 0;
  else if (ext === ".txt" || ext === ".cfg") priority = 1;
  return [priority, [...name].length, name];
}

/** Orders strings by code point, so astral characters sort after the whole BMP. */
export function compareCodePoints(a: string, b: string): number {
  const ca = [...a];
  const cb = [...b];
  const n = Math.min(ca.length, cb.length);
  for (let i = 0; i < n; i++) {
    const diff = (ca[i].codePointAt(0) ?? 0) - (cb[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return ca.length - cb.length;
}

export function compareCandidates(a: string, b: string): number {
  const [pa, la, na] = rankKey(a);
  const [pb, lb, nb] = rankKey(b);
  if (pa !== pb) return pa - pb;
  if (la !== lb) return la - lb;
  const byName = compareCodePoints(na, nb);
  if (byName !== 0) return byName;
  // same file name in different directories
  return compareCodePoints(a, b);
}

/**
 * Choose the best template among `files`, or null if none qualifies.
 * Only text files with an allow-listed extension are eligible; there is no
 * fallback to other text files.
 */
export function selectCandidate(files: Iterable<string>): string | null {
  const eligible = [...files].filter(
    (f) => ALLOWED_EXTENSIONS.has(extensionOf(f)) && isTextFile(f),
  );
  if (eligible.length === 0) return null;
  return eligible.sort(compareCandidates)[0];
}
