/**
 * Tree Collector — breadth-first walk over the artifact tree.
 *
 * Zip archives met along the way are expanded and their contents queued as
 * further directories, so a template buried in `export.zip/customization.zip`
 * is reached without any caller knowing the nesting.
 */

import { existsSync, readdirSync, realpathSync, statSync } from "fs";
import path from "path";
import { expandArchive } from "./archive.js";

/** Subdirectories searched before the artifact root itself, in priority order. */
export const TEMPLATE_SUBDIRS = ["customization-template", "customization"] as const;

export function templateSearchRoots(artifactRoot: string): string[] {
  return [...TEMPLATE_SUBDIRS.map((sub) => path.join(artifactRoot, sub)), artifactRoot];
}

function isDirectory(p: string): boolean {
  return statSync(p).isDirectory();
}

/**
 * Collect every plain file reachable from `roots`. Each directory is visited
 * at most once per call, even when roots overlap or symlinks loop back.
 * Missing roots are skipped.
 */
export function collectFiles(roots: readonly string[]): Set<string> {
  const files = new Set<string>();
  const visited = new Set<string>();
  const queue: string[] = roots.filter((root) => existsSync(root));

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || !existsSync(current)) continue;

    const key = realpathSync(current);
    if (visited.has(key)) continue;
    visited.add(key);

    if (!isDirectory(current)) continue;

    for (const name of readdirSync(current)) {
      const entry = path.join(current, name);
      if (!existsSync(entry)) continue; // dangling symlink

      if (isDirectory(entry)) {
        queue.push(entry);
        continue;
      }
      if (!statSync(entry).isFile()) continue;

      const expanded = expandArchive(entry);
      if (expanded !== null) {
        queue.push(expanded);
        continue;
      }
      files.add(entry);
    }
  }

  return files;
}
