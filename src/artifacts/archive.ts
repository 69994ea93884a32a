/**
 * Archive Expander — extracts zip artifacts next to themselves so the tree
 * walk can descend into them.
 *
 * Archives are recognised by signature, not extension: exported bundles
 * arrive as `.zip`, `.jar`, or with no extension at all.
 */

import { closeSync, existsSync, mkdirSync, openSync, readFileSync, readSync, rmSync, statSync, writeFileSync } from "fs";
import path from "path";
import PizZip from "pizzip";
import { CorruptArchiveError } from "../shared/errors.js";
import { info } from "../shared/log.js";

const ZIP_SIGNATURES = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]), // local file header
  Buffer.from([0x50, 0x4b, 0x05, 0x06]), // empty archive
  Buffer.from([0x50, 0x4b, 0x07, 0x08]), // spanned archive
];

/** True when the file starts with a zip signature. Unreadable files are not archives. */
export function isZipArchive(filePath: string): boolean {
  let fd: number | undefined;
  try {
    if (!statSync(filePath).isFile()) return false;
    fd = openSync(filePath, "r");
    const head = Buffer.alloc(4);
    const read = readSync(fd, head, 0, head.length, 0);
    if (read < head.length) return false;
    return ZIP_SIGNATURES.some((sig) => sig.equals(head));
  } catch {
    return false;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}

/**
 * Directory an archive expands into: `bundle.zip` → `bundle`,
 * `bundle` (no extension) → `bundle_extracted`.
 */
export function extractionTarget(archivePath: string): string {
  const dir = path.dirname(archivePath);
  const base = path.basename(archivePath);
  const ext = path.extname(base);
  if (ext) {
    return path.join(dir, base.slice(0, -ext.length));
  }
  return path.join(dir, `${base}_extracted`);
}

/**
 * Expand `filePath` if it is a zip archive and return the directory to walk,
 * or null when it is not an archive. An existing target is returned untouched.
 */
export function expandArchive(filePath: string): string | null {
  if (!isZipArchive(filePath)) return null;

  const target = extractionTarget(filePath);
  if (existsSync(target)) return target;

  info(`Extracting zip ${filePath} into ${target}`);
  let zip: PizZip;
  try {
    zip = new PizZip(readFileSync(filePath));
  } catch (err) {
    throw new CorruptArchiveError(filePath, err);
  }

  mkdirSync(target, { recursive: true });
  try {
    writeEntries(zip, filePath, path.resolve(target));
  } catch (err) {
    // a partial target would pass for an expanded archive on the next run
    rmSync(target, { recursive: true, force: true });
    throw err;
  }

  return target;
}

function writeEntries(zip: PizZip, archivePath: string, root: string): void {
  for (const [name, entry] of Object.entries(zip.files)) {
    const dest = path.resolve(root, name);
    if (dest !== root && !dest.startsWith(root + path.sep)) {
      throw new CorruptArchiveError(archivePath, `entry "${name}" escapes the extraction directory`);
    }
    if (entry.dir) {
      mkdirSync(dest, { recursive: true });
      continue;
    }
    let data: Uint8Array;
    try {
      data = entry.asUint8Array();
    } catch (err) {
      throw new CorruptArchiveError(archivePath, err);
    }
    mkdirSync(path.dirname(dest), { recursive: true });
    writeFileSync(dest, data);
  }
}
