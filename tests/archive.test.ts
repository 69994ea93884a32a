/**
 * Archive Expander Tests
 *
 * Verifies:
 * - Zip detection by signature, regardless of file extension
 * - Extraction target naming (extension stripped / `_extracted` suffix)
 * - Extraction of nested paths, idempotent re-expansion
 * - Corrupt archives are fatal
 */

import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import PizZip from "pizzip";
import { expandArchive, extractionTarget, isZipArchive } from "../src/artifacts/archive.js";
import { CorruptArchiveError } from "../src/shared/errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEMP_ROOT = path.resolve(__dirname, ".tmp_archive_test");

function makeZip(files: Record<string, string | Buffer>): Buffer {
  const zip = new PizZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  return Buffer.from(zip.generate({ type: "nodebuffer" }));
}

beforeEach(() => {
  rmSync(TEMP_ROOT, { recursive: true, force: true });
  mkdirSync(TEMP_ROOT, { recursive: true });
});

afterAll(() => {
  rmSync(TEMP_ROOT, { recursive: true, force: true });
});

describe("isZipArchive", () => {
  it("detects a zip by its signature", () => {
    const file = path.join(TEMP_ROOT, "bundle.zip");
    writeFileSync(file, makeZip({ "a.txt": "a" }));
    expect(isZipArchive(file)).toBe(true);
  });

  it("detects a zip with a misleading or missing extension", () => {
    const noExt = path.join(TEMP_ROOT, "bundle");
    const jar = path.join(TEMP_ROOT, "plugin.jar");
    writeFileSync(noExt, makeZip({ "a.txt": "a" }));
    writeFileSync(jar, makeZip({ "b.txt": "b" }));
    expect(isZipArchive(noExt)).toBe(true);
    expect(isZipArchive(jar)).toBe(true);
  });

  it("rejects a text file named .zip", () => {
    const file = path.join(TEMP_ROOT, "fake.zip");
    writeFileSync(file, "not really a zip");
    expect(isZipArchive(file)).toBe(false);
  });

  it("rejects files shorter than a signature, directories and missing paths", () => {
    const tiny = path.join(TEMP_ROOT, "tiny");
    writeFileSync(tiny, "PK");
    expect(isZipArchive(tiny)).toBe(false);
    expect(isZipArchive(TEMP_ROOT)).toBe(false);
    expect(isZipArchive(path.join(TEMP_ROOT, "nope.zip"))).toBe(false);
  });
});

describe("extractionTarget", () => {
  it("strips the last extension", () => {
    expect(extractionTarget("/artifacts/export.zip")).toBe("/artifacts/export");
    expect(extractionTarget("/artifacts/export.tar.zip")).toBe("/artifacts/export.tar");
  });

  it("appends _extracted when there is no extension", () => {
    expect(extractionTarget("/artifacts/export")).toBe("/artifacts/export_extracted");
  });
});

describe("expandArchive", () => {
  it("returns null for a non-archive", () => {
    const file = path.join(TEMP_ROOT, "app.properties");
    writeFileSync(file, "x=1");
    expect(expandArchive(file)).toBeNull();
  });

  it("extracts all entries, including nested directories", () => {
    const file = path.join(TEMP_ROOT, "export.zip");
    writeFileSync(
      file,
      makeZip({
        "root.txt": "top",
        "customization/app.properties": "x=1",
      }),
    );

    const target = expandArchive(file);

    expect(target).toBe(path.join(TEMP_ROOT, "export"));
    expect(readFileSync(path.join(TEMP_ROOT, "export", "root.txt"), "utf-8")).toBe("top");
    expect(
      readFileSync(path.join(TEMP_ROOT, "export", "customization", "app.properties"), "utf-8"),
    ).toBe("x=1");
  });

  it("extracts an archive without extension into <name>_extracted", () => {
    const file = path.join(TEMP_ROOT, "payload");
    writeFileSync(file, makeZip({ "a.cfg": "k=v" }));
    expect(expandArchive(file)).toBe(path.join(TEMP_ROOT, "payload_extracted"));
    expect(existsSync(path.join(TEMP_ROOT, "payload_extracted", "a.cfg"))).toBe(true);
  });

  it("does not re-extract when the target already exists", () => {
    const file = path.join(TEMP_ROOT, "export.zip");
    writeFileSync(file, makeZip({ "app.properties": "x=1" }));

    const first = expandArchive(file);
    const extracted = path.join(TEMP_ROOT, "export", "app.properties");
    writeFileSync(extracted, "x=edited");

    const second = expandArchive(file);

    expect(second).toBe(first);
    expect(readFileSync(extracted, "utf-8")).toBe("x=edited");
  });

  it("leaves inner archives in place for the collector to expand", () => {
    const inner = makeZip({ "app.properties": "x=1" });
    const file = path.join(TEMP_ROOT, "outer.zip");
    writeFileSync(file, makeZip({ "inner.zip": inner }));

    const target = expandArchive(file);
    expect(target).toBe(path.join(TEMP_ROOT, "outer"));
    const innerPath = path.join(TEMP_ROOT, "outer", "inner.zip");
    expect(isZipArchive(innerPath)).toBe(true);
    expect(expandArchive(innerPath)).toBe(path.join(TEMP_ROOT, "outer", "inner"));
    expect(existsSync(path.join(TEMP_ROOT, "outer", "inner", "app.properties"))).toBe(true);
  });

  it("throws CorruptArchiveError for a truncated zip", () => {
    const file = path.join(TEMP_ROOT, "broken.zip");
    writeFileSync(file, Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.from("garbage")]));

    expect(() => expandArchive(file)).toThrow(CorruptArchiveError);
    expect(existsSync(path.join(TEMP_ROOT, "broken"))).toBe(false);
  });
});
