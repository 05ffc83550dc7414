// Artifact Sealer
//
// MANIFEST.sha256 lists one `<sha256> <sep><path>` line per file, sorted by
// forward-slash relative path in code-unit order, "\n" terminated.
//   binary: `<hex> *<path>`
//   text:   `<hex>  <path>`

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { MANIFEST_NAME } from "@sssl/contracts";
import type { ManifestEntryV1, ManifestLineStyle } from "@sssl/contracts";
import { MissingArtifact, ValidationError } from "@sssl/kernel";

export const HASH_CHUNK_BYTES = 1024 * 1024;

export async function sha256File(filePath: string): Promise<string> {
  const h = createHash("sha256");
  const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES });
  for await (const chunk of stream) {
    h.update(chunk);
  }
  return h.digest("hex");
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Regular files under `dir`, recursively, as sorted forward-slash relative
 * paths. Files named MANIFEST.sha256, at any depth, are left out unless asked for.
 */
export function listFiles(dir: string, opts: { includeManifest?: boolean } = {}): string[] {
  const out: string[] = [];
  const walk = (abs: string, rel: string): void => {
    for (const ent of fs.readdirSync(abs, { withFileTypes: true })) {
      const childRel = rel === "" ? ent.name : `${rel}/${ent.name}`;
      if (ent.isDirectory()) {
        walk(path.join(abs, ent.name), childRel);
      } else if (ent.isFile() && (opts.includeManifest || ent.name !== MANIFEST_NAME)) {
        out.push(childRel);
      }
    }
  };
  walk(dir, "");
  return out.sort(byCodeUnit);
}

export function formatManifestLine(entry: ManifestEntryV1, style: ManifestLineStyle): string {
  return style === "binary" ? `${entry.digest} *${entry.path}` : `${entry.digest}  ${entry.path}`;
}

export type WriteManifestOptions = {
  style: ManifestLineStyle;
  // Relative paths to seal; defaults to every regular file under the directory.
  files?: ReadonlyArray<string>;
};

/**
 * Hashes the selected files and writes `<dir>/MANIFEST.sha256`.
 * @returns The manifest path and the entries written.
 */
export async function writeManifest(
  dir: string,
  options: WriteManifestOptions
): Promise<{ manifestPath: string; entries: ManifestEntryV1[] }> {
  const rels = options.files ? [...options.files].sort(byCodeUnit) : listFiles(dir);
  const entries: ManifestEntryV1[] = [];
  for (const rel of rels) {
    const abs = path.join(dir, rel);
    if (!fs.existsSync(abs)) throw new MissingArtifact(abs);
    entries.push({ digest: await sha256File(abs), path: rel });
  }

  const manifestPath = path.join(dir, MANIFEST_NAME);
  const body = entries.map((e) => `${formatManifestLine(e, options.style)}\n`).join("");
  await fs.promises.writeFile(manifestPath, body, "utf8");
  return { manifestPath, entries };
}

const MANIFEST_LINE_RE = /^([0-9a-f]{64}) ([ *])(.+)$/;

/**
 * Parses manifest text in either style.
 */
export function parseManifest(text: string, source = MANIFEST_NAME): ManifestEntryV1[] {
  const entries: ManifestEntryV1[] = [];
  const lines = text.split("\n");
  lines.forEach((line, i) => {
    if (line === "") return;
    const m = MANIFEST_LINE_RE.exec(line);
    if (!m) throw new ValidationError(`malformed manifest line in ${source}: ${line}`, i + 1);
    entries.push({ digest: m[1], path: m[3] });
  });
  return entries;
}

export async function readManifest(dir: string): Promise<ManifestEntryV1[]> {
  const p = path.join(dir, MANIFEST_NAME);
  if (!fs.existsSync(p)) throw new MissingArtifact(p);
  return parseManifest(await fs.promises.readFile(p, "utf8"), p);
}

export type ManifestCheck = {
  ok: boolean;
  mismatched: string[]; // listed, present, digest differs
  missing: string[]; // listed, absent
};

/**
 * Recomputes every digest listed in `<dir>/MANIFEST.sha256`.
 */
export async function verifyManifest(dir: string): Promise<ManifestCheck> {
  const entries = await readManifest(dir);
  const mismatched: string[] = [];
  const missing: string[] = [];
  for (const e of entries) {
    const abs = path.join(dir, e.path);
    if (!fs.existsSync(abs)) {
      missing.push(e.path);
      continue;
    }
    if ((await sha256File(abs)) !== e.digest) mismatched.push(e.path);
  }
  return { ok: mismatched.length === 0 && missing.length === 0, mismatched, missing };
}
