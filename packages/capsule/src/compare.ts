import fs from "node:fs";
import path from "node:path";

import { ReplayMismatch } from "@sssl/kernel";
import { listFiles, sha256File } from "@sssl/engine";

export type DirDifference =
  | { kind: "file_list"; onlyA: string[]; onlyB: string[] }
  | { kind: "size"; path: string; sizeA: number; sizeB: number }
  | { kind: "digest"; path: string };

/**
 * First difference between two directories, or null when they agree on
 * relative paths, sizes and SHA-256 of every regular file.
 */
export async function diffDirs(a: string, b: string): Promise<DirDifference | null> {
  const filesA = listFiles(a, { includeManifest: true });
  const filesB = listFiles(b, { includeManifest: true });
  if (filesA.length !== filesB.length || filesA.some((f, i) => f !== filesB[i])) {
    const setB = new Set(filesB);
    const setA = new Set(filesA);
    return {
      kind: "file_list",
      onlyA: filesA.filter((f) => !setB.has(f)),
      onlyB: filesB.filter((f) => !setA.has(f))
    };
  }

  for (const rel of filesA) {
    const pa = path.join(a, rel);
    const pb = path.join(b, rel);
    const sizeA = fs.statSync(pa).size;
    const sizeB = fs.statSync(pb).size;
    if (sizeA !== sizeB) return { kind: "size", path: rel, sizeA, sizeB };
    if ((await sha256File(pa)) !== (await sha256File(pb))) return { kind: "digest", path: rel };
  }
  return null;
}

export function describeDifference(d: DirDifference): string {
  switch (d.kind) {
    case "file_list":
      return `file lists differ (only in A: ${d.onlyA.join(",") || "-"}; only in B: ${d.onlyB.join(",") || "-"})`;
    case "size":
      return `${d.path} size ${d.sizeA} != ${d.sizeB}`;
    case "digest":
      return `${d.path} sha256 differs`;
  }
}

/**
 * B_A = B_B, or ReplayMismatch naming the first difference.
 */
export async function assertReplaysEqual(caseName: string, a: string, b: string): Promise<void> {
  const d = await diffDirs(a, b);
  if (d) throw new ReplayMismatch(caseName, `B_A != B_B: ${describeDifference(d)}`);
}
