// Shared test helpers for @sssl/capsule.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { CliIO } from "@sssl/engine";

const REPO_DATA_DIR = path.resolve(__dirname, "../../../../data");

export const FIXTURES = ["sssl_smoke.csv", "sssl_mech_vibration.csv", "sssl_fluid_pressure.csv"] as const;

export function tempDir(prefix = "sssl-capsule-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * A throwaway repo root holding only the fixture traces.
 */
export function tempRepo(): string {
  const root = tempDir("sssl-repo-");
  fs.mkdirSync(path.join(root, "data"));
  for (const name of FIXTURES) {
    fs.copyFileSync(path.join(REPO_DATA_DIR, name), path.join(root, "data", name));
  }
  return root;
}

export function repoDataFile(name: string): string {
  return path.join(REPO_DATA_DIR, name);
}

export function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (l) => out.push(l), stderr: (l) => err.push(l) };
}
