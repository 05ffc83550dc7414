// Shared test helpers for @sssl/engine.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { CliIO } from "../cli";

export const REPO_DATA_DIR = path.resolve(__dirname, "../../../../data");

export function tempDir(prefix = "sssl-engine-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, rel: string, content: string): string {
  const p = path.join(dir, rel);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, "utf8");
  return p;
}

export function readDataFile(name: string): string {
  return fs.readFileSync(path.join(REPO_DATA_DIR, name), "utf8");
}

export function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (l) => out.push(l), stderr: (l) => err.push(l) };
}
