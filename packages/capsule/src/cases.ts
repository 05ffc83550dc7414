// Capsule case registry and input resolution.

import fs from "node:fs";
import path from "node:path";

import type { CapsuleCaseV1 } from "@sssl/contracts";
import { MissingArtifact } from "@sssl/kernel";

export const CAPSULE_DIR_NAME = "VERIFY_SSSL_CAPSULE";
export const NEGCTL_SAMPLES = 400;

// Fixed order; the capsule aborts on the first failing case.
export const CORE_CASES: ReadonlyArray<CapsuleCaseV1> = [
  { name: "SMOKE", input: { kind: "fixture", relPath: "data/sssl_smoke.csv" }, expected: "ALLOW" },
  { name: "MECH", input: { kind: "fixture", relPath: "data/sssl_mech_vibration.csv" }, expected: "ALLOW" },
  { name: "FLUID", input: { kind: "fixture", relPath: "data/sssl_fluid_pressure.csv" }, expected: "ALLOW" },
  {
    name: "NEGCTL_ABSTAIN",
    input: { kind: "negative_control", fileName: "negctl_abstain.csv", samples: NEGCTL_SAMPLES },
    expected: "ABSTAIN"
  }
];

export type CapsulePaths = {
  repoRoot: string;
  capsuleDir: string;
  outRoot: string;
  workDir: string;
  summaryPath: string;
};

export function capsulePaths(repoRoot: string): CapsulePaths {
  const root = path.resolve(repoRoot);
  const capsuleDir = path.join(root, CAPSULE_DIR_NAME);
  return {
    repoRoot: root,
    capsuleDir,
    outRoot: path.join(capsuleDir, "OUT"),
    workDir: path.join(capsuleDir, "_WORK"),
    summaryPath: path.join(capsuleDir, "CAPSULE_SUMMARY.txt")
  };
}

/**
 * Alternating magnitude 1,0,1,0,... with a discharge on every third sample.
 * Churn and collapse both exceed the default admissibility bounds.
 */
export function negativeControlCsv(samples: number): string {
  const lines = ["t_s,E_proxy,discharge"];
  for (let i = 0; i < samples; i++) {
    const e = i % 2 === 0 ? 1 : 0;
    const d = i % 3 === 0 ? 1 : 0;
    lines.push(`${i},${e.toFixed(1)},${d}`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Absolute path of a case's input trace. Negative controls are (re)written
 * into the work directory; fixtures must already exist.
 */
export async function resolveCaseInput(c: CapsuleCaseV1, paths: CapsulePaths): Promise<string> {
  switch (c.input.kind) {
    case "fixture": {
      const p = path.join(paths.repoRoot, c.input.relPath);
      if (!fs.existsSync(p)) throw new MissingArtifact(p);
      return p;
    }
    case "negative_control": {
      const p = path.join(paths.workDir, c.input.fileName);
      await fs.promises.mkdir(paths.workDir, { recursive: true });
      await fs.promises.writeFile(p, negativeControlCsv(c.input.samples), "utf8");
      return p;
    }
  }
}

/**
 * Every fixture a case list needs, checked before any directory is purged.
 */
export function requireFixtures(cases: ReadonlyArray<CapsuleCaseV1>, paths: CapsulePaths): void {
  for (const c of cases) {
    if (c.input.kind !== "fixture") continue;
    const p = path.join(paths.repoRoot, c.input.relPath);
    if (!fs.existsSync(p)) throw new MissingArtifact(p);
  }
}

export function replayDir(paths: CapsulePaths, caseName: string, side: "A" | "B"): string {
  return path.join(paths.outRoot, `${caseName}_REPLAY_${side}`);
}
