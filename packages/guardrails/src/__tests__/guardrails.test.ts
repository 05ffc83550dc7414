import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { runGuardrails } from "../index";
import { checkKernelPurity } from "../checks/check_kernel_purity";
import { checkEnvMutation } from "../checks/check_env_mutation";
import { checkArtifactNames } from "../checks/check_artifact_names";

const REPO_ROOT = path.resolve(__dirname, "../../../..");

function fakeRepo(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "sssl-guardrails-"));
  for (const [rel, content] of Object.entries(files)) {
    const p = path.join(root, rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, content, "utf8");
  }
  return root;
}

const DIRTY = {
  "packages/kernel/src/a.ts": ['import fs from "node:fs";', "export const x = Math.random();", "// Date.now() in a comment"].join("\n"),
  "packages/kernel/src/__tests__/t.test.ts": "const t = Date.now();\n",
  "packages/engine/src/b.ts": [
    'process.env.TZ = "UTC";',
    'const f = "P_matrix.csv";',
    'if (process.env.TZ === "UTC") f.trim();'
  ].join("\n")
};

test("kernel purity flags IO imports and randomness, skipping tests and comments", () => {
  assert.deepEqual(checkKernelPurity(fakeRepo(DIRTY)), [
    "packages/kernel/src/a.ts:1: IO module import",
    "packages/kernel/src/a.ts:2: Math.random"
  ]);
});

test("kernel purity reports a missing kernel", () => {
  const root = fakeRepo({ "README.md": "x\n" });
  assert.deepEqual(checkKernelPurity(root), [`missing kernel sources at ${path.join(root, "packages", "kernel", "src")}`]);
});

test("env mutation flags assignment but not comparison", () => {
  assert.deepEqual(checkEnvMutation(fakeRepo(DIRTY)), ["packages/engine/src/b.ts:1: process.env assignment"]);
});

test("artifact names must come from contracts", () => {
  assert.deepEqual(checkArtifactNames(fakeRepo(DIRTY)), [
    "packages/engine/src/b.ts:2: hard-coded artifact name 'P_matrix.csv'"
  ]);
});

test("runGuardrails concatenates every check", () => {
  assert.equal(runGuardrails(fakeRepo(DIRTY)).length, 4);
});

test("this repository passes its own guardrails", () => {
  assert.deepEqual(runGuardrails(REPO_ROOT), []);
});
