import { test } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { MissingArtifact, ValidationError } from "@sssl/kernel";

import {
  builtinSsslConfig,
  defaultConfigPath,
  loadSsslConfig,
  resolveSsslParams
} from "../config/load_config";
import { findRepoRoot, resolveRepoRoot } from "../config/repo_root";
import { REPO_DATA_DIR, tempDir, writeFile } from "./helpers";

const REPO_ROOT = path.resolve(REPO_DATA_DIR, "..");

test("the shipped default config matches the built-in parameters", () => {
  assert.deepEqual(loadSsslConfig(defaultConfigPath(REPO_ROOT)), builtinSsslConfig());
});

test("repo root is found by walking up, or taken from SSSL_REPO_ROOT", () => {
  const root = tempDir();
  writeFile(root, "config/sssl/default.json", "{}");
  writeFile(root, "a/b/c/.keep", "");
  assert.equal(findRepoRoot(path.join(root, "a", "b", "c"), "config/sssl/default.json"), root);
  assert.throws(() => findRepoRoot(path.join(root, "a"), "no/such/file.json", 1));

  assert.equal(resolveRepoRoot({ SSSL_REPO_ROOT: root }), root);
  assert.equal(resolveRepoRoot({}), REPO_ROOT);
});

test("config files are validated strictly", () => {
  const dir = tempDir();
  assert.throws(() => loadSsslConfig(path.join(dir, "absent.json")), MissingArtifact);
  assert.throws(() => loadSsslConfig(writeFile(dir, "bad.json", "{ not json")), ValidationError);

  const extra = { ...builtinSsslConfig(), classifier: { ...builtinSsslConfig().classifier, gamma: 1 } };
  assert.throws(
    () => loadSsslConfig(writeFile(dir, "extra.json", JSON.stringify(extra))),
    (e: unknown) => e instanceof ValidationError && e.message.includes("classifier")
  );
});

test("overrides replace individual parameters and are re-validated", () => {
  const params = resolveSsslParams(builtinSsslConfig(), {
    classifier: { taus: 0.9 },
    accumulation: { s_max: 3 },
    admissibility: { require_s: 1 }
  });
  assert.deepEqual(params.classifier, { tau0: 0.05, taus: 0.9, eps: 0.02, drop: 0.15 });
  assert.deepEqual(params.accumulation, { s0: 0, s_max: 3, inc_on_eminus: 1, dec_on_s: 1 });
  assert.equal(params.admissibility.require_s, 1);

  assert.throws(
    () => resolveSsslParams(builtinSsslConfig(), { classifier: {}, accumulation: { s0: 9, s_max: 3 }, admissibility: {} }),
    (e: unknown) => e instanceof ValidationError && e.message.includes("s0: s0 must lie within [0, s_max]")
  );
});
