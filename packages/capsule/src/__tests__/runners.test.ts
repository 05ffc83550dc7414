import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";

import { PINNED_EXECUTION_CONTEXT_V1 } from "@sssl/contracts";
import { RunFailedError, ValidationError } from "@sssl/kernel";
import { builtinSsslConfig, parseEngineArgs, resolveSsslParams } from "@sssl/engine";

import { ChildProcessEngineRunner, InProcessEngineRunner, engineArgv } from "../runners";
import type { EngineRunRequest } from "../runners";
import { repoDataFile, tempDir } from "./helpers";

const PARAMS = resolveSsslParams(builtinSsslConfig());

function request(outDir: string, inCsv = repoDataFile("sssl_smoke.csv")): EngineRunRequest {
  return { inCsv, outDir, params: PARAMS, context: PINNED_EXECUTION_CONTEXT_V1 };
}

test("child argv carries every parameter and parses back to the same values", () => {
  const argv = engineArgv(request("/tmp/out"));
  const parsed = parseEngineArgs(argv);
  assert.deepEqual(parsed.task, { kind: "verify", inCsv: repoDataFile("sssl_smoke.csv") });
  assert.equal(parsed.substrate, true);
  assert.equal(parsed.outDir, "/tmp/out");
  assert.deepEqual(resolveSsslParams(builtinSsslConfig(), parsed.overrides), PARAMS);
  assert.deepEqual(parsed.overrides.classifier, PARAMS.classifier);
  assert.deepEqual(parsed.overrides.admissibility, PARAMS.admissibility);
});

test("child invocation layers the pinned context over the inherited environment", () => {
  const runner = new ChildProcessEngineRunner({
    engineCliPath: "/repo/packages/engine/src/cli.ts",
    execPath: "/usr/bin/node",
    execArgv: ["--import", "tsx"],
    baseEnv: { PATH: "/bin", TZ: "Asia/Tokyo", LANG: "de_DE.UTF-8" }
  });
  const inv = runner.invocation(request("/tmp/out"));
  assert.equal(inv.command, "/usr/bin/node");
  assert.deepEqual(inv.args.slice(0, 5), ["--import", "tsx", "/repo/packages/engine/src/cli.ts", "--in_csv", repoDataFile("sssl_smoke.csv")]);
  assert.deepEqual(inv.env, {
    PATH: "/bin",
    TZ: "UTC",
    LANG: "C",
    LC_ALL: "C",
    SSSL_HASH_SEED: "0"
  });
});

test("in-process runner writes a sealed replay", async () => {
  const out = path.join(tempDir(), "A");
  await new InProcessEngineRunner().run(request(out));
  assert.ok(fs.existsSync(path.join(out, "MANIFEST.sha256")));
  assert.equal(fs.readdirSync(out).length, 11);
});

test("in-process engine errors surface as RunFailedError with the cause attached", async () => {
  const dir = tempDir();
  const bad = path.join(dir, "bad.csv");
  fs.writeFileSync(bad, "t,E,flag\n0,0,0\n1,1,0\n");
  await assert.rejects(
    new InProcessEngineRunner().run(request(path.join(dir, "out"), bad)),
    (e: unknown) => e instanceof RunFailedError && e.cause instanceof ValidationError && e.exitCode === null
  );
});
