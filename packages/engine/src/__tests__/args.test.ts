import { test } from "node:test";
import assert from "node:assert/strict";

import { ArgumentError } from "@sssl/kernel";

import { parseEngineArgs, scanArgv } from "../cli/args";

test("defaults", () => {
  const a = parseEngineArgs(["--in_csv", "x.csv"]);
  assert.deepEqual(a, {
    task: { kind: "verify", inCsv: "x.csv" },
    outDir: "outputs",
    config: null,
    substrate: false,
    overrides: { classifier: {}, accumulation: {}, admissibility: {} }
  });
});

test("parameter flags become typed overrides", () => {
  const a = parseEngineArgs([
    "--in_csv=x.csv",
    "--substrate",
    "--tau0",
    "-0.5",
    "--s_max",
    "7",
    "--churn_ratio_max=0.25",
    "--require_s",
    "2"
  ]);
  assert.equal(a.substrate, true);
  assert.deepEqual(a.overrides, {
    classifier: { tau0: -0.5 },
    accumulation: { s_max: 7 },
    admissibility: { churn_ratio_max: 0.25, require_s: 2 }
  });
});

test("battery mode", () => {
  const a = parseEngineArgs(["--battery_extract", "--battery_csv", "b.csv", "--max_rows", "10", "--out_dir", "o"]);
  assert.deepEqual(a.task, { kind: "battery", batteryCsv: "b.csv", batteryId: null, maxRows: 10 });
  assert.equal(a.outDir, "o");
  assert.throws(() => parseEngineArgs(["--battery_extract"]), /--battery_csv is required/);
});

test("argument errors", () => {
  assert.throws(() => parseEngineArgs([]), ArgumentError);
  assert.throws(() => parseEngineArgs(["--in_csv", "x", "--bogus"]), /unrecognized arguments: --bogus/);
  assert.throws(() => parseEngineArgs(["--in_csv"]), /argument --in_csv: expected one argument/);
  assert.throws(() => parseEngineArgs(["--in_csv", "x", "--eps", "abc"]), /invalid float value: 'abc'/);
  assert.throws(() => parseEngineArgs(["--in_csv", "x", "--s0", "1.5"]), /invalid int value: '1.5'/);
  assert.throws(() => scanArgv(["--substrate=1"]), ArgumentError);
});

test("a repeated option keeps its last value", () => {
  assert.equal(scanArgv(["--out_dir", "a", "--out_dir", "b"]).values.get("--out_dir"), "b");
});
