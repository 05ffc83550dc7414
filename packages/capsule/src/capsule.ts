// Verification capsule
//
// PENDING -> RUNNING(case) -> ... -> PASSED | FAILED(category)
//
// Per case: resolve input, purge both replay dirs, run the engine twice
// (concurrently, each with its own directory and the pinned context), reseal
// both, check invariants on each, then byte-compare. The first failure ends
// the run.

import fs from "node:fs";

import { A4, COLLAPSE_IDENTITY_TEXT, PINNED_EXECUTION_CONTEXT_V1 } from "@sssl/contracts";
import type { CapsuleCaseName, CapsuleCaseV1, ExecutionContextV1 } from "@sssl/contracts";
import { ReplayMismatch, isSsslError, textBlock } from "@sssl/kernel";
import type { SsslErrorCode, SsslParamsV1 } from "@sssl/kernel";
import {
  builtinSsslConfig,
  defaultConfigPath,
  loadSsslConfig,
  resolveSsslParams,
  silentLogger,
  verifyManifest,
  writeManifest
} from "@sssl/engine";
import type { Logger } from "@sssl/engine";

import { CORE_CASES, capsulePaths, replayDir, requireFixtures, resolveCaseInput } from "./cases";
import type { CapsulePaths } from "./cases";
import { assertReplaysEqual } from "./compare";
import { checkReplayInvariants } from "./invariants";
import type { EngineRunner } from "./runners";

export type FailureCategory = SsslErrorCode | "UNEXPECTED";

export type CapsuleState =
  | { phase: "PENDING" }
  | { phase: "RUNNING"; caseName: CapsuleCaseName }
  | { phase: "PASSED" }
  | { phase: "FAILED"; caseName: CapsuleCaseName | null; category: FailureCategory; error: unknown };

export type CapsuleOptions = {
  repoRoot: string;
  runner: EngineRunner;
  cases?: ReadonlyArray<CapsuleCaseV1>;
  // Defaults: <repoRoot>/config/sssl/default.json when present, else built-in.
  params?: SsslParamsV1;
  context?: ExecutionContextV1;
  logger?: Logger;
};

export type CaseReplay = { caseName: CapsuleCaseName; a: string; b: string };

export type CapsuleReport = {
  final: Extract<CapsuleState, { phase: "PASSED" | "FAILED" }>;
  history: ReadonlyArray<CapsuleState>;
  replays: ReadonlyArray<CaseReplay>;
  summaryPath: string | null;
};

export function capsuleSummaryText(cases: ReadonlyArray<CapsuleCaseV1>): string {
  return textBlock([
    "SSSL_VERIFY_CAPSULE",
    `CASES: ${cases.map((c) => c.name).join(", ")}`,
    "INVARIANTS:",
    COLLAPSE_IDENTITY_TEXT,
    `A4 = {${A4.join(", ")}}`,
    `|A4| = ${A4.length}`,
    "rho(P) = 1",
    "B_A = B_B",
    "RESULT: PASS"
  ]);
}

export function capsuleParams(paths: CapsulePaths): SsslParamsV1 {
  const cfg = defaultConfigPath(paths.repoRoot);
  return resolveSsslParams(fs.existsSync(cfg) ? loadSsslConfig(cfg) : builtinSsslConfig());
}

async function purge(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
  await fs.promises.mkdir(dir, { recursive: true });
}

/**
 * Waits for every run to settle before reporting the first failure, so no
 * check ever starts while a sibling run is still writing.
 */
async function settleAll(runs: ReadonlyArray<Promise<void>>): Promise<void> {
  const results = await Promise.allSettled(runs);
  for (const r of results) {
    if (r.status === "rejected") throw r.reason;
  }
}

async function runCase(
  c: CapsuleCaseV1,
  paths: CapsulePaths,
  runner: EngineRunner,
  params: SsslParamsV1,
  context: ExecutionContextV1,
  log: Logger
): Promise<CaseReplay> {
  const inCsv = await resolveCaseInput(c, paths);
  const a = replayDir(paths, c.name, "A");
  const b = replayDir(paths, c.name, "B");
  await purge(a);
  await purge(b);

  await settleAll([
    runner.run({ inCsv, outDir: a, params, context }),
    runner.run({ inCsv, outDir: b, params, context })
  ]);

  for (const dir of [a, b]) {
    await writeManifest(dir, { style: "text" });
    const sealed = await verifyManifest(dir);
    if (!sealed.ok) {
      throw new ReplayMismatch(c.name, `reseal of ${dir} does not verify (${[...sealed.mismatched, ...sealed.missing].join(",")})`);
    }
  }

  await checkReplayInvariants(a, c.expected);
  await checkReplayInvariants(b, c.expected);
  await assertReplaysEqual(c.name, a, b);

  log.info({ case: c.name, expected: c.expected }, "case passed");
  return { caseName: c.name, a, b };
}

export async function runCapsule(opts: CapsuleOptions): Promise<CapsuleReport> {
  const log = opts.logger ?? silentLogger();
  const cases = opts.cases ?? CORE_CASES;
  const context = opts.context ?? PINNED_EXECUTION_CONTEXT_V1;
  const paths = capsulePaths(opts.repoRoot);

  const history: CapsuleState[] = [{ phase: "PENDING" }];
  const replays: CaseReplay[] = [];
  let current: CapsuleCaseName | null = null;

  try {
    const params = opts.params ?? capsuleParams(paths);
    requireFixtures(cases, paths);
    await fs.promises.rm(paths.summaryPath, { force: true });
    await purge(paths.outRoot);
    await purge(paths.workDir);

    for (const c of cases) {
      current = c.name;
      history.push({ phase: "RUNNING", caseName: c.name });
      log.info({ case: c.name, runner: opts.runner.name }, "case start");
      replays.push(await runCase(c, paths, opts.runner, params, context, log));
    }

    await fs.promises.writeFile(paths.summaryPath, capsuleSummaryText(cases), "utf8");
    const final = { phase: "PASSED" } as const;
    history.push(final);
    return { final, history, replays, summaryPath: paths.summaryPath };
  } catch (error) {
    const category: FailureCategory = isSsslError(error) ? error.code : "UNEXPECTED";
    const final = { phase: "FAILED", caseName: current, category, error } as const;
    history.push(final);
    log.info({ case: current, category }, "capsule failed");
    return { final, history, replays, summaryPath: null };
  }
}
