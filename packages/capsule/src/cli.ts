#!/usr/bin/env node
/**
 * sssl-capsule
 *
 * Usage:
 *   npm run capsule                      (repo root = .)
 *   node --import tsx packages/capsule/src/cli.ts --repo_root .. --cases core
 *
 * Stdout ends with `CAPSULE_RESULT: PASS` or `CAPSULE_RESULT: FAIL`; on
 * failure stderr carries one `<CATEGORY>: detail` line.
 * Exit codes: 0 pass, 1 run failure, 2 arguments, 3 missing input/artifact,
 * 4 invariant/replay/validation/data.
 */

import path from "node:path";

import { CapsuleSuiteZ } from "@sssl/contracts";
import { ArgumentError } from "@sssl/kernel";
import { EXIT_CODE_BY_ERROR, EXIT_GENERIC, EXIT_OK, createLogger, describeError, processIO } from "@sssl/engine";
import type { CliIO } from "@sssl/engine";

import { runCapsule } from "./capsule";
import type { CapsuleReport } from "./capsule";
import { ChildProcessEngineRunner } from "./runners";
import type { EngineRunner } from "./runners";

export type CapsuleArgs = { repoRoot: string; cases: "core" };

export function parseCapsuleArgs(argv: ReadonlyArray<string>, cwd = process.cwd()): CapsuleArgs {
  let repoRoot = "..";
  let cases = "core";
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    const eq = tok.indexOf("=");
    const name = tok.startsWith("--") && eq > 0 ? tok.slice(0, eq) : tok;
    if (name !== "--repo_root" && name !== "--cases") throw new ArgumentError(`unrecognized arguments: ${tok}`);

    let value: string | undefined;
    if (name !== tok) {
      value = tok.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) throw new ArgumentError(`argument ${name}: expected one argument`);
    if (name === "--repo_root") repoRoot = value;
    else cases = value;
  }

  const suite = CapsuleSuiteZ.safeParse(cases);
  if (!suite.success) throw new ArgumentError(`argument --cases: invalid choice: '${cases}' (choose from 'core')`);
  return { repoRoot: path.resolve(cwd, repoRoot), cases: suite.data };
}

export function capsuleExitCode(report: CapsuleReport): number {
  const f = report.final;
  if (f.phase === "PASSED") return EXIT_OK;
  return f.category === "UNEXPECTED" ? EXIT_GENERIC : EXIT_CODE_BY_ERROR[f.category];
}

export async function runCapsuleCli(
  argv: ReadonlyArray<string>,
  io: CliIO = processIO,
  runner?: EngineRunner,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const log = createLogger("sssl-capsule", env);

  let args: CapsuleArgs;
  try {
    args = parseCapsuleArgs(argv);
  } catch (e) {
    io.stderr(describeError(e));
    io.stdout("CAPSULE_RESULT: FAIL");
    return EXIT_CODE_BY_ERROR.ARGUMENT_ERROR;
  }

  const report = await runCapsule({
    repoRoot: args.repoRoot,
    runner: runner ?? new ChildProcessEngineRunner({ logger: log }),
    logger: log
  });

  if (report.final.phase === "PASSED") {
    io.stdout(`CAPSULE_SUMMARY: ${report.summaryPath ?? ""}`);
    io.stdout("CAPSULE_RESULT: PASS");
  } else {
    const { category, error } = report.final;
    io.stderr(category === "UNEXPECTED" ? `FAIL: ${describeError(error)}` : describeError(error));
    io.stdout("CAPSULE_RESULT: FAIL");
  }
  return capsuleExitCode(report);
}

if (require.main === module) {
  runCapsuleCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`FAIL: ${describeError(e)}\n`);
      process.stdout.write("CAPSULE_RESULT: FAIL\n");
      process.exitCode = EXIT_GENERIC;
    }
  );
}
