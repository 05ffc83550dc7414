#!/usr/bin/env node
/**
 * sssl-verify
 *
 * Usage:
 *   npm run verify -- --in_csv data/sssl_smoke.csv --out_dir outputs/smoke --substrate
 *   npm run verify -- --battery_extract --battery_csv cycles.csv --battery_id B0005 --out_dir outputs
 *
 * Exit codes: 0 ok, 2 argument error, 3 missing input, 4 validation/data error, 1 anything else.
 */

import path from "node:path";

import { MANIFEST_NAME, executionContextFromEnv } from "@sssl/contracts";

import { runBatteryExtract } from "./battery/battery_extract";
import { builtinSsslConfig, defaultConfigPath, loadSsslConfig, resolveSsslParams } from "./config/load_config";
import { resolveRepoRoot } from "./config/repo_root";
import { ENGINE_USAGE, HELP_FLAGS, parseEngineArgs } from "./cli/args";
import { EXIT_OK, describeError, exitCodeFor } from "./cli/exit_codes";
import { createLogger } from "./logger";
import { runSssl } from "./run/run_sssl";

export type CliIO = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

export async function runEngineCli(
  argv: ReadonlyArray<string>,
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const log = createLogger("sssl-verify", env);
  if (argv.some((a) => HELP_FLAGS.has(a))) {
    io.stdout(ENGINE_USAGE);
    return EXIT_OK;
  }
  try {
    const args = parseEngineArgs(argv);

    if (args.task.kind === "battery") {
      const outCsv = await runBatteryExtract(args.task.batteryCsv, args.outDir, args.task);
      io.stdout("OK: Battery observations extracted");
      io.stdout(`OUT_CSV: ${outCsv}`);
      return EXIT_OK;
    }

    let configPath = args.config;
    if (configPath === null) {
      const root = resolveRepoRoot(env);
      configPath = root === null ? null : defaultConfigPath(root);
    }
    if (configPath === null) log.info("no repo root found; using built-in parameters");
    const config = configPath === null ? builtinSsslConfig() : loadSsslConfig(configPath);
    const params = resolveSsslParams(config, args.overrides);

    await runSssl({
      inCsv: args.task.inCsv,
      outDir: args.outDir,
      params,
      substrate: args.substrate,
      context: executionContextFromEnv(env),
      logger: log
    });

    io.stdout("OK: SSSL verification complete");
    io.stdout(`OUT_DIR: ${args.outDir}`);
    io.stdout(`MANIFEST: ${path.join(args.outDir, MANIFEST_NAME)}`);
    return EXIT_OK;
  } catch (e) {
    io.stderr(`ERROR ${describeError(e)}`);
    log.debug({ err: e }, "run failed");
    return exitCodeFor(e);
  }
}

if (require.main === module) {
  runEngineCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`ERROR ${describeError(e)}\n`);
      process.exitCode = 1;
    }
  );
}
