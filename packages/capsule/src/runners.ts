// Replay runners. The capsule drives the engine through this interface so
// the same case logic works against a child process or a direct call.

import { spawn } from "node:child_process";

import { executionContextToEnv } from "@sssl/contracts";
import type { ExecutionContextV1 } from "@sssl/contracts";
import { RunFailedError } from "@sssl/kernel";
import type { SsslParamsV1 } from "@sssl/kernel";
import { runSssl, silentLogger } from "@sssl/engine";
import type { Logger } from "@sssl/engine";

export type EngineRunRequest = {
  inCsv: string;
  outDir: string;
  params: SsslParamsV1;
  context: ExecutionContextV1;
};

export interface EngineRunner {
  readonly name: string;
  /** Runs the engine with `--substrate`; resolves once the run is sealed. */
  run(req: EngineRunRequest): Promise<void>;
}

/**
 * Every parameter as an explicit flag, so a child run never depends on
 * which config file it happens to find.
 */
export function engineArgv(req: EngineRunRequest): string[] {
  const { classifier: c, accumulation: a, admissibility: m } = req.params;
  return [
    "--in_csv", req.inCsv,
    "--out_dir", req.outDir,
    "--substrate",
    "--tau0", String(c.tau0),
    "--taus", String(c.taus),
    "--eps", String(c.eps),
    "--drop", String(c.drop),
    "--s0", String(a.s0),
    "--s_max", String(a.s_max),
    "--inc_on_eminus", String(a.inc_on_eminus),
    "--dec_on_s", String(a.dec_on_s),
    "--collapse_ratio_max", String(m.collapse_ratio_max),
    "--churn_ratio_max", String(m.churn_ratio_max),
    "--require_s", String(m.require_s)
  ];
}

export type ChildProcessRunnerOptions = {
  engineCliPath?: string;
  execPath?: string;
  execArgv?: ReadonlyArray<string>;
  baseEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
};

export class ChildProcessEngineRunner implements EngineRunner {
  readonly name = "child-process";
  private readonly engineCliPath: string;
  private readonly execPath: string;
  private readonly execArgv: ReadonlyArray<string>;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly log: Logger;

  constructor(opts: ChildProcessRunnerOptions = {}) {
    this.engineCliPath = opts.engineCliPath ?? require.resolve("@sssl/engine/src/cli.ts");
    this.execPath = opts.execPath ?? process.execPath;
    this.execArgv = opts.execArgv ?? process.execArgv;
    this.baseEnv = opts.baseEnv ?? process.env;
    this.log = opts.logger ?? silentLogger();
  }

  /**
   * Command, argv and environment of one child run. The pinned context is
   * layered over the inherited environment per run.
   */
  invocation(req: EngineRunRequest): { command: string; args: string[]; env: NodeJS.ProcessEnv } {
    return {
      command: this.execPath,
      args: [...this.execArgv, this.engineCliPath, ...engineArgv(req)],
      env: { ...this.baseEnv, ...executionContextToEnv(req.context) }
    };
  }

  run(req: EngineRunRequest): Promise<void> {
    const { command, args, env } = this.invocation(req);
    this.log.debug({ command, args }, "spawn engine");

    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { env, stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf8").on("data", (s: string) => {
        stdout += s;
      });
      child.stderr.setEncoding("utf8").on("data", (s: string) => {
        stderr += s;
      });
      child.on("error", (err) => {
        reject(new RunFailedError(`cannot start engine: ${err.message}`, { cause: err }));
      });
      child.on("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        const last = stderr.trim().split("\n").pop() ?? "";
        this.log.info({ code, stdout, stderr }, "engine run failed");
        reject(new RunFailedError(`engine exited with ${code ?? "signal"}: ${last}`, { exitCode: code }));
      });
    });
  }
}

/**
 * Calls the engine in this process. Engine errors surface as RunFailedError
 * with the original error as `cause`, the same category a failed child gets.
 */
export class InProcessEngineRunner implements EngineRunner {
  readonly name = "in-process";

  constructor(private readonly logger: Logger = silentLogger()) {}

  async run(req: EngineRunRequest): Promise<void> {
    try {
      await runSssl({
        inCsv: req.inCsv,
        outDir: req.outDir,
        params: req.params,
        substrate: true,
        context: req.context,
        logger: this.logger
      });
    } catch (e) {
      throw new RunFailedError(`engine run failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }
}
