import fs from "node:fs";
import path from "node:path";

import type { AdmissibilityResultV1, ExecutionContextV1 } from "@sssl/contracts";
import { MissingArtifact, parseObservationsCsv, renderSsslArtifacts, runSsslKernel } from "@sssl/kernel";
import type { SsslParamsV1 } from "@sssl/kernel";

import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import { writeManifest } from "../seal/manifest";

export type RunSsslOptions = {
  inCsv: string;
  outDir: string;
  params: SsslParamsV1;
  substrate: boolean;
  context: ExecutionContextV1;
  logger?: Logger;
};

export type RunSsslResult = {
  outDir: string;
  manifestPath: string;
  files: string[]; // artifacts written, in write order (manifest excluded)
  admissibility: AdmissibilityResultV1 | null;
};

/**
 * One engine run: parse, interpret, write artifacts, seal.
 *
 * Input is fully parsed before the output directory is touched, so a
 * rejected trace leaves no artifacts behind.
 */
export async function runSssl(opts: RunSsslOptions): Promise<RunSsslResult> {
  const log = opts.logger ?? silentLogger();
  const inCsv = path.resolve(opts.inCsv);
  if (!fs.existsSync(inCsv)) throw new MissingArtifact(inCsv);

  log.info({ in_csv: inCsv, out_dir: opts.outDir, substrate: opts.substrate }, "run start");
  const observations = parseObservationsCsv(await fs.promises.readFile(inCsv, "utf8"), inCsv);
  const run = runSsslKernel(observations, opts.params, { substrate: opts.substrate });
  const artifacts = renderSsslArtifacts(run, opts.params, opts.context);

  const outDir = path.resolve(opts.outDir);
  await fs.promises.rm(outDir, { recursive: true, force: true });
  await fs.promises.mkdir(outDir, { recursive: true });
  for (const a of artifacts) {
    await fs.promises.writeFile(path.join(outDir, a.name), a.content, "utf8");
  }

  const files = artifacts.map((a) => a.name);
  const { manifestPath } = await writeManifest(outDir, { style: "binary", files });
  log.info({ out_dir: outDir, files: files.length, verdict: run.substrate?.admissibility.verdict }, "run sealed");

  return { outDir, manifestPath, files, admissibility: run.substrate?.admissibility ?? null };
}
