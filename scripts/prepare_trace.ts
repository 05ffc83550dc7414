#!/usr/bin/env node
/**
 * Remap a tabular trace into `t_s,E_proxy,discharge`.
 *
 * Usage:
 *   npm run adapt-trace -- --in_csv raw.csv --out_csv trace.csv --t_col time --m_col value [--event_col flag]
 *   npm run adapt-trace -- --seismic --in_csv catalog.csv --out_csv trace.csv [--mag_col mag] [--discharge_threshold 5.5]
 */

import fs from "node:fs";
import path from "node:path";

import { isSsslError } from "@sssl/kernel";
import { prepareTrace, readTable, renderPreparedTrace, renderSeismicTrace, seismicTrace } from "@sssl/engine";

/* -------------------- CLI utils -------------------- */

function arg(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  if (i === -1) return undefined;
  const v = process.argv[i + 1];
  return v == null ? undefined : String(v);
}

function required(name: string): string {
  const v = arg(name);
  if (v === undefined) die(`missing required ${name}`);
  return v;
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(2);
}

/* -------------------- main -------------------- */

function main(): void {
  const inCsv = required("--in_csv");
  const outCsv = path.resolve(required("--out_csv"));
  if (!fs.existsSync(inCsv)) die(`input not found: ${inCsv}`);

  const rows = readTable(fs.readFileSync(inCsv, "utf8"), inCsv);
  let content: string;
  if (flag("--seismic")) {
    const threshold = Number(arg("--discharge_threshold") ?? "5.5");
    if (!Number.isFinite(threshold)) die("invalid --discharge_threshold");
    content = renderSeismicTrace(seismicTrace(rows, { magCol: arg("--mag_col") ?? "mag", dischargeThreshold: threshold }));
  } else {
    content = renderPreparedTrace(
      prepareTrace(rows, { tCol: required("--t_col"), mCol: required("--m_col"), eventCol: arg("--event_col") })
    );
  }

  fs.mkdirSync(path.dirname(outCsv), { recursive: true });
  fs.writeFileSync(outCsv, content, "utf8");
  console.log(`OK: wrote ${outCsv}`);
}

try {
  main();
} catch (e) {
  if (!isSsslError(e)) throw e;
  console.error(`ERROR ${e.message}`);
  process.exit(4);
}
