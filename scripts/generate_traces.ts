#!/usr/bin/env node
/**
 * Fixture trace generator.
 *
 * Writes the deterministic fixture traces used by the capsule cases:
 *   <out_dir>/sssl_smoke.csv
 *   <out_dir>/sssl_mech_vibration.csv
 *   <out_dir>/sssl_fluid_pressure.csv
 *
 * Usage:
 *   npm run traces -- [--out_dir data] [--mech_n 60] [--fluid_n 70] [--dt 0.1]
 */

import fs from "node:fs";
import path from "node:path";

import {
  createLogger,
  fluidPressureTrace,
  mechVibrationTrace,
  renderCompactTrace,
  renderSensorTrace,
  smokeTrace
} from "@sssl/engine";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string): string {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function num(name: string, fallback: number): number {
  const n = Number(arg(name, String(fallback)));
  if (!Number.isFinite(n)) die(`invalid ${name}`);
  return n;
}

function die(msg: string): never {
  console.error(msg);
  process.exit(2);
}

/* -------------------- main -------------------- */

function main(): void {
  const log = createLogger("generate-traces");
  const outDir = path.resolve(arg("--out_dir", "data"));
  const dt = num("--dt", 0.1);

  const outputs: Array<[string, string]> = [
    ["sssl_smoke.csv", renderCompactTrace(smokeTrace())],
    ["sssl_mech_vibration.csv", renderSensorTrace(mechVibrationTrace(num("--mech_n", 60), dt))],
    ["sssl_fluid_pressure.csv", renderSensorTrace(fluidPressureTrace(num("--fluid_n", 70), dt))]
  ];

  fs.mkdirSync(outDir, { recursive: true });
  for (const [name, content] of outputs) {
    const p = path.join(outDir, name);
    fs.writeFileSync(p, content, "utf8");
    log.info({ path: p }, "trace written");
    console.log(`OK: wrote ${p}`);
  }
}

main();
