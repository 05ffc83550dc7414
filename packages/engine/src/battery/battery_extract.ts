// Battery extraction: reduce a per-cycle battery table to the 3-column
// observation trace. t_s = cycle, E_proxy = disV, discharge = disI < 0.

import fs from "node:fs";
import path from "node:path";

import type { ObservationV1 } from "@sssl/contracts";
import { MissingArtifact, ValidationError, csvDocument, fixed, parseRealCell, readCsvRecords, sortObservations } from "@sssl/kernel";

export const BATTERY_REQUIRED_COLUMNS = Object.freeze(["battery_id", "cycle", "disV", "disI"] as const);
export const BATTERY_OUTPUT_NAME = "battery_observations.csv";

export type BatteryExtractOptions = {
  batteryId: string | null; // null: first id seen
  maxRows: number | null;
};

export function extractBatteryObservations(text: string, opts: BatteryExtractOptions, source = "<battery>"): ObservationV1[] {
  const [header, ...body] = readCsvRecords(text, source);
  const col = new Map<string, number>();
  header?.cells.forEach((name, i) => {
    if (!col.has(name)) col.set(name, i);
  });
  const missing = BATTERY_REQUIRED_COLUMNS.filter((c) => !col.has(c));
  if (!header || missing.length > 0) {
    throw new ValidationError(`Battery CSV must include columns: ${BATTERY_REQUIRED_COLUMNS.join(", ")}`);
  }

  const at = (cells: ReadonlyArray<string>, name: string): string => cells[col.get(name) ?? -1] ?? "";
  const real = (cells: ReadonlyArray<string>, name: string, line: number): number => {
    const v = parseRealCell(at(cells, name));
    if (Number.isNaN(v)) throw new ValidationError(`bad battery row: ${name} is not a number (got ${at(cells, name)})`, line);
    return v;
  };

  let chosen = opts.batteryId;
  const rows: ObservationV1[] = [];
  for (const rec of body) {
    const bid = at(rec.cells, "battery_id");
    if (chosen === null) chosen = bid;
    if (bid !== chosen) continue;
    rows.push({
      t: real(rec.cells, "cycle", rec.line),
      m: real(rec.cells, "disV", rec.line),
      discharge: real(rec.cells, "disI", rec.line) < 0 ? 1 : 0
    });
    if (opts.maxRows !== null && rows.length >= opts.maxRows) break;
  }
  return sortObservations(rows);
}

export function renderBatteryObservations(rows: ReadonlyArray<ObservationV1>): string {
  return csvDocument(
    ["t_s", "E_proxy", "discharge"],
    rows.map((r) => [fixed(r.t, 6), fixed(r.m, 6), String(r.discharge)])
  );
}

/**
 * Reads `batteryCsv`, writes `<outDir>/battery_observations.csv`.
 * @returns The path written.
 */
export async function runBatteryExtract(batteryCsv: string, outDir: string, opts: BatteryExtractOptions): Promise<string> {
  const src = path.resolve(batteryCsv);
  if (!fs.existsSync(src)) throw new MissingArtifact(src);
  const rows = extractBatteryObservations(await fs.promises.readFile(src, "utf8"), opts, src);
  await fs.promises.mkdir(outDir, { recursive: true });
  const outCsv = path.join(outDir, BATTERY_OUTPUT_NAME);
  await fs.promises.writeFile(outCsv, renderBatteryObservations(rows), "utf8");
  return outCsv;
}
