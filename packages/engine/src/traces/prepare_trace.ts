// Trace adapter: remaps an arbitrary tabular trace (named columns) into the
// observation schema `t_s,E_proxy,discharge`.

import type { ObservationV1 } from "@sssl/contracts";
import { ValidationError, csvDocument, general12, floatRepr, parseRealCell, readCsvRecords, sortObservations } from "@sssl/kernel";

export type PrepareTraceOptions = {
  tCol: string;
  mCol: string;
  eventCol?: string; // absent: discharge = 0 on every row
};

const TRUTHY = new Set(["1", "true", "t", "yes", "y"]);
const FALSY = new Set(["0", "false", "f", "no", "n", ""]);

export function toDischarge(token: string, line?: number): 0 | 1 {
  const s = token.trim().toLowerCase();
  if (TRUTHY.has(s)) return 1;
  if (FALSY.has(s)) return 0;
  const v = parseRealCell(s);
  if (Number.isNaN(v)) throw new ValidationError(`Cannot parse discharge as 0/1: ${JSON.stringify(token)}`, line);
  return v > 0 ? 1 : 0;
}

/**
 * Header-keyed rows from CSV text. Short rows read as "" for missing cells.
 */
export function readTable(text: string, source: string): Array<{ cells: Map<string, string>; line: number }> {
  const [header, ...body] = readCsvRecords(text, source);
  if (!header) throw new ValidationError(`Input CSV has no header row: ${source}`);
  return body.map((rec) => ({
    cells: new Map(header.cells.map((name, i) => [name, rec.cells[i] ?? ""])),
    line: rec.line
  }));
}

export function prepareTrace(
  rows: ReadonlyArray<{ cells: ReadonlyMap<string, string>; line: number }>,
  opts: PrepareTraceOptions
): ObservationV1[] {
  const real = (row: { cells: ReadonlyMap<string, string>; line: number }, col: string, label: string): number => {
    const raw = row.cells.get(col) ?? "";
    const v = parseRealCell(raw);
    if (Number.isNaN(v)) throw new ValidationError(`Cannot parse ${label} as float: ${JSON.stringify(raw)}`, row.line);
    return v;
  };

  const out = rows.map(
    (row): ObservationV1 => ({
      t: real(row, opts.tCol, "t_s"),
      m: real(row, opts.mCol, "E_proxy"),
      discharge: opts.eventCol === undefined ? 0 : toDischarge(row.cells.get(opts.eventCol) ?? "0", row.line)
    })
  );
  return sortObservations(out);
}

export function renderPreparedTrace(rows: ReadonlyArray<ObservationV1>): string {
  return csvDocument(
    ["t_s", "E_proxy", "discharge"],
    rows.map((r) => [general12(r.t), general12(r.m), String(r.discharge)])
  );
}

export type SeismicTraceOptions = {
  magCol: string;
  dischargeThreshold: number;
};

/**
 * Event catalogue -> trace: t_s is the row index, E_proxy the magnitude,
 * discharge marks events at or above the threshold. Row order is kept.
 */
export function seismicTrace(
  rows: ReadonlyArray<{ cells: ReadonlyMap<string, string>; line: number }>,
  opts: SeismicTraceOptions
): ObservationV1[] {
  if (rows.length > 0 && !rows[0].cells.has(opts.magCol)) {
    throw new ValidationError(`Magnitude column not found: ${opts.magCol}`);
  }
  return rows.map((row, i): ObservationV1 => {
    const raw = row.cells.get(opts.magCol) ?? "";
    const m = parseRealCell(raw);
    if (Number.isNaN(m)) throw new ValidationError(`Cannot parse ${opts.magCol} as float: ${JSON.stringify(raw)}`, row.line);
    return { t: i, m, discharge: m >= opts.dischargeThreshold ? 1 : 0 };
  });
}

export function renderSeismicTrace(rows: ReadonlyArray<ObservationV1>): string {
  return csvDocument(
    ["t_s", "E_proxy", "discharge"],
    rows.map((r) => [String(r.t), floatRepr(r.m), String(r.discharge)])
  );
}
