// Observation Ingestor
//
// Parses the 3-column trace (t_s, E_proxy, discharge), validates every row
// at the boundary, and returns observations in canonical order.

import { OBSERVATION_HEADER_V1, ObservationV1Z } from "@sssl/contracts";
import type { ObservationV1 } from "@sssl/contracts";

import { DataError, ValidationError } from "../errors";
import { readCsvRecords } from "./csv_records";

const FIELD_LABELS: Readonly<Record<string, string>> = {
  t: "t_s",
  m: "E_proxy",
  discharge: "discharge"
};

/**
 * Numeric value of a CSV cell; NaN for blank cells (Number("") would be 0).
 */
export function parseRealCell(token: string): number {
  const s = token.trim();
  return s === "" ? Number.NaN : Number(s);
}

function toInt(token: string): number {
  const s = token.trim();
  return /^[+-]?\d+$/.test(s) ? Number(s) : Number.NaN;
}

/**
 * Total order on observations: t, then m, then discharge.
 */
export function compareObservations(a: ObservationV1, b: ObservationV1): number {
  if (a.t !== b.t) return a.t < b.t ? -1 : 1;
  if (a.m !== b.m) return a.m < b.m ? -1 : 1;
  return a.discharge - b.discharge;
}

export function sortObservations(rows: ReadonlyArray<ObservationV1>): ObservationV1[] {
  return [...rows].sort(compareObservations); // Array#sort is stable
}

/**
 * Parses observation CSV text.
 *
 * @param text - Full file content.
 * @param source - Name used in error messages (usually the file path).
 * @throws ValidationError on header/row problems, DataError on fewer than 2 rows.
 */
export function parseObservationsCsv(text: string, source = "<input>"): ObservationV1[] {
  const records = readCsvRecords(text, source);
  if (records.length === 0) {
    throw new ValidationError(`CSV header must be exactly: ${OBSERVATION_HEADER_V1.join(",")} (got nothing) in ${source}`);
  }

  const [header, ...body] = records;
  const headerOk =
    header.cells.length === OBSERVATION_HEADER_V1.length &&
    OBSERVATION_HEADER_V1.every((name, i) => header.cells[i].trim() === name);
  if (!headerOk) {
    throw new ValidationError(
      `CSV header must be exactly: ${OBSERVATION_HEADER_V1.join(",")} (got ${header.cells.join(",")}) in ${source}`,
      header.line
    );
  }

  const rows: ObservationV1[] = [];
  for (const rec of body) {
    if (rec.cells.length !== OBSERVATION_HEADER_V1.length) {
      throw new ValidationError(`bad row: expected 3 fields, got ${rec.cells.length}`, rec.line);
    }
    const candidate = {
      t: parseRealCell(rec.cells[0]),
      m: parseRealCell(rec.cells[1]),
      discharge: toInt(rec.cells[2])
    };
    const parsed = ObservationV1Z.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = FIELD_LABELS[String(issue.path[0])] ?? "row";
      throw new ValidationError(`bad row: ${field} ${issue.message} (got ${rec.cells.join(",")})`, rec.line);
    }
    rows.push(parsed.data);
  }

  if (rows.length < 2) {
    throw new DataError(`need at least 2 rows to compute derivative (got ${rows.length}) in ${source}`);
  }
  return sortObservations(rows);
}

/**
 * Per-sample dE/dt from the immediate predecessor.
 * d[0] = 0, and d[i] = 0 wherever dt = 0.
 */
export function computeDerivatives(rows: ReadonlyArray<ObservationV1>): number[] {
  const d = new Array<number>(rows.length).fill(0);
  for (let i = 1; i < rows.length; i++) {
    const dt = rows[i].t - rows[i - 1].t;
    d[i] = dt === 0 ? 0 : (rows[i].m - rows[i - 1].m) / dt;
  }
  return d;
}
