// Tolerant reader for a square numeric matrix stored as CSV.
//
// Approximate by construction. Two heuristics decide the shape:
// 1) the first row is a header if any of its cells is non-numeric;
// 2) the first column is a label column if none of the first (up to) five
//    data rows has a numeric first cell.
// Everything left must be numeric and square, else DataError.

import { ARTIFACT_NAMES_V1 } from "@sssl/contracts";
import { DataError, parseRealCell, readCsvRecords } from "@sssl/kernel";

const LABEL_PROBE_ROWS = 5;

export function isNumericCell(cell: string): boolean {
  return !Number.isNaN(parseRealCell(cell));
}

export type MatrixShape = {
  hasHeader: boolean;
  hasLabelColumn: boolean;
};

export function detectMatrixShape(rows: ReadonlyArray<ReadonlyArray<string>>): MatrixShape {
  const first = rows[0] ?? [];
  const hasHeader = first.filter(isNumericCell).length < first.length;

  let hasLabelColumn = false;
  if (rows.length > 1) {
    const start = hasHeader ? 1 : 0;
    const probe = rows.slice(start, Math.min(rows.length, start + LABEL_PROBE_ROWS));
    hasLabelColumn = probe.every((r) => !isNumericCell(r[0] ?? ""));
  }
  return { hasHeader, hasLabelColumn };
}

export function readMatrixCsv(text: string, source: string = ARTIFACT_NAMES_V1.pMatrix): number[][] {
  const rows = readCsvRecords(text, source).map((r) => r.cells.map((c) => c.trim()));
  if (rows.length === 0) throw new DataError(`empty ${source}`);

  const shape = detectMatrixShape(rows);
  const body = shape.hasHeader ? rows.slice(1) : rows;

  const matrix: number[][] = [];
  for (const r of body) {
    const cells = shape.hasLabelColumn && r.length > 1 ? r.slice(1) : r;
    const nums = cells.map((c) => {
      if (!isNumericCell(c)) throw new DataError(`non-numeric cell in ${source}: ${JSON.stringify(c)}`);
      return parseRealCell(c);
    });
    if (nums.length > 0) matrix.push(nums);
  }

  if (matrix.length === 0) throw new DataError(`no numeric matrix rows in ${source}`);
  const n = matrix.length;
  if (matrix.some((r) => r.length !== n)) throw new DataError(`${source} not square`);
  return matrix;
}
