import { test } from "node:test";
import assert from "node:assert/strict";

import { DataError } from "@sssl/kernel";

import { detectMatrixShape, isNumericCell, readMatrixCsv } from "../matrix_csv";

test("reads a labelled matrix with a header row", () => {
  const text = "From\\To,Z0,Eplus\nZ0,0.250000,0.750000\nEplus,1.000000,0.000000\n";
  assert.deepEqual(readMatrixCsv(text), [
    [0.25, 0.75],
    [1, 0]
  ]);
});

test("reads a bare numeric matrix", () => {
  assert.deepEqual(readMatrixCsv("0.5,0.5\n1,0\n"), [
    [0.5, 0.5],
    [1, 0]
  ]);
});

test("shape heuristics", () => {
  assert.deepEqual(detectMatrixShape([["a", "b"], ["1", "2"], ["3", "4"]]), { hasHeader: true, hasLabelColumn: false });
  assert.deepEqual(detectMatrixShape([["x", "1"], ["y", "2"]]), { hasHeader: true, hasLabelColumn: true });
  assert.deepEqual(detectMatrixShape([["1", "2"], ["3", "4"]]), { hasHeader: false, hasLabelColumn: false });
  assert.equal(isNumericCell(" 1e-3 "), true);
  assert.equal(isNumericCell(""), false);
  assert.equal(isNumericCell("Z0"), false);
});

test("rejects empty, ragged and non-numeric matrices", () => {
  assert.throws(() => readMatrixCsv(""), DataError);
  assert.throws(() => readMatrixCsv("h1,h2,h3\n1,2,3\n4,5,6\n"), /not square/);
  assert.throws(() => readMatrixCsv("From,A,B\nA,0.5,x\nB,1,0\n"), /non-numeric cell/);
  assert.throws(() => readMatrixCsv("From,A\n"), /no numeric matrix rows/);
});
