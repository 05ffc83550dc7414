import { test } from "node:test";
import assert from "node:assert/strict";

import { computeDerivatives, parseObservationsCsv } from "../ingest/observations";
import { DataError, ValidationError } from "../errors";
import { csv } from "./fixtures";

function expectError<E extends Error>(fn: () => unknown, ctor: new (...args: never[]) => E, contains: string): E {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  assert.ok(caught instanceof ctor, `expected ${ctor.name}, got ${String(caught)}`);
  assert.ok(caught.message.includes(contains), `expected "${contains}" in "${caught.message}"`);
  return caught;
}

test("parses and sorts by (t, m, discharge)", () => {
  const rows = parseObservationsCsv(
    csv(["t_s,E_proxy,discharge", "2,0.5,0", "1,0.3,1", "1,0.3,0", "1,0.1,0", "0,0,0"])
  );
  assert.deepEqual(rows, [
    { t: 0, m: 0, discharge: 0 },
    { t: 1, m: 0.1, discharge: 0 },
    { t: 1, m: 0.3, discharge: 0 },
    { t: 1, m: 0.3, discharge: 1 },
    { t: 2, m: 0.5, discharge: 0 }
  ]);
});

test("accepts CRLF line endings and skips blank lines", () => {
  const rows = parseObservationsCsv("t_s,E_proxy,discharge\r\n0,0.2,0\r\n\r\n1,0.4,1\r\n");
  assert.deepEqual(rows, [
    { t: 0, m: 0.2, discharge: 0 },
    { t: 1, m: 0.4, discharge: 1 }
  ]);
});

test("rejects a header that is not exactly t_s,E_proxy,discharge", () => {
  const err = expectError(
    () => parseObservationsCsv(csv(["t,E,flag", "0,0,0", "1,0.1,0"]), "in.csv"),
    ValidationError,
    "(got t,E,flag)"
  );
  assert.equal(err.code, "VALIDATION_ERROR");
});

test("header cells are compared after trimming", () => {
  const rows = parseObservationsCsv("t_s, E_proxy, discharge\n0,0,0\n1,1,0\n");
  assert.deepEqual(rows, [
    { t: 0, m: 0, discharge: 0 },
    { t: 1, m: 1, discharge: 0 }
  ]);
});

test("rejects reordered header columns", () => {
  expectError(() => parseObservationsCsv(csv(["E_proxy,t_s,discharge", "0,0,0", "0.1,1,0"])), ValidationError, "header");
});

test("rejects negative E_proxy with the offending line", () => {
  const err = expectError(
    () => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,0.1,0", "1,-0.5,0"])),
    ValidationError,
    "E_proxy must be >= 0"
  );
  assert.equal(typeof err.line, "number");
});

test("rejects discharge outside {0,1} and non-integer discharge", () => {
  expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,0.1,2", "1,0.2,0"])), ValidationError, "discharge must be 0 or 1");
  expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,0.1,1.0", "1,0.2,0"])), ValidationError, "discharge must be 0 or 1");
});

test("rejects non-numeric and empty reals", () => {
  expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "abc,0.1,0", "1,0.2,0"])), ValidationError, "t_s must be a finite real");
  expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,,0", "1,0.2,0"])), ValidationError, "E_proxy must be a finite real");
});

test("rejects short rows", () => {
  expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,0.1", "1,0.2,0"])), ValidationError, "expected 3 fields, got 2");
});

test("requires at least two rows", () => {
  const err = expectError(() => parseObservationsCsv(csv(["t_s,E_proxy,discharge", "0,0.1,0"])), DataError, "need at least 2 rows");
  assert.equal(err.code, "DATA_ERROR");
});

test("derivative is 0 for the first sample and wherever dt = 0", () => {
  const d = computeDerivatives([
    { t: 0, m: 0, discharge: 0 },
    { t: 2, m: 1, discharge: 0 },
    { t: 2, m: 3, discharge: 0 },
    { t: 4, m: 2, discharge: 0 }
  ]);
  assert.deepEqual(d, [0, 0.5, 0, -0.5]);
});
