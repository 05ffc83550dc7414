// Eigen-spectrum by unshifted QR iteration.
//
// Only the real part of each diagonal entry is reported. Complex-conjugate
// pairs therefore come out as (non-converging) real numbers; this is an
// inherited simplification. The spectrum is informational and never feeds
// a pass/fail invariant.

import type { Matrix } from "./transitions";

export const QR_ITERATIONS = 200;

function dot(u: ReadonlyArray<number>, v: ReadonlyArray<number>): number {
  let s = 0;
  for (let i = 0; i < u.length; i++) s += u[i] * v[i];
  return s;
}

function matmul(x: Matrix, y: Matrix): number[][] {
  const n = x.length;
  const m = y[0].length;
  const k = y.length;
  const out: number[][] = [];
  for (let i = 0; i < n; i++) {
    const row = new Array<number>(m).fill(0);
    for (let j = 0; j < m; j++) {
      let s = 0;
      for (let t = 0; t < k; t++) s += x[i][t] * y[t][j];
      row[j] = s;
    }
    out.push(row);
  }
  return out;
}

/**
 * Classical Gram-Schmidt QR. A column with zero residual norm yields a zero
 * column in Q (and a zero diagonal entry in R).
 */
export function qrDecompose(a: Matrix): { q: number[][]; r: number[][] } {
  const n = a.length;
  const q = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  const r = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let j = 0; j < n; j++) {
    const v = a.map((row) => row[j]);
    for (let i = 0; i < j; i++) {
      const qi = q.map((row) => row[i]);
      r[i][j] = dot(qi, v);
      for (let t = 0; t < n; t++) v[t] -= r[i][j] * qi[t];
    }
    r[j][j] = Math.sqrt(dot(v, v));
    for (let t = 0; t < n; t++) q[t][j] = r[j][j] === 0 ? 0 : v[t] / r[j][j];
  }
  return { q, r };
}

/**
 * Real parts of the diagonal after a fixed number of A <- RQ steps.
 */
export function eigenvaluesQr(a: Matrix, iterations = QR_ITERATIONS): number[] {
  let ak: number[][] = a.map((row) => [...row]);
  for (let k = 0; k < iterations; k++) {
    const { q, r } = qrDecompose(ak);
    ak = matmul(r, q);
  }
  return ak.map((row, i) => row[i]);
}

/**
 * max |lambda_i| over the reported (real) eigenvalues.
 */
export function spectralRadiusFromEigenvalues(eigs: ReadonlyArray<number>): number {
  return eigs.reduce((acc, z) => Math.max(acc, Math.abs(z)), 0);
}
