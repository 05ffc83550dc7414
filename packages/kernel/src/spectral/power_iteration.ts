import type { Matrix } from "./transitions";

export const POWER_ITERATIONS = 80;

/**
 * Dominant-eigenvalue estimate by power iteration.
 *
 * Starts from the uniform vector, iterates v <- Mv with infinity-norm
 * normalization for a fixed number of steps, and returns the last
 * normalization factor. Returns 0 if the iterate vanishes.
 *
 * For a row-stochastic P the estimate is 1 (Perron-Frobenius); the capsule
 * uses that as a structural self-check.
 */
export function spectralRadiusPowerIteration(m: Matrix, iterations = POWER_ITERATIONS): number {
  const n = m.length;
  if (n === 0) return 0;

  let v = new Array<number>(n).fill(1 / n);
  let rho = 0;
  for (let k = 0; k < iterations; k++) {
    const w = new Array<number>(n).fill(0);
    for (let i = 0; i < n; i++) {
      let s = 0;
      const row = m[i];
      for (let j = 0; j < n; j++) s += row[j] * v[j];
      w[i] = s;
    }
    let norm = 0;
    for (const x of w) norm = Math.max(norm, Math.abs(x));
    if (norm === 0) return 0;
    v = w.map((x) => x / norm);
    rho = norm;
  }
  return rho;
}
