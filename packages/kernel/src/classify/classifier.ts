// Structural State Classifier
//
// Rule priority is load-bearing; the first matching rule wins:
// 1) Eminus: discharge = 1 OR dE/dt <= -|drop|
// 2) S:      E >= taus AND |dE/dt| <= eps
// 3) Z0:     E <= tau0 AND |dE/dt| <= eps
// 4) Eplus:  everything else

import type { ClassifierParamsV1, ObservationV1, StructuralState } from "@sssl/contracts";

export function classifyState(e: number, dedt: number, discharge: 0 | 1, p: ClassifierParamsV1): StructuralState {
  if (discharge === 1 || dedt <= -Math.abs(p.drop)) return "Eminus";
  if (e >= p.taus && Math.abs(dedt) <= p.eps) return "S";
  if (e <= p.tau0 && Math.abs(dedt) <= p.eps) return "Z0";
  return "Eplus";
}

/**
 * Labels every observation; output is aligned 1:1 with `rows`.
 */
export function classifyTrace(
  rows: ReadonlyArray<ObservationV1>,
  derivatives: ReadonlyArray<number>,
  p: ClassifierParamsV1
): StructuralState[] {
  if (rows.length !== derivatives.length) {
    throw new Error(`classifyTrace: rows/derivatives length mismatch (${rows.length} vs ${derivatives.length})`);
  }
  return rows.map((r, i) => classifyState(r.m, derivatives[i], r.discharge, p));
}
