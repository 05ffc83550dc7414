// Admissibility Evaluator
//
// Reduces a state sequence to four scalar metrics and a binary verdict.
// ABSTAIN when collapse_ratio > collapse_ratio_max, or churn_ratio > churn_ratio_max,
// or count_S < require_s. ALLOW otherwise.

import type {
  AdmissibilityMetricsV1,
  AdmissibilityParamsV1,
  AdmissibilityResultV1,
  StructuralState
} from "@sssl/contracts";

/**
 * Number of adjacent positions whose labels differ.
 */
export function countChurn(states: ReadonlyArray<StructuralState>): number {
  let churn = 0;
  for (let i = 1; i < states.length; i++) {
    if (states[i] !== states[i - 1]) churn += 1;
  }
  return churn;
}

/**
 * Mean length of maximal consecutive runs of `target`; 0 when there is none.
 */
export function averageDwell(states: ReadonlyArray<StructuralState>, target: StructuralState): number {
  const lengths: number[] = [];
  let cur = 0;
  for (const a of states) {
    if (a === target) {
      cur += 1;
    } else if (cur > 0) {
      lengths.push(cur);
      cur = 0;
    }
  }
  if (cur > 0) lengths.push(cur);
  if (lengths.length === 0) return 0;
  return lengths.reduce((acc, v) => acc + v, 0) / lengths.length;
}

export function admissibilityMetrics(states: ReadonlyArray<StructuralState>): AdmissibilityMetricsV1 {
  const n = states.length;
  if (n === 0) {
    return { collapse_ratio: 0, churn_ratio: 0, count_S: 0, avg_dwell_S: 0 };
  }
  const eminus = states.filter((a) => a === "Eminus").length;
  return {
    collapse_ratio: eminus / n,
    churn_ratio: countChurn(states) / n,
    count_S: states.filter((a) => a === "S").length,
    avg_dwell_S: averageDwell(states, "S")
  };
}

export function evaluateAdmissibility(
  states: ReadonlyArray<StructuralState>,
  p: AdmissibilityParamsV1
): AdmissibilityResultV1 {
  const metrics = admissibilityMetrics(states);
  const abstain =
    metrics.collapse_ratio > p.collapse_ratio_max ||
    metrics.churn_ratio > p.churn_ratio_max ||
    metrics.count_S < p.require_s;
  return { verdict: abstain ? "ABSTAIN" : "ALLOW", metrics };
}
