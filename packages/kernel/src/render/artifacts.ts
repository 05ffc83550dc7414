// Artifact renderers: pure functions from run values to file content.

import { A4, COLLAPSE_IDENTITY_TEXT } from "@sssl/contracts";
import type {
  AccumulationParamsV1,
  AdmissibilityParamsV1,
  AdmissibilityResultV1,
  ClassifierParamsV1,
  ExecutionContextV1,
  ObservationV1,
  StructuralState
} from "@sssl/contracts";

import type { CollapseCheckRow } from "../substrate/collapse";
import type { OperatorTableRow } from "../substrate/operators";
import type { Matrix, TransitionEdge } from "../spectral/transitions";
import { csvDocument, fixed, floatRepr, textBlock } from "./format";

const MATRIX_CORNER = "From\\To";

export function renderStatesCsv(
  rows: ReadonlyArray<ObservationV1>,
  derivatives: ReadonlyArray<number>,
  states: ReadonlyArray<StructuralState>
): string {
  return csvDocument(
    ["t_s", "E_proxy", "dE_dt", "discharge", "a_state"],
    rows.map((r, i) => [fixed(r.t, 6), fixed(r.m, 6), fixed(derivatives[i], 6), String(r.discharge), states[i]])
  );
}

export function renderAccumulationCsv(
  rows: ReadonlyArray<ObservationV1>,
  states: ReadonlyArray<StructuralState>,
  accumulation: ReadonlyArray<number>
): string {
  return csvDocument(
    ["t_s", "E_proxy", "a_state", "s"],
    rows.map((r, i) => [fixed(r.t, 6), fixed(r.m, 6), states[i], String(accumulation[i])])
  );
}

export function renderOperatorTableCsv(table: ReadonlyArray<OperatorTableRow>): string {
  return csvDocument(
    ["a", "b", "Inv_s(a)", "Series_s(a,b)", "Parallel_s(a,b)"],
    table.map((r) => [r.a, r.b, r.inv, r.series, r.parallel])
  );
}

export function renderAdmissibility(result: AdmissibilityResultV1): string {
  const m = result.metrics;
  // Metric keys in sorted order.
  return textBlock([
    "SSSL admissibility verdict",
    `adm_E: ${result.verdict}`,
    "Metrics:",
    `avg_dwell_S: ${floatRepr(m.avg_dwell_S)}`,
    `churn_ratio: ${floatRepr(m.churn_ratio)}`,
    `collapse_ratio: ${floatRepr(m.collapse_ratio)}`,
    `count_S: ${floatRepr(m.count_S)}`
  ]);
}

export function renderTransitionCounts(counts: Matrix): string {
  return csvDocument(
    [MATRIX_CORNER, ...A4],
    A4.map((a, i) => [a, ...counts[i].map((c) => String(c))])
  );
}

/**
 * Compact ratio matrix (P_matrix.csv).
 */
export function renderPMatrix(p: Matrix): string {
  return csvDocument(
    [MATRIX_CORNER, ...A4],
    A4.map((a, i) => [a, ...p[i].map((x) => fixed(x, 6))])
  );
}

/**
 * Long-form ratio table (transition_ratios.csv). Deliberately a different
 * shape from P_matrix.csv; the capsule rejects the two being identical.
 */
export function renderTransitionRatios(edges: ReadonlyArray<TransitionEdge>): string {
  return csvDocument(
    ["from", "to", "count", "rowsum_from", "ratio"],
    edges.map((e) => [e.from, e.to, String(e.count), String(e.rowsum), fixed(e.ratio, 6)])
  );
}

export function renderEigenspectrum(eigenvalues: ReadonlyArray<number>, spectralRadius: number): string {
  return textBlock([
    "SSSL spectral artifact (deterministic QR iteration)",
    `Matrix order: [${A4.join(", ")}]`,
    "Eigenvalues (approx):",
    ...eigenvalues.map((z) => fixed(z, 12)),
    "",
    "Spectral radius estimate:",
    fixed(spectralRadius, 12)
  ]);
}

export function renderCollapseCheck(rows: ReadonlyArray<CollapseCheckRow>): string {
  return csvDocument(
    ["t_s", "m", "a_state", "s", "phi(m,a,s)", "ok"],
    rows.map((r) => [fixed(r.t, 6), fixed(r.m, 6), r.a, String(r.s), fixed(r.phi, 6), r.ok ? "1" : "0"])
  );
}

export type SummaryInput = {
  classifier: ClassifierParamsV1;
  accumulation: AccumulationParamsV1;
  admissibility: AdmissibilityParamsV1;
  context: ExecutionContextV1;
  observations: number;
  counts: Readonly<Record<StructuralState, number>>;
  substrate: boolean;
};

export function renderSummary(s: SummaryInput): string {
  const lines: string[] = [
    "SSSL Verifier — summary",
    "",
    `State space: A4 = {${A4.join(", ")}}`,
    `Conservative extension: ${COLLAPSE_IDENTITY_TEXT}`,
    "",
    "Deterministic parameters:",
    `tau0=${floatRepr(s.classifier.tau0)}`,
    `taus=${floatRepr(s.classifier.taus)}`,
    `eps=${floatRepr(s.classifier.eps)}`,
    `drop=${floatRepr(s.classifier.drop)}`
  ];
  if (s.substrate) {
    lines.push(
      "",
      "Accumulation parameters:",
      `s0=${s.accumulation.s0}`,
      `s_max=${s.accumulation.s_max}`,
      `inc_on_eminus=${s.accumulation.inc_on_eminus}`,
      `dec_on_s=${s.accumulation.dec_on_s}`,
      "",
      "Admissibility parameters:",
      `collapse_ratio_max=${floatRepr(s.admissibility.collapse_ratio_max)}`,
      `churn_ratio_max=${floatRepr(s.admissibility.churn_ratio_max)}`,
      `require_s=${s.admissibility.require_s}`
    );
  }
  lines.push(
    "",
    "Execution context:",
    `hash_seed=${s.context.hashSeed}`,
    `locale=${s.context.locale}`,
    `timezone=${s.context.timeZone}`,
    "",
    `Observations: ${s.observations}`,
    "State counts:",
    ...A4.map((k) => `${k}: ${s.counts[k]}`),
    "",
    "Rules (deterministic):",
    "- Eminus: discharge=1 OR dE/dt <= -drop",
    "- S: E_proxy >= taus AND |dE/dt| <= eps",
    "- Z0: E_proxy <= tau0 AND |dE/dt| <= eps",
    "- Otherwise: Eplus"
  );
  return textBlock(lines);
}
