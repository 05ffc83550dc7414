// SSSL kernel: pure pipeline entrypoint.
//
// observations -> derivatives -> states -> { accumulation, operators,
// admissibility, transitions, spectrum, collapse identity } -> artifact texts.
//
// No IO, no clock, no randomness. The same inputs always produce the same
// artifact bytes; the engine package is responsible for writing them.

import { ARTIFACT_NAMES_V1, isStructuralState } from "@sssl/contracts";
import type {
  AccumulationParamsV1,
  AdmissibilityParamsV1,
  AdmissibilityResultV1,
  ArtifactName,
  ClassifierParamsV1,
  ExecutionContextV1,
  ObservationV1,
  StructuralState
} from "@sssl/contracts";

import { computeDerivatives } from "./ingest/observations";
import { classifyTrace } from "./classify/classifier";
import { accumulate } from "./substrate/accumulation";
import { buildOperatorTable } from "./substrate/operators";
import type { OperatorTableRow } from "./substrate/operators";
import { collapseCheck } from "./substrate/collapse";
import type { CollapseCheckRow } from "./substrate/collapse";
import { evaluateAdmissibility } from "./admissibility/admissibility";
import { transitionCounts, transitionEdges, transitionRatios } from "./spectral/transitions";
import type { TransitionEdge } from "./spectral/transitions";
import { eigenvaluesQr, spectralRadiusFromEigenvalues } from "./spectral/qr_iteration";
import * as render from "./render/artifacts";

export type SsslParamsV1 = {
  classifier: ClassifierParamsV1;
  accumulation: AccumulationParamsV1;
  admissibility: AdmissibilityParamsV1;
};

export type SubstrateV1 = {
  accumulation: ReadonlyArray<number>;
  operatorTable: ReadonlyArray<OperatorTableRow>;
  admissibility: AdmissibilityResultV1;
  counts: ReadonlyArray<ReadonlyArray<number>>;
  p: ReadonlyArray<ReadonlyArray<number>>;
  edges: ReadonlyArray<TransitionEdge>;
  eigenvalues: ReadonlyArray<number>;
  spectralRadius: number;
  collapse: ReadonlyArray<CollapseCheckRow>;
};

export type SsslRunV1 = {
  observations: ReadonlyArray<ObservationV1>;
  derivatives: ReadonlyArray<number>;
  states: ReadonlyArray<StructuralState>;
  stateCounts: Readonly<Record<StructuralState, number>>;
  substrate: SubstrateV1 | null;
};

export type RenderedArtifact = {
  name: ArtifactName;
  content: string;
};

function countStates(states: ReadonlyArray<StructuralState>): Record<StructuralState, number> {
  const counts: Record<StructuralState, number> = { Z0: 0, Eplus: 0, S: 0, Eminus: 0 };
  for (const a of states) counts[a] += 1;
  return counts;
}

/**
 * Runs the full interpretation over sorted observations.
 *
 * @param observations - Output of parseObservationsCsv (sorted, >= 2 rows).
 * @param options.substrate - When false only the classification is computed.
 */
export function runSsslKernel(
  observations: ReadonlyArray<ObservationV1>,
  params: SsslParamsV1,
  options: { substrate: boolean }
): SsslRunV1 {
  const derivatives = computeDerivatives(observations);
  const states = classifyTrace(observations, derivatives, params.classifier);

  let substrate: SubstrateV1 | null = null;
  if (options.substrate) {
    const accumulation = accumulate(states, params.accumulation);
    const counts = transitionCounts(states);
    const p = transitionRatios(counts);
    const eigenvalues = eigenvaluesQr(p);
    substrate = {
      accumulation,
      operatorTable: buildOperatorTable(),
      admissibility: evaluateAdmissibility(states, params.admissibility),
      counts,
      p,
      edges: transitionEdges(counts),
      eigenvalues,
      spectralRadius: spectralRadiusFromEigenvalues(eigenvalues),
      collapse: collapseCheck(observations, states, accumulation)
    };
  }

  return { observations, derivatives, states, stateCounts: countStates(states), substrate };
}

/**
 * Renders every artifact of a run, in write order. The manifest is not
 * included: it is produced by the sealer after these files exist.
 */
export function renderSsslArtifacts(
  run: SsslRunV1,
  params: SsslParamsV1,
  context: ExecutionContextV1
): ReadonlyArray<RenderedArtifact> {
  const out: RenderedArtifact[] = [
    { name: ARTIFACT_NAMES_V1.states, content: render.renderStatesCsv(run.observations, run.derivatives, run.states) }
  ];

  const sub = run.substrate;
  if (sub) {
    out.push(
      {
        name: ARTIFACT_NAMES_V1.accumulation,
        content: render.renderAccumulationCsv(run.observations, run.states, sub.accumulation)
      },
      { name: ARTIFACT_NAMES_V1.operatorTable, content: render.renderOperatorTableCsv(sub.operatorTable) },
      { name: ARTIFACT_NAMES_V1.admissibility, content: render.renderAdmissibility(sub.admissibility) },
      { name: ARTIFACT_NAMES_V1.transitionCounts, content: render.renderTransitionCounts(sub.counts) },
      { name: ARTIFACT_NAMES_V1.pMatrix, content: render.renderPMatrix(sub.p) },
      { name: ARTIFACT_NAMES_V1.transitionRatios, content: render.renderTransitionRatios(sub.edges) },
      { name: ARTIFACT_NAMES_V1.eigenspectrum, content: render.renderEigenspectrum(sub.eigenvalues, sub.spectralRadius) },
      { name: ARTIFACT_NAMES_V1.collapseCheck, content: render.renderCollapseCheck(sub.collapse) }
    );
  }

  out.push({
    name: ARTIFACT_NAMES_V1.summary,
    content: render.renderSummary({
      classifier: params.classifier,
      accumulation: params.accumulation,
      admissibility: params.admissibility,
      context,
      observations: run.observations.length,
      counts: run.stateCounts,
      substrate: sub !== null
    })
  });

  return Object.freeze(out);
}

/**
 * Every label is a member of A4 (closure check used by tests and callers
 * that receive states from outside the classifier).
 */
export function allInA4(states: ReadonlyArray<string>): boolean {
  return states.every((s) => isStructuralState(s));
}
