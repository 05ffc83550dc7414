// Transition statistics over the classified sequence.
//
// Matrices are 4x4 in A4 order. No wraparound: the last sample has no
// outgoing edge. Rows of P with zero outgoing mass stay all-zero (they are
// not replaced by a uniform row).

import { A4, stateIndex } from "@sssl/contracts";
import type { StructuralState } from "@sssl/contracts";

export type Matrix = ReadonlyArray<ReadonlyArray<number>>;

function zeros(n: number): number[][] {
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

export function transitionCounts(states: ReadonlyArray<StructuralState>): number[][] {
  const counts = zeros(A4.length);
  for (let i = 0; i + 1 < states.length; i++) {
    counts[stateIndex(states[i])][stateIndex(states[i + 1])] += 1;
  }
  return counts;
}

export function rowSums(m: Matrix): number[] {
  return m.map((row) => row.reduce((acc, v) => acc + v, 0));
}

/**
 * Row-normalized stochastic form P of a count matrix.
 */
export function transitionRatios(counts: Matrix): number[][] {
  const sums = rowSums(counts);
  return counts.map((row, i) => row.map((c) => (sums[i] > 0 ? c / sums[i] : 0)));
}

export type TransitionEdge = {
  from: StructuralState;
  to: StructuralState;
  count: number;
  rowsum: number;
  ratio: number;
};

/**
 * Long-form audit table: one explicit edge per (from, to) pair, 16 rows.
 */
export function transitionEdges(counts: Matrix): TransitionEdge[] {
  const sums = rowSums(counts);
  const edges: TransitionEdge[] = [];
  A4.forEach((from, i) => {
    A4.forEach((to, j) => {
      const count = counts[i][j];
      edges.push({ from, to, count, rowsum: sums[i], ratio: sums[i] > 0 ? count / sums[i] : 0 });
    });
  });
  return edges;
}
