// Operator algebra over A4.
//
// Inv is an involution (Z0, S fixed; Eplus <-> Eminus). Series and Parallel are
// commutative and absorb toward Eminus. Z0 is the identity of Series.
// The table is static: it never depends on the input trace.

import { A4 } from "@sssl/contracts";
import type { StructuralState } from "@sssl/contracts";

export function invS(a: StructuralState): StructuralState {
  switch (a) {
    case "Z0":
      return "Z0";
    case "S":
      return "S";
    case "Eplus":
      return "Eminus";
    case "Eminus":
      return "Eplus";
  }
}

export function seriesS(a: StructuralState, b: StructuralState): StructuralState {
  if (a === "Eminus" || b === "Eminus") return "Eminus";
  if (a === "S" && b === "S") return "S";
  if ((a === "S" && b === "Eplus") || (a === "Eplus" && b === "S")) return "Eplus";
  if (a === "Z0") return b;
  if (b === "Z0") return a;
  return "Eplus";
}

export function parallelS(a: StructuralState, b: StructuralState): StructuralState {
  if (a === "Eminus" || b === "Eminus") return "Eminus";
  if (a === "S" && b === "S") return "S";
  if (a === "Z0" && b === "Z0") return "Z0";
  return "Eplus";
}

export type OperatorTableRow = {
  a: StructuralState;
  b: StructuralState;
  inv: StructuralState; // Inv_s(a)
  series: StructuralState; // Series_s(a,b)
  parallel: StructuralState; // Parallel_s(a,b)
};

/**
 * Full truth table, rows in A4 x A4 order (16 rows).
 */
export function buildOperatorTable(): ReadonlyArray<OperatorTableRow> {
  const rows: OperatorTableRow[] = [];
  for (const a of A4) {
    for (const b of A4) {
      rows.push({ a, b, inv: invS(a), series: seriesS(a, b), parallel: parallelS(a, b) });
    }
  }
  return Object.freeze(rows);
}
