import { z } from "zod";

/**
 * A4: the closed structural-state alphabet.
 *
 * Order is load-bearing: every 4x4 artifact (counts, P, spectrum) uses
 * rows/columns in exactly this order.
 */
export const A4 = Object.freeze(["Z0", "Eplus", "S", "Eminus"] as const);

export const StructuralStateZ = z.enum(A4); // Closed set: any other token is invalid.

export type StructuralState = z.infer<typeof StructuralStateZ>;

const A4_SET: ReadonlySet<string> = new Set(A4);

export function isStructuralState(token: string): token is StructuralState {
  return A4_SET.has(token);
}

/**
 * Index of a state in A4 order (row/column index for matrix artifacts).
 */
export function stateIndex(state: StructuralState): number {
  return A4.indexOf(state);
}
