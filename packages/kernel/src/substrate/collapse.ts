import type { ObservationV1, StructuralState } from "@sssl/contracts";

/**
 * Projection of the conservative extension back onto the observable.
 * phi((m,a,s)) = m, for every a and s.
 */
export function phi(m: number, _a: StructuralState, _s: number): number {
  return m;
}

export type CollapseCheckRow = {
  t: number;
  m: number;
  a: StructuralState;
  s: number;
  phi: number;
  ok: boolean;
};

export function collapseCheck(
  rows: ReadonlyArray<ObservationV1>,
  states: ReadonlyArray<StructuralState>,
  accumulation: ReadonlyArray<number>
): CollapseCheckRow[] {
  return rows.map((r, i) => {
    const a = states[i];
    const s = accumulation[i];
    const value = phi(r.m, a, s);
    return { t: r.t, m: r.m, a, s, phi: value, ok: value === r.m };
  });
}
