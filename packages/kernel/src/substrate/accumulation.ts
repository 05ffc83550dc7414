import type { AccumulationParamsV1, StructuralState } from "@sssl/contracts";

/**
 * Running fold over the state sequence, starting at s0:
 * Z0 resets to 0, Eminus adds inc_on_eminus (saturating at s_max),
 * S subtracts dec_on_s (floored at 0), Eplus leaves s unchanged.
 */
export function accumulate(states: ReadonlyArray<StructuralState>, p: AccumulationParamsV1): number[] {
  const out: number[] = [];
  let cur = p.s0;
  for (const a of states) {
    switch (a) {
      case "Z0":
        cur = 0;
        break;
      case "Eminus":
        cur = Math.min(p.s_max, cur + p.inc_on_eminus);
        break;
      case "S":
        cur = Math.max(0, cur - p.dec_on_s);
        break;
      case "Eplus":
        break;
    }
    out.push(cur);
  }
  return out;
}
