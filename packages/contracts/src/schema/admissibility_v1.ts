import { z } from "zod";

export const ADMISSIBILITY_VERDICTS = Object.freeze(["ALLOW", "ABSTAIN"] as const);

export const AdmissibilityVerdictZ = z.enum(ADMISSIBILITY_VERDICTS);

export type AdmissibilityVerdict = z.infer<typeof AdmissibilityVerdictZ>;

export const AdmissibilityMetricsV1Z = z
  .object({
    collapse_ratio: z.number().min(0).max(1), // count(Eminus) / n
    churn_ratio: z.number().min(0).max(1), // adjacent label changes / n
    count_S: z.number().int().nonnegative(),
    avg_dwell_S: z.number().nonnegative() // mean length of maximal S runs; 0 when none
  })
  .strict();

export type AdmissibilityMetricsV1 = z.infer<typeof AdmissibilityMetricsV1Z>;

export type AdmissibilityResultV1 = {
  verdict: AdmissibilityVerdict;
  metrics: AdmissibilityMetricsV1;
};
