import { z } from "zod";

// Classification thresholds for the posture decision tree.
export const ClassifierParamsV1Z = z
  .object({
    tau0: z.number().finite(), // Z0 ceiling on E
    taus: z.number().finite(), // S floor on E
    eps: z.number().finite(), // flatness band on |dE/dt|
    drop: z.number().finite() // Eminus trigger on dE/dt <= -|drop|
  })
  .strict();

export type ClassifierParamsV1 = z.infer<typeof ClassifierParamsV1Z>;

export const AccumulationParamsV1Z = z
  .object({
    s0: z.number().int(),
    s_max: z.number().int().nonnegative(),
    inc_on_eminus: z.number().int().nonnegative(),
    dec_on_s: z.number().int().nonnegative()
  })
  .strict()
  .refine((p) => p.s0 >= 0 && p.s0 <= p.s_max, {
    message: "s0 must lie within [0, s_max]",
    path: ["s0"]
  });

export type AccumulationParamsV1 = z.infer<typeof AccumulationParamsV1Z>;

export const AdmissibilityParamsV1Z = z
  .object({
    collapse_ratio_max: z.number().finite(),
    churn_ratio_max: z.number().finite(),
    require_s: z.number().int()
  })
  .strict();

export type AdmissibilityParamsV1 = z.infer<typeof AdmissibilityParamsV1Z>;

export const DEFAULT_CLASSIFIER_PARAMS_V1: Readonly<ClassifierParamsV1> = Object.freeze({
  tau0: 0.05,
  taus: 0.7,
  eps: 0.02,
  drop: 0.15
});

export const DEFAULT_ACCUMULATION_PARAMS_V1: Readonly<AccumulationParamsV1> = Object.freeze({
  s0: 0,
  s_max: 50,
  inc_on_eminus: 1,
  dec_on_s: 1
});

export const DEFAULT_ADMISSIBILITY_PARAMS_V1: Readonly<AdmissibilityParamsV1> = Object.freeze({
  collapse_ratio_max: 0.6,
  churn_ratio_max: 0.8,
  require_s: 0
});
