import { z } from "zod";

import { AccumulationParamsV1Z, AdmissibilityParamsV1Z, ClassifierParamsV1Z } from "./params_v1";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/);

/**
 * Parameter file (config/sssl/*.json). All three groups are required so that
 * a run's parameters are fully disclosed by one document.
 */
export const SsslConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    classifier: ClassifierParamsV1Z,
    accumulation: AccumulationParamsV1Z,
    admissibility: AdmissibilityParamsV1Z
  })
  .strict();

export type SsslConfigV1 = z.infer<typeof SsslConfigV1Z>;

export function parseSsslConfigV1(input: unknown): SsslConfigV1 {
  return SsslConfigV1Z.parse(input); // Throws ZodError on any shape drift.
}
