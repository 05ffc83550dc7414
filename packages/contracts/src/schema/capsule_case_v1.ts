import { z } from "zod";

import type { AdmissibilityVerdict } from "./admissibility_v1";

export const CAPSULE_CASE_NAMES = Object.freeze(["SMOKE", "MECH", "FLUID", "NEGCTL_ABSTAIN"] as const);

export const CapsuleCaseNameZ = z.enum(CAPSULE_CASE_NAMES);

export type CapsuleCaseName = z.infer<typeof CapsuleCaseNameZ>;

/**
 * Where a case's input trace comes from.
 * - "fixture": an existing file under the repository's data directory
 * - "negative_control": synthesized into the capsule work directory
 */
export type CapsuleCaseInput =
  | { kind: "fixture"; relPath: string }
  | { kind: "negative_control"; fileName: string; samples: number };

export type CapsuleCaseV1 = {
  name: CapsuleCaseName;
  input: CapsuleCaseInput;
  expected: AdmissibilityVerdict;
};

// Invariant check ids, also used to tag InvariantViolation errors.
export const INVARIANT_CHECKS = Object.freeze([
  "collapse_identity",
  "a4_tokens",
  "spectral_radius",
  "admissibility",
  "artifact_aliasing"
] as const);

export type InvariantCheck = (typeof INVARIANT_CHECKS)[number];

export const CapsuleSuiteZ = z.literal("core");

export type CapsuleSuite = z.infer<typeof CapsuleSuiteZ>;
