import { isSsslError } from "@sssl/kernel";
import type { SsslErrorCode } from "@sssl/kernel";

export const EXIT_OK = 0;
export const EXIT_GENERIC = 1;

// Total over the taxonomy: adding an error code without an exit code fails to compile.
export const EXIT_CODE_BY_ERROR: Readonly<Record<SsslErrorCode, number>> = Object.freeze({
  ARGUMENT_ERROR: 2,
  MISSING_ARTIFACT: 3,
  VALIDATION_ERROR: 4,
  DATA_ERROR: 4,
  INVARIANT_VIOLATION: 4,
  REPLAY_MISMATCH: 4,
  RUN_FAILED: 1
});

export function exitCodeFor(e: unknown): number {
  return isSsslError(e) ? EXIT_CODE_BY_ERROR[e.code] : EXIT_GENERIC;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
