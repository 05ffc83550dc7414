// SSSL error taxonomy.
//
// Every failure the engine or the capsule can detect is one of these classes.
// Callers branch on `code` (and `check` for invariant violations), never on
// message text. Messages keep the `CODE: detail` shape.

import type { InvariantCheck } from "@sssl/contracts";

export type SsslErrorCode =
  | "VALIDATION_ERROR"
  | "DATA_ERROR"
  | "INVARIANT_VIOLATION"
  | "REPLAY_MISMATCH"
  | "MISSING_ARTIFACT"
  | "ARGUMENT_ERROR"
  | "RUN_FAILED";

export abstract class SsslError extends Error {
  abstract readonly code: SsslErrorCode;

  protected constructor(code: SsslErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed header/row or out-of-range field.
 */
export class ValidationError extends SsslError {
  readonly code = "VALIDATION_ERROR" as const;

  constructor(detail: string, readonly line?: number) {
    super("VALIDATION_ERROR", line === undefined ? detail : `${detail} (line ${line})`);
  }
}

/**
 * Too few rows, or a matrix artifact that is not square/numeric.
 */
export class DataError extends SsslError {
  readonly code = "DATA_ERROR" as const;

  constructor(detail: string) {
    super("DATA_ERROR", detail);
  }
}

export class InvariantViolation extends SsslError {
  readonly code = "INVARIANT_VIOLATION" as const;

  constructor(readonly check: InvariantCheck, detail: string) {
    super("INVARIANT_VIOLATION", `${check}: ${detail}`);
  }
}

/**
 * Replay A and replay B of one case differ.
 */
export class ReplayMismatch extends SsslError {
  readonly code = "REPLAY_MISMATCH" as const;

  constructor(readonly caseName: string, detail: string) {
    super("REPLAY_MISMATCH", `${caseName}: ${detail}`);
  }
}

export class MissingArtifact extends SsslError {
  readonly code = "MISSING_ARTIFACT" as const;

  constructor(readonly artifactPath: string) {
    super("MISSING_ARTIFACT", artifactPath);
  }
}

export class ArgumentError extends SsslError {
  readonly code = "ARGUMENT_ERROR" as const;

  constructor(detail: string) {
    super("ARGUMENT_ERROR", detail);
  }
}

/**
 * An engine run did not complete (non-zero child exit, or an in-process throw).
 */
export class RunFailedError extends SsslError {
  readonly code = "RUN_FAILED" as const;
  readonly exitCode: number | null;

  constructor(detail: string, options?: { cause?: unknown; exitCode?: number | null }) {
    super("RUN_FAILED", detail, { cause: options?.cause });
    this.exitCode = options?.exitCode ?? null;
  }
}

export function isSsslError(e: unknown): e is SsslError {
  return e instanceof SsslError;
}
