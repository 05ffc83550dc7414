import { z } from "zod";

/**
 * Execution context a run is pinned to. Passed explicitly into every run;
 * replay runs never read or mutate ambient process state to obtain it.
 */
export const ExecutionContextV1Z = z
  .object({
    hashSeed: z.string().min(1),
    locale: z.string().min(1),
    timeZone: z.string().min(1)
  })
  .strict();

export type ExecutionContextV1 = z.infer<typeof ExecutionContextV1Z>;

export const PINNED_EXECUTION_CONTEXT_V1: Readonly<ExecutionContextV1> = Object.freeze({
  hashSeed: "0",
  locale: "C",
  timeZone: "UTC"
});

/**
 * Environment variables a child run receives for a given context.
 */
export function executionContextToEnv(ctx: ExecutionContextV1): Record<string, string> {
  return {
    SSSL_HASH_SEED: ctx.hashSeed,
    LC_ALL: ctx.locale,
    LANG: ctx.locale,
    TZ: ctx.timeZone
  };
}

/**
 * Reads the context back from an environment. Unset values fall back to the
 * pinned ones, so a bare invocation still discloses a concrete context.
 */
export function executionContextFromEnv(env: Readonly<Record<string, string | undefined>>): ExecutionContextV1 {
  return ExecutionContextV1Z.parse({
    hashSeed: env.SSSL_HASH_SEED || PINNED_EXECUTION_CONTEXT_V1.hashSeed,
    locale: env.LC_ALL || env.LANG || PINNED_EXECUTION_CONTEXT_V1.locale,
    timeZone: env.TZ || PINNED_EXECUTION_CONTEXT_V1.timeZone
  });
}
