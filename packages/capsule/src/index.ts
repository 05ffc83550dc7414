// @sssl/capsule
// Replay verification: run each case twice, check invariants, compare bytes.

export * from "./cases";
export * from "./runners";
export * from "./matrix_csv";
export * from "./invariants";
export * from "./compare";
export * from "./capsule";
export { runCapsuleCli, parseCapsuleArgs, capsuleExitCode } from "./cli";
export type { CapsuleArgs } from "./cli";
