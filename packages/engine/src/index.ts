// @sssl/engine
// File-backed runner around the kernel: parameters, artifact writing, sealing.

export * from "./logger";
export * from "./config/repo_root";
export * from "./config/load_config";
export * from "./seal/manifest";
export * from "./run/run_sssl";
export * from "./battery/battery_extract";
export * from "./traces/prepare_trace";
export * from "./traces/generators";
export * from "./cli/args";
export * from "./cli/exit_codes";
export { runEngineCli, processIO } from "./cli";
export type { CliIO } from "./cli";
