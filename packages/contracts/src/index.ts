export * from "./schema/structural_state_v1";
export * from "./schema/admissibility_v1";
export * from "./schema/observation_v1";
export * from "./schema/params_v1";
export * from "./schema/sssl_config_v1";
export * from "./schema/execution_context_v1";
export * from "./schema/artifacts_v1";
export * from "./schema/capsule_case_v1"; // Capsule registry shapes: consumed by @sssl/capsule only
