// @sssl/kernel
// Pure classification/substrate engine. IO-free: the engine and capsule
// packages own every file read and write.

export * from "./errors";
export * from "./kernel";
export * from "./ingest/csv_records";
export * from "./ingest/observations";
export * from "./classify/classifier";
export * from "./substrate/accumulation";
export * from "./substrate/operators";
export * from "./substrate/collapse";
export * from "./spectral/transitions";
export * from "./spectral/power_iteration";
export * from "./spectral/qr_iteration";
export * from "./admissibility/admissibility";
export * from "./render/format";
export * from "./render/artifacts";
