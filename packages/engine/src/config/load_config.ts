import fs from "node:fs";
import path from "node:path";

import {
  AccumulationParamsV1Z,
  AdmissibilityParamsV1Z,
  ClassifierParamsV1Z,
  DEFAULT_ACCUMULATION_PARAMS_V1,
  DEFAULT_ADMISSIBILITY_PARAMS_V1,
  DEFAULT_CLASSIFIER_PARAMS_V1,
  SsslConfigV1Z
} from "@sssl/contracts";
import type { AccumulationParamsV1, AdmissibilityParamsV1, ClassifierParamsV1, SsslConfigV1 } from "@sssl/contracts";
import { MissingArtifact, ValidationError } from "@sssl/kernel";
import type { SsslParamsV1 } from "@sssl/kernel";
import type { ZodError } from "zod";

import { DEFAULT_CONFIG_REL } from "./repo_root";

export type ParamOverrides = {
  classifier: Partial<ClassifierParamsV1>;
  accumulation: Partial<AccumulationParamsV1>;
  admissibility: Partial<AdmissibilityParamsV1>;
};

export const NO_OVERRIDES: Readonly<ParamOverrides> = Object.freeze({
  classifier: {},
  accumulation: {},
  admissibility: {}
});

function describeZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

/**
 * Built-in parameters, identical to config/sssl/default.json.
 */
export function builtinSsslConfig(): SsslConfigV1 {
  return {
    schema_version: "1.0.0",
    classifier: { ...DEFAULT_CLASSIFIER_PARAMS_V1 },
    accumulation: { ...DEFAULT_ACCUMULATION_PARAMS_V1 },
    admissibility: { ...DEFAULT_ADMISSIBILITY_PARAMS_V1 }
  };
}

export function loadSsslConfig(configPath: string): SsslConfigV1 {
  const p = path.resolve(configPath);
  if (!fs.existsSync(p)) throw new MissingArtifact(p);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (e) {
    throw new ValidationError(`config is not valid JSON: ${p}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = SsslConfigV1Z.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`invalid config ${p}: ${describeZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function defaultConfigPath(repoRoot: string): string {
  return path.join(repoRoot, DEFAULT_CONFIG_REL);
}

/**
 * Applies CLI overrides on top of a config and re-validates each group, so
 * that a flag cannot produce a parameter set the config file could not.
 */
export function resolveSsslParams(base: SsslConfigV1, overrides: ParamOverrides = NO_OVERRIDES): SsslParamsV1 {
  const classifier = ClassifierParamsV1Z.safeParse({ ...base.classifier, ...overrides.classifier });
  if (!classifier.success) throw new ValidationError(`classifier parameters: ${describeZodError(classifier.error)}`);

  const accumulation = AccumulationParamsV1Z.safeParse({ ...base.accumulation, ...overrides.accumulation });
  if (!accumulation.success) throw new ValidationError(`accumulation parameters: ${describeZodError(accumulation.error)}`);

  const admissibility = AdmissibilityParamsV1Z.safeParse({ ...base.admissibility, ...overrides.admissibility });
  if (!admissibility.success) throw new ValidationError(`admissibility parameters: ${describeZodError(admissibility.error)}`);

  return { classifier: classifier.data, accumulation: accumulation.data, admissibility: admissibility.data };
}
