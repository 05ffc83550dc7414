// Shared test helpers for @sssl/kernel.

import fs from "node:fs";
import path from "node:path";

import {
  DEFAULT_ACCUMULATION_PARAMS_V1,
  DEFAULT_ADMISSIBILITY_PARAMS_V1,
  DEFAULT_CLASSIFIER_PARAMS_V1
} from "@sssl/contracts";

import type { SsslParamsV1 } from "../kernel";

export const DEFAULT_PARAMS: SsslParamsV1 = {
  classifier: { ...DEFAULT_CLASSIFIER_PARAMS_V1 },
  accumulation: { ...DEFAULT_ACCUMULATION_PARAMS_V1 },
  admissibility: { ...DEFAULT_ADMISSIBILITY_PARAMS_V1 }
};

// Anchored on __dirname so the tests do not depend on the working directory.
export function readDataFile(name: string): string {
  return fs.readFileSync(path.resolve(__dirname, "../../../../data", name), "utf8");
}

export function csv(lines: ReadonlyArray<string>): string {
  return `${lines.join("\n")}\n`;
}
