import path from "node:path";

import { ARTIFACT_NAMES_V1, MANIFEST_NAME } from "@sssl/contracts";

import { scanLines, sourceFiles } from "./source_files";

// Engine and capsule must agree on artifact names, so both take them from
// @sssl/contracts instead of spelling them out.
const PACKAGES = ["kernel", "engine", "capsule"];

function escapeRe(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const NAME_RULES = [...Object.values(ARTIFACT_NAMES_V1), MANIFEST_NAME].map((name) => ({
  pattern: new RegExp(`["'\`]${escapeRe(name)}["'\`]`),
  label: `hard-coded artifact name '${name}'`
}));

export function checkArtifactNames(repoRoot: string): string[] {
  return PACKAGES.flatMap((pkg) => sourceFiles(path.join(repoRoot, "packages", pkg, "src"))).flatMap((f) =>
    scanLines(repoRoot, f, NAME_RULES)
  );
}
