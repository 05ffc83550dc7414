import fs from "node:fs";
import path from "node:path";

import { ENV_MUTATION } from "../config/forbidden_tokens";
import { scanLines, sourceFiles } from "./source_files";

export function checkEnvMutation(repoRoot: string): string[] {
  const packagesDir = path.join(repoRoot, "packages");
  if (!fs.existsSync(packagesDir)) return [`missing packages dir at ${packagesDir}`];
  return fs
    .readdirSync(packagesDir)
    .sort()
    .flatMap((pkg) => sourceFiles(path.join(packagesDir, pkg, "src")))
    .flatMap((f) => scanLines(repoRoot, f, ENV_MUTATION));
}
