import path from "node:path";

import { KERNEL_FORBIDDEN } from "../config/forbidden_tokens";
import { scanLines, sourceFiles } from "./source_files";

export function checkKernelPurity(repoRoot: string): string[] {
  const kernelSrc = path.join(repoRoot, "packages", "kernel", "src");
  const files = sourceFiles(kernelSrc);
  if (files.length === 0) return [`missing kernel sources at ${kernelSrc}`];
  return files.flatMap((f) => scanLines(repoRoot, f, KERNEL_FORBIDDEN));
}
