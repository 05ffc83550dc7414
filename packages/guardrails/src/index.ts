import path from "node:path";
import { checkKernelPurity } from "./checks/check_kernel_purity";
import { checkEnvMutation } from "./checks/check_env_mutation";
import { checkArtifactNames } from "./checks/check_artifact_names";

export function runGuardrails(repoRoot: string): string[] {
  return [...checkKernelPurity(repoRoot), ...checkEnvMutation(repoRoot), ...checkArtifactNames(repoRoot)];
}

function main() {
  const repoRoot = path.resolve(__dirname, "..", "..", "..");
  const hits = runGuardrails(repoRoot);

  if (hits.length) {
    console.error("Guardrails FAILED:");
    for (const h of hits) console.error(" -", h);
    process.exit(1);
  }
  console.log("Guardrails OK");
}

if (require.main === module) main();
