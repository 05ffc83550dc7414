import fs from "node:fs";
import path from "node:path";

export const DEFAULT_CONFIG_REL = path.join("config", "sssl", "default.json");

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}

/**
 * SSSL_REPO_ROOT wins; otherwise walk up from this package. Returns null
 * when neither yields a directory holding the default parameter file.
 */
export function resolveRepoRoot(env: NodeJS.ProcessEnv = process.env): string | null {
  if (env.SSSL_REPO_ROOT) return path.resolve(env.SSSL_REPO_ROOT);
  try {
    return findRepoRoot(__dirname, DEFAULT_CONFIG_REL);
  } catch {
    return null;
  }
}
