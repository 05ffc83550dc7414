import fs from "node:fs";
import path from "node:path";

const SKIP_DIR = new Set(["node_modules", "dist", "__tests__"]);

/**
 * Non-test .ts files under `dir`, sorted, as absolute paths.
 */
export function sourceFiles(dir: string): string[] {
  const out: string[] = [];
  if (!fs.existsSync(dir)) return out;

  function walk(d: string) {
    for (const ent of fs.readdirSync(d, { withFileTypes: true })) {
      const full = path.join(d, ent.name);
      if (ent.isDirectory()) {
        if (SKIP_DIR.has(ent.name)) continue;
        walk(full);
      } else if (ent.isFile() && ent.name.endsWith(".ts") && !ent.name.endsWith(".test.ts")) {
        out.push(full);
      }
    }
  }

  walk(dir);
  return out.sort();
}

/**
 * `<relpath>:<line>: <message>` for every line matching one of the rules.
 * Whole-line `//` comments are not scanned.
 */
export function scanLines(
  repoRoot: string,
  file: string,
  rules: ReadonlyArray<{ pattern: RegExp; label: string }>
): string[] {
  const hits: string[] = [];
  const rel = path.relative(repoRoot, file).split(path.sep).join("/");
  fs.readFileSync(file, "utf-8")
    .split("\n")
    .forEach((line, i) => {
      if (line.trimStart().startsWith("//")) return;
      for (const r of rules) {
        if (r.pattern.test(line)) hits.push(`${rel}:${i + 1}: ${r.label}`);
      }
    });
  return hits;
}
