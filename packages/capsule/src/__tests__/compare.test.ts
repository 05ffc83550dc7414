import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";

import { ReplayMismatch } from "@sssl/kernel";

import { assertReplaysEqual, describeDifference, diffDirs } from "../compare";
import { tempDir } from "./helpers";

function pair(): { a: string; b: string } {
  const base = tempDir();
  const a = path.join(base, "A");
  const b = path.join(base, "B");
  for (const d of [a, b]) {
    fs.mkdirSync(path.join(d, "sub"), { recursive: true });
    fs.writeFileSync(path.join(d, "x.csv"), "1,2\n");
    fs.writeFileSync(path.join(d, "sub", "y.txt"), "y\n");
    fs.writeFileSync(path.join(d, "MANIFEST.sha256"), "m\n");
  }
  return { a, b };
}

test("identical directories have no difference", async () => {
  const { a, b } = pair();
  assert.equal(await diffDirs(a, b), null);
  await assertReplaysEqual("SMOKE", a, b);
});

test("differences are reported by kind", async () => {
  let { a, b } = pair();
  fs.writeFileSync(path.join(b, "x.csv"), "1,3\n");
  assert.deepEqual(await diffDirs(a, b), { kind: "digest", path: "x.csv" });

  ({ a, b } = pair());
  fs.writeFileSync(path.join(b, "sub", "y.txt"), "yy\n");
  assert.deepEqual(await diffDirs(a, b), { kind: "size", path: "sub/y.txt", sizeA: 2, sizeB: 3 });

  ({ a, b } = pair());
  fs.writeFileSync(path.join(b, "extra.txt"), "");
  const d = await diffDirs(a, b);
  assert.deepEqual(d, { kind: "file_list", onlyA: [], onlyB: ["extra.txt"] });
  assert.ok(d);
  assert.equal(describeDifference(d), "file lists differ (only in A: -; only in B: extra.txt)");
});

test("the manifest takes part in the comparison", async () => {
  const { a, b } = pair();
  fs.writeFileSync(path.join(b, "MANIFEST.sha256"), "n\n");
  await assert.rejects(
    assertReplaysEqual("MECH", a, b),
    (e: unknown) => e instanceof ReplayMismatch && e.caseName === "MECH" && e.message.includes("MANIFEST.sha256 sha256 differs")
  );
});
