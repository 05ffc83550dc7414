import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";

import { MissingArtifact, ValidationError } from "@sssl/kernel";

import { listFiles, parseManifest, readManifest, sha256File, verifyManifest, writeManifest } from "../seal/manifest";
import { tempDir, writeFile } from "./helpers";

const A = "87428fc522803d31065e7bce3cf03fe475096631e5e07bbd7a0fde60c4cf25c7";
const B = "0263829989b6fd954f72baaf2fc64bc2e2f01d692d4de72986ea808f6e99813f";
const C = "a3a5e715f0cc574a73c3f9bebb6bc24f32ffd5b67b387244c2c909da779a1478";

function fixtureDir(): string {
  const dir = tempDir();
  writeFile(dir, "b.txt", "b\n");
  writeFile(dir, "a.txt", "a\n");
  writeFile(dir, "sub/c.txt", "c\n");
  return dir;
}

test("sha256File hashes file content", async () => {
  const dir = fixtureDir();
  assert.equal(await sha256File(path.join(dir, "a.txt")), A);
  assert.equal(
    await sha256File(writeFile(dir, "empty", "")),
    "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
  );
});

test("listFiles recurses, sorts by code unit and skips the manifest", () => {
  const dir = fixtureDir();
  writeFile(dir, "Z.txt", "z");
  writeFile(dir, "MANIFEST.sha256", "");
  writeFile(dir, "sub/MANIFEST.sha256", "");
  assert.deepEqual(listFiles(dir), ["Z.txt", "a.txt", "b.txt", "sub/c.txt"]);
  assert.deepEqual(listFiles(dir, { includeManifest: true }), [
    "MANIFEST.sha256",
    "Z.txt",
    "a.txt",
    "b.txt",
    "sub/MANIFEST.sha256",
    "sub/c.txt"
  ]);
});

test("binary style seals only the listed files", async () => {
  const dir = fixtureDir();
  const { manifestPath } = await writeManifest(dir, { style: "binary", files: ["b.txt", "a.txt"] });
  assert.equal(fs.readFileSync(manifestPath, "utf8"), `${A} *a.txt\n${B} *b.txt\n`);
});

test("text style seals every file recursively", async () => {
  const dir = fixtureDir();
  await writeManifest(dir, { style: "text" });
  assert.equal(
    fs.readFileSync(path.join(dir, "MANIFEST.sha256"), "utf8"),
    `${A}  a.txt\n${B}  b.txt\n${C}  sub/c.txt\n`
  );
  // resealing is stable: the old manifest is not itself hashed
  await writeManifest(dir, { style: "text" });
  assert.equal((await readManifest(dir)).length, 3);
});

test("a listed file that does not exist is a missing artifact", async () => {
  const dir = fixtureDir();
  await assert.rejects(writeManifest(dir, { style: "binary", files: ["nope.csv"] }), MissingArtifact);
});

test("parseManifest reads both styles and rejects garbage", () => {
  assert.deepEqual(parseManifest(`${A} *a.txt\n${B}  b b.txt\n`), [
    { digest: A, path: "a.txt" },
    { digest: B, path: "b b.txt" }
  ]);
  assert.throws(() => parseManifest("xyz  a.txt\n"), ValidationError);
});

test("verifyManifest reports tampered and missing files", async () => {
  const dir = fixtureDir();
  await writeManifest(dir, { style: "text" });
  assert.deepEqual(await verifyManifest(dir), { ok: true, mismatched: [], missing: [] });

  fs.writeFileSync(path.join(dir, "a.txt"), "A\n");
  fs.rmSync(path.join(dir, "sub", "c.txt"));
  assert.deepEqual(await verifyManifest(dir), { ok: false, mismatched: ["a.txt"], missing: ["sub/c.txt"] });
});

test("readManifest on a directory without one is a missing artifact", async () => {
  await assert.rejects(readManifest(tempDir()), MissingArtifact);
});
