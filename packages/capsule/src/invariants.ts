// Per-replay invariant checks over a sealed artifact directory.

import fs from "node:fs";
import path from "node:path";

import {
  A4,
  ARTIFACT_NAMES_V1,
  COLLAPSE_IDENTITY_TEXT,
  REQUIRED_SUBSTRATE_ARTIFACTS_V1,
  isStructuralState
} from "@sssl/contracts";
import type { AdmissibilityVerdict, StructuralState } from "@sssl/contracts";
import { InvariantViolation, MissingArtifact, readCsvRecords, spectralRadiusPowerIteration } from "@sssl/kernel";
import { sha256File } from "@sssl/engine";

import { readMatrixCsv } from "./matrix_csv";

export const SPECTRAL_RADIUS_TOLERANCE = 1e-9;

export function requireArtifacts(dir: string): void {
  for (const name of REQUIRED_SUBSTRATE_ARTIFACTS_V1) {
    const p = path.join(dir, name);
    if (!fs.existsSync(p)) throw new MissingArtifact(p);
  }
}

/**
 * Index of the state column: `a_state`, else `a`, else the last column.
 */
export function stateColumnIndex(header: ReadonlyArray<string>): number {
  const names = header.map((h) => h.trim());
  const byName = names.indexOf("a_state");
  if (byName >= 0) return byName;
  const legacy = names.indexOf("a");
  return legacy >= 0 ? legacy : names.length - 1;
}

export type StateTally = {
  counts: Record<StructuralState, number>;
  others: string[]; // distinct non-A4 tokens, sorted
};

export function tallyStates(text: string, source: string = ARTIFACT_NAMES_V1.states): StateTally {
  const counts: Record<StructuralState, number> = { Z0: 0, Eplus: 0, S: 0, Eminus: 0 };
  const others = new Set<string>();
  const [header, ...body] = readCsvRecords(text, source);
  if (!header) return { counts, others: [] };

  const idx = stateColumnIndex(header.cells);
  for (const rec of body) {
    if (idx >= rec.cells.length) continue;
    const tok = rec.cells[idx].trim();
    if (isStructuralState(tok)) counts[tok] += 1;
    else others.add(tok);
  }
  return { counts, others: [...others].sort() };
}

export function readAdmVerdict(text: string): string {
  for (const line of text.split("\n")) {
    const s = line.trim();
    if (s.startsWith("adm_E:")) return s.slice("adm_E:".length).trim();
  }
  return "";
}

const read = (dir: string, name: string): Promise<string> => fs.promises.readFile(path.join(dir, name), "utf8");

/**
 * All checks for one replay directory, in order. Throws on the first
 * failure: MissingArtifact, DataError (matrix shape) or InvariantViolation.
 */
export async function checkReplayInvariants(dir: string, expected: AdmissibilityVerdict): Promise<void> {
  requireArtifacts(dir);

  const summary = await read(dir, ARTIFACT_NAMES_V1.summary);
  if (!summary.includes(COLLAPSE_IDENTITY_TEXT)) {
    throw new InvariantViolation("collapse_identity", `missing or wrong collapse identity in ${ARTIFACT_NAMES_V1.summary}`);
  }

  const tally = tallyStates(await read(dir, ARTIFACT_NAMES_V1.states));
  if (tally.others.length > 0) {
    throw new InvariantViolation("a4_tokens", `non-A4 states found: ${tally.others.join(",")}`);
  }
  if (A4.every((a) => tally.counts[a] === 0)) {
    throw new InvariantViolation("a4_tokens", "no A4 states counted");
  }

  const p = readMatrixCsv(await read(dir, ARTIFACT_NAMES_V1.pMatrix), ARTIFACT_NAMES_V1.pMatrix);
  const rho = spectralRadiusPowerIteration(p);
  if (Math.abs(rho - 1) > SPECTRAL_RADIUS_TOLERANCE) {
    throw new InvariantViolation("spectral_radius", `rho(P) not equal to 1 within tolerance: ${rho}`);
  }

  const verdict = readAdmVerdict(await read(dir, ARTIFACT_NAMES_V1.admissibility));
  if (verdict !== expected) {
    throw new InvariantViolation("admissibility", `adm_E mismatch: got ${verdict || "<none>"} expected ${expected}`);
  }

  const ratiosPath = path.join(dir, ARTIFACT_NAMES_V1.transitionRatios);
  const pPath = path.join(dir, ARTIFACT_NAMES_V1.pMatrix);
  if (
    fs.statSync(ratiosPath).size === fs.statSync(pPath).size &&
    (await sha256File(ratiosPath)) === (await sha256File(pPath))
  ) {
    throw new InvariantViolation(
      "artifact_aliasing",
      `${ARTIFACT_NAMES_V1.transitionRatios} equals ${ARTIFACT_NAMES_V1.pMatrix}`
    );
  }
}
