// Fixed artifact names of one engine run.

export const MANIFEST_NAME = "MANIFEST.sha256";

export const ARTIFACT_NAMES_V1 = Object.freeze({
  states: "sssl_states.csv",
  accumulation: "sssl_accumulation.csv",
  operatorTable: "operator_table.csv",
  admissibility: "adm_result.txt",
  transitionCounts: "transition_counts.csv",
  transitionRatios: "transition_ratios.csv",
  pMatrix: "P_matrix.csv",
  eigenspectrum: "eigenspectrum.txt",
  collapseCheck: "collapse_check.csv",
  summary: "summary.txt"
} as const);

export type ArtifactKey = keyof typeof ARTIFACT_NAMES_V1;
export type ArtifactName = (typeof ARTIFACT_NAMES_V1)[ArtifactKey];

/**
 * Files a `--substrate` run must leave behind, manifest included.
 */
export const REQUIRED_SUBSTRATE_ARTIFACTS_V1: ReadonlyArray<string> = Object.freeze([
  ...Object.values(ARTIFACT_NAMES_V1),
  MANIFEST_NAME
]);

/**
 * Manifest line styles:
 * - "binary": `<sha256> *<path>` (engine seal of its own run)
 * - "text":   `<sha256>  <path>` (capsule reseal of a replay directory)
 */
export type ManifestLineStyle = "binary" | "text";

export type ManifestEntryV1 = {
  digest: string; // lowercase hex sha256
  path: string; // forward-slash relative path
};

// Literal text the summary must carry; the capsule checks it verbatim.
export const COLLAPSE_IDENTITY_TEXT = "phi((m,a,s)) = m";
