// Hard boundary: the kernel is pure. No IO, no clock, no randomness, no
// ambient environment.
export const KERNEL_FORBIDDEN: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /from\s+["'](node:)?(fs|fs\/promises|child_process|net|http|https|os)["']/, label: "IO module import" },
  { pattern: /\brequire\s*\(/, label: "require()" },
  { pattern: /\bMath\.random\s*\(/, label: "Math.random" },
  { pattern: /\bDate\.now\s*\(/, label: "Date.now" },
  { pattern: /\bnew\s+Date\s*\(/, label: "new Date" },
  { pattern: /\bprocess\.env\b/, label: "process.env" }
];

// Pinned execution context is passed per run, never written into the shared environment.
export const ENV_MUTATION: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /\bprocess\.env(\.\w+|\[[^\]]+\])\s*=(?!=)/, label: "process.env assignment" },
  { pattern: /\bdelete\s+process\.env\b/, label: "process.env delete" },
  { pattern: /Object\.assign\s*\(\s*process\.env\b/, label: "Object.assign onto process.env" }
];
