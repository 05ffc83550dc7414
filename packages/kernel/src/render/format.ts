// Text formatting shared by every artifact. Artifacts are compared byte for
// byte across runs, so all number rendering goes through these helpers.

/**
 * Fixed-point rendering with `digits` decimals.
 */
export function fixed(x: number, digits: number): string {
  return x.toFixed(digits);
}

/**
 * Shortest round-trip rendering with a trailing ".0" for integral values
 * (0.16, 5.0, 0.014285714285714285).
 */
export function floatRepr(x: number): string {
  if (Number.isInteger(x) && Math.abs(x) < 1e16) return `${x}.0`;
  return String(x);
}

/**
 * 12 significant digits, trailing zeros dropped (0.8000000000000002 -> "0.8").
 */
export function general12(x: number): string {
  return String(Number(x.toPrecision(12)));
}

function quoteCell(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function csvLine(cells: ReadonlyArray<string>): string {
  return cells.map(quoteCell).join(",");
}

/**
 * Joins lines with "\n" and terminates the last one.
 */
export function textBlock(lines: ReadonlyArray<string>): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

export function csvDocument(header: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<string>>): string {
  return textBlock([csvLine(header), ...rows.map(csvLine)]);
}
