// Thin typed boundary over csv-parse.
//
// csv-parse returns untyped records; they are validated here once so the rest
// of the kernel only ever sees `CsvRecord` values.

import { parse } from "csv-parse/sync";
import { z } from "zod";

import { ValidationError } from "../errors";

export type CsvRecord = {
  cells: ReadonlyArray<string>;
  line: number; // 1-based source line of the record
};

const ParsedRecordsZ = z.array(
  z
    .object({
      record: z.array(z.string()),
      info: z.object({ lines: z.number().int() }).passthrough()
    })
    .passthrough()
);

/**
 * Parses CSV text into records. Empty lines are skipped; rows may have
 * differing lengths (callers decide what a short row means).
 */
export function readCsvRecords(text: string, source: string): CsvRecord[] {
  let raw: unknown;
  try {
    raw = parse(text, {
      bom: true,
      info: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (e) {
    throw new ValidationError(`malformed CSV in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const checked = ParsedRecordsZ.safeParse(raw);
  if (!checked.success) {
    throw new ValidationError(`unexpected CSV record shape in ${source}`);
  }
  return checked.data.map((r) => ({ cells: r.record, line: r.info.lines }));
}
