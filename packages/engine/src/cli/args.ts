/* -------------------- sssl-verify argument parsing -------------------- */

import { ArgumentError } from "@sssl/kernel";

import type { ParamOverrides } from "../config/load_config";

export type BatteryArgs = {
  batteryCsv: string;
  batteryId: string | null;
  maxRows: number | null;
};

export type EngineTask = { kind: "verify"; inCsv: string } | ({ kind: "battery" } & BatteryArgs);

export type EngineArgs = {
  task: EngineTask;
  outDir: string;
  config: string | null;
  substrate: boolean;
  overrides: ParamOverrides;
};

const FLOAT_OPTS = ["--tau0", "--taus", "--eps", "--drop", "--collapse_ratio_max", "--churn_ratio_max"] as const;
const INT_OPTS = ["--s0", "--s_max", "--inc_on_eminus", "--dec_on_s", "--require_s", "--max_rows"] as const;
const STRING_OPTS = ["--in_csv", "--out_dir", "--config", "--battery_csv", "--battery_id"] as const;
const FLAGS = ["--substrate", "--battery_extract"] as const;

const VALUE_OPTS: ReadonlySet<string> = new Set<string>([...FLOAT_OPTS, ...INT_OPTS, ...STRING_OPTS]);
const FLAG_OPTS: ReadonlySet<string> = new Set<string>(FLAGS);

export const HELP_FLAGS: ReadonlySet<string> = new Set(["-h", "--help"]);

export const ENGINE_USAGE = [
  "usage: sssl-verify --in_csv PATH [--out_dir DIR] [--config PATH] [--substrate]",
  "                   [--tau0 X] [--taus X] [--eps X] [--drop X]",
  "                   [--s0 N] [--s_max N] [--inc_on_eminus N] [--dec_on_s N]",
  "                   [--collapse_ratio_max X] [--churn_ratio_max X] [--require_s N]",
  "       sssl-verify --battery_extract --battery_csv PATH [--battery_id ID] [--max_rows N] [--out_dir DIR]"
].join("\n");

/**
 * Splits argv into option values and flags. Accepts `--name value` and
 * `--name=value`; a repeated option keeps its last value.
 */
export function scanArgv(argv: ReadonlyArray<string>): { values: Map<string, string>; flags: Set<string> } {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    const eq = tok.indexOf("=");
    const name = tok.startsWith("--") && eq > 0 ? tok.slice(0, eq) : tok;

    if (FLAG_OPTS.has(name)) {
      if (name !== tok) throw new ArgumentError(`argument ${name}: ignored explicit argument '${tok.slice(eq + 1)}'`);
      flags.add(name);
    } else if (VALUE_OPTS.has(name)) {
      if (name !== tok) {
        values.set(name, tok.slice(eq + 1));
        continue;
      }
      const v = argv[i + 1];
      if (v === undefined || (v.startsWith("--") && v.length > 2)) {
        throw new ArgumentError(`argument ${name}: expected one argument`);
      }
      values.set(name, v);
      i++;
    } else {
      throw new ArgumentError(`unrecognized arguments: ${tok}`);
    }
  }
  return { values, flags };
}

// Only keys that were given, so a spread never overwrites a config value with undefined.
function given<K extends string>(entries: ReadonlyArray<readonly [K, number | undefined]>): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const [k, v] of entries) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

function floatValue(name: string, raw: string): number {
  const s = raw.trim();
  const n = s === "" ? Number.NaN : Number(s);
  if (!Number.isFinite(n)) throw new ArgumentError(`argument ${name}: invalid float value: '${raw}'`);
  return n;
}

function intValue(name: string, raw: string): number {
  if (!/^[+-]?\d+$/.test(raw.trim())) throw new ArgumentError(`argument ${name}: invalid int value: '${raw}'`);
  return Number(raw.trim());
}

export function parseEngineArgs(argv: ReadonlyArray<string>): EngineArgs {
  const { values, flags } = scanArgv(argv);

  const num = (name: (typeof FLOAT_OPTS)[number]): number | undefined => {
    const raw = values.get(name);
    return raw === undefined ? undefined : floatValue(name, raw);
  };
  const int = (name: (typeof INT_OPTS)[number]): number | undefined => {
    const raw = values.get(name);
    return raw === undefined ? undefined : intValue(name, raw);
  };
  const overrides: ParamOverrides = {
    classifier: given([
      ["tau0", num("--tau0")],
      ["taus", num("--taus")],
      ["eps", num("--eps")],
      ["drop", num("--drop")]
    ]),
    accumulation: given([
      ["s0", int("--s0")],
      ["s_max", int("--s_max")],
      ["inc_on_eminus", int("--inc_on_eminus")],
      ["dec_on_s", int("--dec_on_s")]
    ]),
    admissibility: given([
      ["collapse_ratio_max", num("--collapse_ratio_max")],
      ["churn_ratio_max", num("--churn_ratio_max")],
      ["require_s", int("--require_s")]
    ])
  };

  let task: EngineTask;
  if (flags.has("--battery_extract")) {
    const batteryCsv = values.get("--battery_csv");
    if (!batteryCsv) throw new ArgumentError("--battery_csv is required with --battery_extract");
    task = { kind: "battery", batteryCsv, batteryId: values.get("--battery_id") ?? null, maxRows: int("--max_rows") ?? null };
  } else {
    const inCsv = values.get("--in_csv");
    if (!inCsv) throw new ArgumentError("--in_csv is required unless --battery_extract is used");
    task = { kind: "verify", inCsv };
  }

  return {
    task,
    outDir: values.get("--out_dir") ?? "outputs",
    config: values.get("--config") ?? null,
    substrate: flags.has("--substrate"),
    overrides
  };
}
