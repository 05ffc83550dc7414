// Deterministic fixture traces. Each follows a fixed segment plan so the
// classifier visits every posture; none claims physical validity.

import type { ObservationV1 } from "@sssl/contracts";
import { csvDocument, floatRepr, general12 } from "@sssl/kernel";

const clamp = (x: number, lo: number, hi: number): number => (x < lo ? lo : x > hi ? hi : x);

// Half-up rounding to 6 decimals.
const round6 = (x: number): number => Math.round(x * 1e6) / 1e6;

/**
 * Ramp up, plateau, sharp drop with discharge, ramp up again (25 samples).
 */
export function smokeTrace(): ObservationV1[] {
  const rows: ObservationV1[] = [];
  let t = 0;
  let v = 0;
  for (let k = 0; k < 10; k++) {
    rows.push({ t, m: v, discharge: 0 });
    t += 1;
    v += 0.08;
  }
  for (let k = 0; k < 6; k++) {
    rows.push({ t, m: v, discharge: 0 });
    t += 1;
  }
  v = Math.max(0, v - 0.6);
  rows.push({ t, m: v, discharge: 1 });
  t += 1;
  for (let k = 0; k < 8; k++) {
    rows.push({ t, m: v, discharge: 0 });
    t += 1;
    v += 0.07;
  }
  return rows;
}

/**
 * Vibration envelope:
 *   0..7 quiescent, 8..25 ramp, 26..40 plateau, 41 shock, 42.. recovery.
 */
export function mechVibrationTrace(n = 60, dt = 0.1): ObservationV1[] {
  const rows: ObservationV1[] = [];
  const count = Math.max(10, Math.trunc(n));
  for (let i = 0; i < count; i++) {
    let discharge: 0 | 1 = 0;
    let e: number;
    if (i <= 7) {
      e = 0.03 + 0.001 * Math.sin((2 * Math.PI * i) / 8.0);
    } else if (i <= 25) {
      e = 0.06 + 0.68 * ((i - 8) / (25 - 8));
    } else if (i <= 40) {
      e = 0.74 + 0.008 * Math.sin((2 * Math.PI * (i - 26)) / 10.0);
    } else if (i === 41) {
      discharge = 1;
      e = 0.32;
    } else if (i <= 50) {
      e = 0.34 + 0.4 * ((i - 42) / (50 - 42));
    } else {
      e = 0.74 + 0.007 * Math.sin((2 * Math.PI * (i - 51)) / 8.0);
    }
    rows.push({ t: round6(i * dt), m: round6(clamp(e, 0, 1)), discharge });
  }
  return rows;
}

/**
 * Pump pressure:
 *   0..9 idle, 10..30 ramp, 31..48 regulated plateau, 49 valve dump, 50.. recovery.
 */
export function fluidPressureTrace(n = 70, dt = 0.1): ObservationV1[] {
  const rows: ObservationV1[] = [];
  const count = Math.max(10, Math.trunc(n));
  for (let i = 0; i < count; i++) {
    let discharge: 0 | 1 = 0;
    let e: number;
    if (i <= 9) {
      e = 0.04 + 0.001 * Math.sin((2 * Math.PI * i) / 10.0);
    } else if (i <= 30) {
      e = 0.06 + 0.7 * ((i - 10) / (30 - 10));
    } else if (i <= 48) {
      e = 0.75 + 0.009 * Math.sin((2 * Math.PI * (i - 31)) / 12.0);
    } else if (i === 49) {
      discharge = 1;
      e = 0.28;
    } else if (i <= 60) {
      e = 0.3 + 0.45 * ((i - 50) / (60 - 50));
    } else {
      e = 0.75 + 0.008 * Math.sin((2 * Math.PI * (i - 61)) / 9.0);
    }
    rows.push({ t: round6(i * dt), m: round6(clamp(e, 0, 1)), discharge });
  }
  return rows;
}

/**
 * `%.12g`-style cells (smoke trace file format).
 */
export function renderCompactTrace(rows: ReadonlyArray<ObservationV1>): string {
  return csvDocument(
    ["t_s", "E_proxy", "discharge"],
    rows.map((r) => [general12(r.t), general12(r.m), String(r.discharge)])
  );
}

/**
 * Shortest round-trip cells with ".0" on integral values (sensor trace file format).
 */
export function renderSensorTrace(rows: ReadonlyArray<ObservationV1>): string {
  return csvDocument(
    ["t_s", "E_proxy", "discharge"],
    rows.map((r) => [floatRepr(r.t), floatRepr(r.m), String(r.discharge)])
  );
}
