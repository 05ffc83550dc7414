import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

/**
 * JSON logger on stderr. Stdout is reserved for the result lines the CLIs
 * print, so nothing from here ever lands there.
 */
export function createLogger(name: string, env: NodeJS.ProcessEnv = process.env): Logger {
  return pino({ name, level: env.SSSL_LOG_LEVEL || "warn" }, pino.destination(2));
}

/**
 * A logger that drops everything (tests, embedders that log elsewhere).
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
