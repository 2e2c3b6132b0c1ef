/**
 * @stockpile/storage: Logger factory.
 *
 * Every component takes an optional pino Logger. Library code defaults to a
 * silent logger; the process entry point builds the real one.
 */

import pino from "pino";
import type { LevelWithSilent, Logger } from "pino";

export interface LoggerOptions {
  readonly level?: LevelWithSilent;
  /** Pretty-print through pino-pretty (development only) */
  readonly pretty?: boolean;
  readonly name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    ...(options.name !== undefined ? { name: options.name } : {}),
    ...(options.pretty === true
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
