/**
 * @coinpurse/money — Structured logging.
 *
 * Builds pino loggers. Pretty output goes through the pino-pretty
 * transport; tests pass their own destination stream.
 */

import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export interface LoggerOptions {
  readonly level: LevelWithSilent;
  readonly pretty?: boolean | undefined;
  readonly name?: string | undefined;
}

export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  const base = { name: options.name ?? "coinpurse", level: options.level };

  if (destination !== undefined) {
    return pino(base, destination);
  }

  return pino({
    ...base,
    ...(options.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}
