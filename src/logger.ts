import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./types";

export type { Logger };

/**
 * Stdout belongs to the operator menu, so log records go to stderr.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: "device-tool-console", level }, pino.destination(2));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
