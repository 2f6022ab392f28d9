/**
 * Structured logging.
 *
 * Uses pino for JSON logs. Components take an optional Logger and derive a
 * child bound to their component name; without one they stay silent.
 */

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  readonly name?: string | undefined;
  readonly level?: LogLevel | undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "ilpcore",
    level: options.level ?? "info",
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

/**
 * A child of `parent` bound to `component`, or a silent logger.
 * `level`, when given, overrides the parent's for this child only.
 */
export function componentLogger(
  component: string,
  parent?: Logger,
  bindings: Record<string, unknown> = {},
  level?: LogLevel,
): Logger {
  const base = parent ?? pino({ level: "silent" });
  return base.child({ component, ...bindings }, level === undefined ? {} : { level });
}
