// packages/tracker/src/logger.ts
/* eslint-disable no-console */
import type { LogFields, TemporalLogger } from "@company-tracker/temporal";

import type { LogLevel } from "./config.js";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type Logger = TemporalLogger & {
  readonly level: LogLevel;
  child(scope: string): Logger;
};

type Sink = (line: string) => void;

/**
 * Console logger in the `[prefix] message {fields}` shape.
 * Everything goes to stderr so CLI stdout stays machine-readable JSON.
 */
export function createLogger(opts: { level: LogLevel; prefix?: string; sink?: Sink }): Logger {
  const prefix = opts.prefix ?? "tracker";
  const sink: Sink = opts.sink ?? ((line) => console.error(line));

  const emit = (level: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (RANK[level] < RANK[opts.level]) return;
    const tail = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    sink(`[${prefix}] ${level.toUpperCase()} ${message}${tail}`);
  };

  return {
    level: opts.level,
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    child: (scope) => createLogger({ ...opts, prefix: `${prefix}:${scope}` }),
  };
}
