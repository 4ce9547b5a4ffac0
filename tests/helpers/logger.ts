import type { LogLevel, Logger } from "../../src/config/logger";

export interface LogEntry {
  lvl: LogLevel;
  msg: string;
  ctx?: Record<string, unknown>;
}

/** Logger that keeps entries in memory; child scopes prefix the message. */
export function recordingLogger(entries: LogEntry[] = [], scope?: string): Logger & { entries: LogEntry[] } {
  const push = (lvl: LogLevel) => (msg: string, ctx?: Record<string, unknown>) => {
    entries.push({ lvl, msg: scope ? `${scope}:${msg}` : msg, ctx });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    child: (child) => recordingLogger(entries, scope ? `${scope}:${child}` : child),
  };
}
