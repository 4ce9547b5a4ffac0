import fs from "fs";
import path from "path";
import { loadConfig } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
  child: (scope: string) => Logger;
}

export type LogSink = (lvl: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Directory for a per-run log file; console only when omitted */
  logDir?: string;
  scope?: string;
  sink?: LogSink;
}

const order: LogLevel[] = ["debug", "info", "warn", "error"];

const consoleSink: LogSink = (lvl, line) => {
  // eslint-disable-next-line no-console
  console[lvl === "debug" ? "log" : lvl](line);
};

function openRunFile(logsDir: string): fs.WriteStream | null {
  const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    const stream = fs.createWriteStream(path.join(logsDir, `run-${runStamp}.log`), { flags: "a" });
    stream.on("error", (err) => {
      consoleSink("warn", `${new Date().toISOString()} [warn] logger:file:error ${JSON.stringify({ message: err.message })}`);
    });
    return stream;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    consoleSink("warn", `${new Date().toISOString()} [warn] logger:file:unavailable ${JSON.stringify({ logsDir, message })}`);
    return null;
  }
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const minIdx = order.indexOf(level);
  const sink = options.sink ?? consoleSink;
  const fileStream = options.logDir ? openRunFile(options.logDir) : null;

  function build(scope: string | undefined): Logger {
    function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
      if (order.indexOf(lvl) < minIdx) return;
      const payload = ctx ? ` ${JSON.stringify(ctx, jsonSafe)}` : "";
      const ts = new Date().toISOString();
      const prefix = scope ? `${scope}:` : "";
      const line = `${ts} [${lvl}] ${prefix}${msg}${payload}`;
      sink(lvl, line);
      fileStream?.write(line + "\n");
    }

    return {
      debug: (msg, ctx) => log("debug", msg, ctx),
      info: (msg, ctx) => log("info", msg, ctx),
      warn: (msg, ctx) => log("warn", msg, ctx),
      error: (msg, ctx) => log("error", msg, ctx),
      child: (child) => build(scope ? `${scope}:${child}` : child),
    };
  }

  return build(options.scope);
}

// bigint values in log context (e.g. a dedup key) would make JSON.stringify throw
function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? `${value.toString()}n` : value;
}

export default createLogger;

const cfg = loadConfig();

export const logger: Logger = createLogger(cfg.logLevel, { logDir: cfg.logDir });
