import dotenv from "dotenv";

// Local .env is optional; the environment can still be provided externally
dotenv.config();

export type LogLevelSetting = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  pipes: {
    uniqDefaultKey: string;
  };
  server: {
    port: number;
  };
  logLevel: LogLevelSetting;
  logDir?: string;
  nodeEnv: "development" | "production" | "test" | string;
}

const LOG_LEVELS: readonly LogLevelSetting[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(raw: string | undefined): LogLevelSetting {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === normalized) ?? "info";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaultKey = env.UNIQ_DEFAULT_KEY?.trim();
  const port = env.PORT ? Number(env.PORT) : NaN;
  return {
    pipes: {
      uniqDefaultKey: defaultKey || "title",
    },
    server: {
      port: Number.isInteger(port) && port > 0 ? port : 3000,
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logDir: env.LOG_DIR || undefined,
    nodeEnv: env.NODE_ENV || "development",
  };
}
