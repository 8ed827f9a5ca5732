import { env } from "../config/env.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in levelRank;
}

const threshold = levelRank[isLogLevel(env.logLevel) ? env.logLevel : "warn"];

// stdout belongs to command output, so every level writes to stderr
export const logger = {
  debug: (...args: unknown[]) => {
    if (threshold <= levelRank.debug) console.error("[debug]", ...args);
  },
  info: (...args: unknown[]) => {
    if (threshold <= levelRank.info) console.error("[info]", ...args);
  },
  warn: (...args: unknown[]) => {
    if (threshold <= levelRank.warn) console.error("[warn]", ...args);
  },
  error: (...args: unknown[]) => {
    console.error("[error]", ...args);
  }
};
