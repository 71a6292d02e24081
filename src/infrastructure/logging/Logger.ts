import fs from "fs";
import path from "path";

import { config, type LogLevelSetting } from "@config/index";

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: LogLevelSetting;
  /** Append-only JSON lines sink; null or "" keeps logs on the console. */
  filePath?: string | null;
}

const LEVEL_WEIGHT: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Structured logger writing one JSON entry per call.
 *
 * - log() records { timestamp, level, message, ...meta }.
 * - event() records { timestamp, type, ...payload } at info level, the shape
 *   used for pipeline events such as LLM_SUCCESS or TURN_PERSIST_FAILED.
 */
export function createLogger(options: LoggerOptions): LoggerPort {
  const threshold = LEVEL_WEIGHT[options.level];
  const filePath = options.filePath || null;
  let logDirReady = false;

  function appendToFile(line: string): void {
    if (!filePath) {
      return;
    }

    try {
      if (!logDirReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        logDirReady = true;
      }
      fs.appendFileSync(filePath, line + "\n", { encoding: "utf-8" });
    } catch (err) {
      console.error("Failed to write log file:", err);
    }
  }

  function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
    if (LEVEL_WEIGHT[level] < threshold) {
      return;
    }

    const line = JSON.stringify(entry);

    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    appendToFile(line);
  }

  return {
    log(level, message, meta) {
      writeEntry(level, {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      });
    },

    event(type, payload) {
      writeEntry("info", {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      });
    },
  };
}

export const logger: LoggerPort = createLogger({
  level: config.observability.logLevel,
  filePath: config.observability.logFile,
});

/** Flattens an unknown thrown value into loggable fields. */
export function describeError(error: unknown): {
  message: string;
  name: string | undefined;
} {
  return error instanceof Error
    ? { message: error.message, name: error.name }
    : { message: String(error), name: undefined };
}
