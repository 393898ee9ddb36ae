/**
 * Debug logging utilities for the verification pipeline
 *
 * Provides file-based and console logging for debugging verification runs.
 * Loggers are created per component and passed in explicitly; nothing here
 * keeps process-wide state.
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";
import type { LoggingConfig } from "../config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

type Level = "debug" | "info" | "warn" | "error";

const DEFAULT_MAX_DATA_CHARS = 8000;

// ============================================================================
// FORMATTING
// ============================================================================

/**
 * Render one log line: `[timestamp] [Scope] message | payload`.
 * Payloads are JSON-serialized and truncated to `maxDataChars`.
 */
export function formatLogLine(
  scope: string,
  message: string,
  data: unknown,
  maxDataChars: number = DEFAULT_MAX_DATA_CHARS,
  timestamp: string = new Date().toISOString(),
): string {
  let line = `[${timestamp}] [${scope}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, errorReplacer);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > maxDataChars) {
      payload = payload.slice(0, maxDataChars) + "…[truncated]";
    }
    line += ` | ${payload}`;
  }

  return line;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// ============================================================================
// LOGGER FACTORY
// ============================================================================

/**
 * Create a scoped logger. Lines are appended to `config.filePath` (async, so a
 * long verification never blocks on disk) and echoed to the console.
 */
export function createDebugLogger(scope: string, config: LoggingConfig): PipelineLogger {
  const filePath = config.filePath ? path.resolve(config.filePath) : null;
  const maxDataChars = config.maxDataChars ?? DEFAULT_MAX_DATA_CHARS;

  const write = (level: Level, message: string, data?: unknown): void => {
    const line = formatLogLine(scope, message, data, maxDataChars);

    if (filePath) {
      fs.promises.appendFile(filePath, line + "\n").catch((err: unknown) => {
        if (config.console) {
          console.error(`[${scope}] Failed to write debug log to ${filePath}:`, err);
        }
      });
    }

    if (!config.console) return;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

export const silentLogger: PipelineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
