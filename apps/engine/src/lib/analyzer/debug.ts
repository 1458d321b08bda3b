/**
 * Debug logging utilities for the evidence engine.
 *
 * Console logging is always on; file logging is opt-in via environment:
 *   CE_DEBUG_LOG_FILE=true       append to the debug log
 *   CE_DEBUG_LOG_PATH=<path>     log location (default: <cwd>/debug-engine.log)
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function isFileLoggingEnabled(): boolean {
  return (process.env.CE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

export function getDebugLogPath(): string {
  return process.env.CE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-engine.log");
}

let fileWriteFailureReported = false;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, when enabled, to the debug file.
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  // Append async so long corpus runs don't block on disk
  if (isFileLoggingEnabled()) {
    fs.promises.appendFile(getDebugLogPath(), logLine + "\n").catch((err: unknown) => {
      if (fileWriteFailureReported) return;
      fileWriteFailureReported = true;
      console.warn(`[Debug] Cannot write ${getDebugLogPath()}: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  console.log(logLine);
}
