/**
 * File-Based Logger
 * 
 * Mirrors console output to a dated log file so long batch runs keep a
 * full history.
 * 
 * Usage: Call `initLogger()` once at startup, `restoreConsole()` to undo.
 * Logs are written to: data/logs/rulepipe-YYYY-MM-DD.log
 * 
 * This component does NOT:
 * - Filter or reformat what is printed to the terminal
 * - Rotate or prune old log files
 */

import { mkdirSync, appendFileSync, existsSync } from "node:fs";
import { join } from "node:path";

export interface LoggerOptions {
  /** Defaults to data/logs under the working directory */
  logDir?: string;
  /** Defaults to "rulepipe" */
  filePrefix?: string;
}

type ConsoleMethod = (...args: unknown[]) => void;

interface OriginalConsole {
  log: ConsoleMethod;
  warn: ConsoleMethod;
  error: ConsoleMethod;
}

let logFilePath: string | null = null;
let original: OriginalConsole | null = null;

/**
 * Initialize file-based logging.
 * Hooks into console.log, console.error, console.warn and mirrors output to a file.
 * Calling it again switches the target file without stacking hooks.
 */
export function initLogger(options: LoggerOptions = {}): string {
  const logDir = options.logDir ?? join(process.cwd(), "data", "logs");
  const prefix = options.filePrefix ?? "rulepipe";

  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const date = new Date().toISOString().split("T")[0];
  logFilePath = join(logDir, `${prefix}-${date}.log`);

  if (!original) {
    original = { log: console.log, warn: console.warn, error: console.error };
  }
  const saved = original;

  console.log = (...args: unknown[]) => {
    saved.log.apply(console, args);
    writeToFile("INFO", args);
  };

  console.error = (...args: unknown[]) => {
    saved.error.apply(console, args);
    writeToFile("ERROR", args);
  };

  console.warn = (...args: unknown[]) => {
    saved.warn.apply(console, args);
    writeToFile("WARN", args);
  };

  const startupMsg = `\n${"=".repeat(70)}\n  rulepipe session started: ${new Date().toISOString()}\n${"=".repeat(70)}\n`;
  appendLine(startupMsg);

  return logFilePath;
}

/**
 * Put back the console methods replaced by initLogger
 */
export function restoreConsole(): void {
  if (!original) return;
  console.log = original.log;
  console.warn = original.warn;
  console.error = original.error;
  original = null;
  logFilePath = null;
}

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === "string") return arg;
      if (arg instanceof Error) return `${arg.message}\n${arg.stack}`;
      try {
        return JSON.stringify(arg, null, 0);
      } catch {
        return String(arg);
      }
    })
    .join(" ");
}

/**
 * Write a log entry to the file.
 */
function writeToFile(level: string, args: unknown[]): void {
  const timestamp = new Date().toISOString().substring(11, 23); // HH:mm:ss.SSS
  appendLine(`[${timestamp}] [${level.padEnd(5)}] ${formatLogArgs(args)}\n`);
}

function appendLine(line: string): void {
  if (!logFilePath) return;

  try {
    appendFileSync(logFilePath, line);
  } catch (error) {
    // Report on the unhooked console so the failure does not recurse
    original?.error.call(console, "[Logger] Failed to write log file:", error);
  }
}

/**
 * Get the current log file path.
 */
export function getLogFilePath(): string | null {
  return logFilePath;
}
