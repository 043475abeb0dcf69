import { getErrorDetails } from "./errorTypes.js";
import { appendFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import { logBuffer, type LogEntry, type LogLevel } from "../services/LogBuffer.js";

export type { LogLevel };

interface LogContext {
  [key: string]: unknown;
}

let storagePath: string | null = null;

export function initializeLogger(path: string): void {
  storagePath = path;
}

function getLogDirectory(): string {
  if (process.env.LEADER_TREE_LOG_DIR) {
    return process.env.LEADER_TREE_LOG_DIR;
  }

  if (storagePath) {
    return join(storagePath, "logs");
  }

  return join(process.cwd(), "logs");
}

export function getLogFilePath(): string {
  return join(getLogDirectory(), "leader-tree.log");
}

const SENSITIVE_KEYS = new Set([
  "token",
  "password",
  "apikey",
  "secret",
  "accesstoken",
  "refreshtoken",
]);

const IS_DEBUG_BOOT =
  process.env.NODE_ENV === "development" || Boolean(process.env.LEADER_TREE_DEBUG);
const IS_TEST = process.env.NODE_ENV === "test";

let fileLoggingEnabled = !IS_TEST && process.env.LEADER_TREE_DISABLE_FILE_LOGGING !== "1";
let verboseLogging = IS_DEBUG_BOOT;

export function setVerboseLogging(enabled: boolean): void {
  verboseLogging = enabled;
}

export function isVerboseLogging(): boolean {
  return verboseLogging;
}

function getCallerSource(): string | undefined {
  const err = new Error();
  const stack = err.stack?.split("\n");
  if (!stack || stack.length < 5) return undefined;

  // [0] message, [1] getCallerSource, [2] log, [3] logX, [4] caller
  const callerLine = stack[4];
  if (!callerLine) return undefined;

  const match = callerLine.match(/\(([^)]+)\)/) || callerLine.match(/at\s+(.+)$/);
  const fullPath = match?.[1];
  if (!fullPath) return undefined;

  const pathParts = fullPath.split(/[/\\]/);
  const fileName = pathParts[pathParts.length - 1]?.split(":")[0];

  return fileName?.replace(/\.[cm]?[tj]s$/, "");
}

function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(
      value,
      (key: string, val: unknown) => {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) return "[redacted]";

        if (typeof val === "bigint") return val.toString();

        if (val && typeof val === "object") {
          if (seen.has(val)) return "[Circular]";
          seen.add(val);
        }

        return val;
      },
      2
    );
  } catch (error) {
    return `[Unable to stringify: ${String(error)}]`;
  }
}

function writeToLogFile(level: string, message: string, context?: LogContext): void {
  if (!fileLoggingEnabled) return;

  if (level === "DEBUG" && !isVerboseLogging()) {
    return;
  }

  try {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${safeStringify(context).replace(/\s*\n\s*/g, " ")}` : "";
    const logLine = `[${timestamp}] [${level}] ${message}${contextStr}\n`;

    const logDir = getLogDirectory();
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    appendFileSync(getLogFilePath(), logLine, "utf8");
  } catch (error) {
    fileLoggingEnabled = false;
    console.error("[logger] File logging disabled:", String(error));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = "[redacted]";
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? redactSensitiveData(item) : item));
    } else if (isRecord(value)) {
      result[key] = redactSensitiveData(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function log(level: LogLevel, message: string, context?: LogContext): LogEntry {
  // Only capture source in verbose mode or for errors/warnings
  const source =
    isVerboseLogging() || level === "warn" || level === "error" ? getCallerSource() : undefined;

  return logBuffer.push({
    timestamp: Date.now(),
    level,
    message,
    context: context ? redactSensitiveData(context) : undefined,
    source,
  });
}

export function logDebug(message: string, context?: LogContext): void {
  const entry = log("debug", message, context);
  writeToLogFile("DEBUG", message, entry.context);
  if (isVerboseLogging() && !IS_TEST) {
    console.log(`[DEBUG] ${message}`, entry.context ? safeStringify(entry.context) : "");
  }
}

export function logInfo(message: string, context?: LogContext): void {
  const entry = log("info", message, context);
  writeToLogFile("INFO", message, entry.context);
  if (isVerboseLogging() && !IS_TEST) {
    console.log(`[INFO] ${message}`, entry.context ? safeStringify(entry.context) : "");
  }
}

export function logWarn(message: string, context?: LogContext): void {
  const entry = log("warn", message, context);
  writeToLogFile("WARN", message, entry.context);
  if (isVerboseLogging() && !IS_TEST) {
    console.warn(`[WARN] ${message}`, entry.context ? safeStringify(entry.context) : "");
  }
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  const errorDetails = error ? getErrorDetails(error) : undefined;
  const entry = log("error", message, { ...context, error: errorDetails });
  writeToLogFile("ERROR", message, entry.context);

  if (IS_TEST) return;

  console.error(
    `[ERROR] ${message}`,
    errorDetails ? safeStringify(errorDetails) : "",
    context ? safeStringify(redactSensitiveData(context)) : ""
  );
}
