/** Ring buffer for recent log entries (FIFO) */

import crypto from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  source?: string;
}

const DEFAULT_MAX_SIZE = 500;

function normalizeMaxSize(maxSize: number): number {
  if (!Number.isFinite(maxSize)) return DEFAULT_MAX_SIZE;
  return Math.max(1, Math.floor(maxSize));
}

export class LogBuffer {
  private buffer: LogEntry[] = [];
  private readonly maxSize: number;

  constructor(maxSize = DEFAULT_MAX_SIZE) {
    this.maxSize = normalizeMaxSize(maxSize);
  }

  push(entry: Omit<LogEntry, "id">): LogEntry {
    const fullEntry: LogEntry = {
      ...entry,
      id: crypto.randomUUID(),
    };

    this.buffer.push(fullEntry);

    if (this.buffer.length > this.maxSize) {
      this.buffer = this.buffer.slice(-this.maxSize);
    }

    return fullEntry;
  }

  getAll(): LogEntry[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer = [];
  }

  get length(): number {
    return this.buffer.length;
  }
}

export const logBuffer = new LogBuffer();
