import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import path from "path";
import {
  getLogFilePath,
  isVerboseLogging,
  logError,
  logInfo,
  logWarn,
  setVerboseLogging,
} from "../logger.js";
import { logBuffer } from "../../services/LogBuffer.js";

describe("logger", () => {
  beforeEach(() => {
    logBuffer.clear();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    setVerboseLogging(false);
  });

  it("records entries in the log buffer", () => {
    logInfo("Loaded config file", { nodes: 3 });
    logWarn("Invalid URL");

    const entries = logBuffer.getAll();
    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
      ["info", "Loaded config file"],
      ["warn", "Invalid URL"],
    ]);
    expect(entries[0]?.context).toEqual({ nodes: 3 });
  });

  it("redacts sensitive context keys at any depth", () => {
    logInfo("Connecting", {
      password: "test-secret",
      nested: { token: "test-token", user: "tester" },
      list: [{ apiKey: "test-key" }, "plain"],
    });

    expect(logBuffer.getAll()[0]?.context).toEqual({
      password: "[redacted]",
      nested: { token: "[redacted]", user: "tester" },
      list: [{ apiKey: "[redacted]" }, "plain"],
    });
  });

  it("attaches error details to error entries", () => {
    logError("Failed to save config file", new Error("disk full"), { filePath: "/tmp/c.json" });

    const entry = logBuffer.getAll()[0];
    expect(entry?.level).toBe("error");
    expect(entry?.context).toMatchObject({
      filePath: "/tmp/c.json",
      error: { message: "disk full", name: "Error" },
    });
  });

  it("places the log file in the configured directory", () => {
    vi.stubEnv("LEADER_TREE_LOG_DIR", "/tmp/leader-logs");
    expect(getLogFilePath()).toBe(path.join("/tmp/leader-logs", "leader-tree.log"));
  });

  it("toggles verbose logging", () => {
    setVerboseLogging(true);
    expect(isVerboseLogging()).toBe(true);
    setVerboseLogging(false);
    expect(isVerboseLogging()).toBe(false);
  });
});
