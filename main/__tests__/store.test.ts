import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { createPreferencesStore, defaultConfigDirectory, readNavigationSettings } from "../store.js";

describe("preferences store", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "prefs-test-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("defaults the config directory to the home override", () => {
    vi.stubEnv("LEADER_TREE_HOME", "/tmp/leader-home");
    expect(defaultConfigDirectory()).toBe("/tmp/leader-home");

    const store = createPreferencesStore({ cwd: testDir });
    expect(store.get("configDir")).toBe("/tmp/leader-home");
  });

  it("falls back to a directory in the home folder", () => {
    vi.stubEnv("LEADER_TREE_HOME", "");
    expect(defaultConfigDirectory()).toBe(path.join(os.homedir(), ".leader-tree"));
  });

  it("reads navigation settings with their defaults", () => {
    const store = createPreferencesStore({ cwd: testDir });

    expect(readNavigationSettings(store)).toEqual({
      modifierKeyConfiguration: "controlGroupOptionSticky",
      caseSensitiveKeys: false,
      reloadIndicatorMs: 900,
    });
  });

  it("persists changes", () => {
    const store = createPreferencesStore({ cwd: testDir });
    store.set("caseSensitiveKeys", true);

    const reopened = createPreferencesStore({ cwd: testDir });
    expect(readNavigationSettings(reopened).caseSensitiveKeys).toBe(true);
  });

  it("replaces hand-edited invalid values with defaults", async () => {
    const store = createPreferencesStore({ cwd: testDir });
    await fs.writeFile(
      store.path,
      JSON.stringify({ modifierKeyConfiguration: "shiftSticky", reloadIndicatorMs: -5, caseSensitiveKeys: true })
    );

    expect(readNavigationSettings(createPreferencesStore({ cwd: testDir }))).toEqual({
      modifierKeyConfiguration: "controlGroupOptionSticky",
      caseSensitiveKeys: true,
      reloadIndicatorMs: 900,
    });
  });
});
