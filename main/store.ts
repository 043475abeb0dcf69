import Conf from "conf";
import os from "os";
import path from "path";
import {
  DEFAULT_MODIFIER_KEY_CONFIGURATION,
  DEFAULT_RELOAD_INDICATOR_MS,
  NavigationSettingsSchema,
  type ModifierKeyConfiguration,
  type NavigationSettings,
} from "../shared/types/preferences.js";

export interface PreferencesSchema {
  /** Directory holding config.json */
  configDir: string;
  modifierKeyConfiguration: ModifierKeyConfiguration;
  caseSensitiveKeys: boolean;
  reloadIndicatorMs: number;
  verboseLogging: boolean;
}

export type PreferencesStore = Conf<PreferencesSchema>;

export function defaultConfigDirectory(): string {
  return process.env.LEADER_TREE_HOME || path.join(os.homedir(), ".leader-tree");
}

export function createPreferencesStore(options: { cwd?: string } = {}): PreferencesStore {
  return new Conf<PreferencesSchema>({
    projectName: "leader-tree",
    configName: "preferences",
    defaults: {
      configDir: defaultConfigDirectory(),
      modifierKeyConfiguration: DEFAULT_MODIFIER_KEY_CONFIGURATION,
      caseSensitiveKeys: false,
      reloadIndicatorMs: DEFAULT_RELOAD_INDICATOR_MS,
      verboseLogging: false,
    },
    cwd: options.cwd ?? process.env.LEADER_TREE_PREFERENCES_DIR,
  });
}

/** Navigation settings with hand-edited invalid values replaced by defaults. */
export function readNavigationSettings(store: PreferencesStore): NavigationSettings {
  return NavigationSettingsSchema.parse({
    modifierKeyConfiguration: store.get("modifierKeyConfiguration"),
    caseSensitiveKeys: store.get("caseSensitiveKeys"),
    reloadIndicatorMs: store.get("reloadIndicatorMs"),
  });
}

let instance: PreferencesStore | null = null;

export function getPreferencesStore(): PreferencesStore {
  if (!instance) {
    instance = createPreferencesStore();
  }
  return instance;
}
