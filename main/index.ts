export * from "../shared/types/index.js";
export * from "../shared/utils/configTree.js";
export * from "../shared/utils/configValidator.js";
export * from "../shared/utils/keyMaps.js";
export * from "../shared/utils/keyMatcher.js";
export * from "../shared/utils/shellEscape.js";

export { decodeConfig, decodeConfigValue, encodeConfig, configNodesEqual } from "./services/config/configCodec.js";
export { createDefaultRoot, defaultConfigText } from "./services/config/defaultConfig.js";
export { ConfigFile, type ConfigFileContents } from "./services/persistence/ConfigFile.js";
export {
  UserConfigService,
  CONFIG_FILE_NAME,
  SAVE_DEBOUNCE_MS,
  type ConfigSnapshot,
  type LoadOptions,
  type SaveOutcome,
  type UserConfigServiceOptions,
} from "./services/UserConfigService.js";
export {
  NavigationService,
  type ConfigSource,
  type DispatchSink,
  type KeyDownOutcome,
  type KeyOutcome,
  type MenuCommand,
  type MenuWindow,
  type NavigationServiceOptions,
} from "./services/NavigationService.js";
export {
  createNavigationStore,
  type NavigationState,
  type NavigationStore,
} from "./services/navigation/navigationStore.js";
export { isGroupRun, isSticky } from "./services/navigation/modifiers.js";
export {
  ActionRunner,
  DefaultValueArgumentPrompt,
  execaLauncher,
  expandTilde,
  type ActionRunnerOptions,
  type ArgumentPrompt,
  type ProcessLauncher,
  type ProcessResult,
} from "./services/ActionRunner.js";
export {
  CancelConflictPrompt,
  LoggingAlertHandler,
  type Alert,
  type AlertHandler,
  type AlertStyle,
  type ConflictPrompt,
} from "./services/alerts.js";
export { EVENT_META, TypedEventBus, events, type LeaderEventMap } from "./services/events.js";
export { LogBuffer, logBuffer, type LogEntry } from "./services/LogBuffer.js";
export * from "./utils/errorTypes.js";
export * from "./utils/logger.js";
export {
  createPreferencesStore,
  defaultConfigDirectory,
  getPreferencesStore,
  readNavigationSettings,
  type PreferencesSchema,
  type PreferencesStore,
} from "./store.js";
export { runCli } from "./cli.js";
