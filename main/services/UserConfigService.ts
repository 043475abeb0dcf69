import path from "path";
import { createStore, type StoreApi } from "zustand/vanilla";
import type {
  GroupNode,
  NodePath,
  ValidateConfig,
  ValidationErrorType,
  ValidationIndex,
} from "../../shared/types/config.js";
import { createEmptyRoot, createErrorRoot } from "../../shared/utils/configTree.js";
import {
  indexValidationErrors,
  validateConfig,
  validationErrorAt,
} from "../../shared/utils/configValidator.js";
import { getUserMessage } from "../utils/errorTypes.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { decodeConfig, encodeConfig } from "./config/configCodec.js";
import { defaultConfigText } from "./config/defaultConfig.js";
import { ConfigFile } from "./persistence/ConfigFile.js";
import {
  CONFLICT_MESSAGE,
  CancelConflictPrompt,
  LoggingAlertHandler,
  type AlertHandler,
  type ConflictPrompt,
} from "./alerts.js";
import { events as defaultEvents, type ConflictResolution, type TypedEventBus } from "./events.js";
import { defaultConfigDirectory, readNavigationSettings, type PreferencesStore } from "../store.js";

export const CONFIG_FILE_NAME = "config.json";
export const SAVE_DEBOUNCE_MS = 300;

export interface ConfigSnapshot extends ValidationIndex {
  root: GroupNode;
  isLoading: boolean;
  /** Set while the file on disk cannot be decoded; saves are skipped meanwhile. */
  loadError: string | null;
}

export type SaveOutcome = "written" | "cancelled" | "reloaded" | "failed" | "skipped";

export interface LoadOptions {
  /** Discard in-memory edits: cancels any pending save. */
  suppressConflictPrompt?: boolean;
}

export interface UserConfigServiceOptions {
  preferences: PreferencesStore;
  alerts?: AlertHandler;
  conflictPrompt?: ConflictPrompt;
  validate?: ValidateConfig;
  debounceMs?: number;
  fileName?: string;
  events?: TypedEventBus;
  file?: ConfigFile;
  /** Used when the configured directory is missing */
  defaultDirectory?: string;
}

type SaveWaiter = (outcome: SaveOutcome) => void;

/**
 * Owns the action tree and keeps it in step with `config.json`.
 *
 * Edits are saved after a quiet period. Before each write the file's checksum
 * is compared with the one recorded at the last read or write; a mismatch
 * means someone else changed the file, and the conflict prompt decides what
 * happens. Writes go through a temporary file and a rename.
 */
export class UserConfigService {
  readonly store: StoreApi<ConfigSnapshot>;

  private readonly preferences: PreferencesStore;
  private readonly alerts: AlertHandler;
  private readonly conflictPrompt: ConflictPrompt;
  private readonly validate: ValidateConfig;
  private readonly debounceMs: number;
  private readonly fileName: string;
  private readonly events: TypedEventBus;
  private readonly file: ConfigFile;
  private readonly defaultDirectory: string;

  private lastReadChecksum: string | null = null;
  private loadGeneration = 0;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingWaiters: SaveWaiter[] = [];
  /** Saves requested while the conflict prompt is open */
  private deferredWaiters: SaveWaiter[] = [];
  private promptOpen = false;
  private inFlight: Promise<void> = Promise.resolve();
  /** Settles when the write in progress, if any, has finished */
  private activeWrite: Promise<void> = Promise.resolve();
  /** Bumped by every load; a save whose epoch is stale must not write */
  private saveEpoch = 0;
  private disposed = false;

  constructor(options: UserConfigServiceOptions) {
    this.preferences = options.preferences;
    this.alerts = options.alerts ?? new LoggingAlertHandler();
    this.conflictPrompt = options.conflictPrompt ?? new CancelConflictPrompt();
    this.validate =
      options.validate ??
      ((root) =>
        validateConfig(root, {
          caseSensitive: readNavigationSettings(this.preferences).caseSensitiveKeys,
        }));
    this.debounceMs = options.debounceMs ?? SAVE_DEBOUNCE_MS;
    this.fileName = options.fileName ?? CONFIG_FILE_NAME;
    this.events = options.events ?? defaultEvents;
    this.file = options.file ?? new ConfigFile();
    this.defaultDirectory = options.defaultDirectory ?? defaultConfigDirectory();

    this.store = createStore<ConfigSnapshot>()(() => ({
      root: createEmptyRoot(),
      validationErrors: [],
      validationErrorsByPath: {},
      isLoading: false,
      loadError: null,
    }));
  }

  get configDirectory(): string {
    return this.preferences.get("configDir");
  }

  get configPath(): string {
    return path.join(this.configDirectory, this.fileName);
  }

  getState(): ConfigSnapshot {
    return this.store.getState();
  }

  get root(): GroupNode {
    return this.store.getState().root;
  }

  subscribe(listener: (state: ConfigSnapshot, previous: ConfigSnapshot) => void): () => void {
    return this.store.subscribe(listener);
  }

  validationErrorAt(nodePath: NodePath): ValidationErrorType | undefined {
    return validationErrorAt(this.store.getState().validationErrorsByPath, nodePath);
  }

  /**
   * Makes sure the config directory and file exist, then loads. A missing
   * custom directory is replaced by the default one with a warning.
   */
  async ensureAndLoad(): Promise<boolean> {
    await this.ensureValidConfigDirectory();

    const filePath = this.configPath;
    if (!(await this.file.exists(filePath))) {
      try {
        await this.file.writeAtomic(filePath, defaultConfigText());
        logInfo("Created default config file", { filePath });
      } catch (error) {
        logError("Failed to create default config file", error, { filePath });
        this.alerts.showAlert({
          style: "critical",
          message: "Failed to create default config file",
          informativeText: getUserMessage(error),
        });
      }
    }

    return this.load();
  }

  /** Points the config directory preference somewhere else and loads from there. */
  async setConfigDirectory(dir: string): Promise<boolean> {
    this.cancelPendingSave();
    this.preferences.set("configDir", dir);
    return this.ensureAndLoad();
  }

  private async ensureValidConfigDirectory(): Promise<void> {
    const dir = this.configDirectory;
    if (await this.file.isDirectory(dir)) return;

    if (path.resolve(dir) !== path.resolve(this.defaultDirectory)) {
      logWarn("Config directory does not exist, using default", {
        from: dir,
        to: this.defaultDirectory,
      });
      this.alerts.showAlert({
        style: "warning",
        message: `Config directory does not exist: ${dir}`,
        informativeText: "Resetting to default location.",
      });
      this.preferences.set("configDir", this.defaultDirectory);
      this.events.emit("config:directory-reset", { from: dir, to: this.defaultDirectory });
    }

    try {
      await this.file.ensureDirectory(this.defaultDirectory);
    } catch (error) {
      logError("Failed to create config directory", error, { dir: this.defaultDirectory });
      this.alerts.showAlert({
        style: "critical",
        message: "Failed to create config directory",
        informativeText: getUserMessage(error),
      });
    }
  }

  /**
   * Reads and decodes the config file. Returns false when decoding failed or a
   * later load superseded this one.
   */
  async load(options: LoadOptions = {}): Promise<boolean> {
    if (options.suppressConflictPrompt) {
      this.cancelPendingSave();
    }

    const generation = ++this.loadGeneration;
    this.saveEpoch++;
    const filePath = this.configPath;
    this.store.setState({ isLoading: true });

    let root: GroupNode;
    let checksum: string | null;
    try {
      await this.activeWrite;
      const contents = await this.file.read(filePath);
      if (generation !== this.loadGeneration) return false;
      if (contents) {
        root = decodeConfig(contents.text);
        checksum = contents.checksum;
      } else {
        root = createEmptyRoot();
        checksum = null;
      }
    } catch (error) {
      if (generation !== this.loadGeneration) return false;
      this.applyLoadFailure(filePath, error);
      return false;
    }

    this.lastReadChecksum = checksum;
    this.publish(root, { isLoading: false, loadError: null });
    logInfo("Loaded config file", { filePath, nodes: root.actions.length });
    this.events.emit("config:loaded", { path: filePath, checksum });
    return true;
  }

  private applyLoadFailure(filePath: string, error: unknown): void {
    const message = getUserMessage(error);
    this.lastReadChecksum = null;
    this.store.setState({
      root: createErrorRoot(),
      validationErrors: [],
      validationErrorsByPath: {},
      isLoading: false,
      loadError: message,
    });
    logError("Failed to load config file", error, { filePath });
    this.alerts.showAlert({
      style: "critical",
      message: "Failed to load config file",
      informativeText: message,
    });
    this.events.emit("config:load-failed", { path: filePath, message });
  }

  /** Discards in-memory state and reads the file again. */
  async reloadFromFile(): Promise<boolean> {
    this.events.emit("config:will-reload");
    const ok = await this.load({ suppressConflictPrompt: true });
    this.events.emit("config:did-reload", { ok });
    return ok;
  }

  /**
   * Replaces the root with `mutate(root)`, re-validates, and schedules a save
   * unless a load is in progress.
   */
  edit(mutate: (root: GroupNode) => GroupNode): GroupNode {
    const next = mutate(this.store.getState().root);
    this.publish(next, {});
    if (!this.store.getState().isLoading) {
      void this.saveDebounced();
    }
    return next;
  }

  /** Writes now, skipping the quiet period. */
  save(): Promise<SaveOutcome> {
    this.clearDebounceTimer();
    const promise = this.enqueueWaiter();
    void this.flushPending();
    return promise;
  }

  /**
   * Writes once no further save was requested for the quiet period. Resolves
   * with the outcome of the write that carried this request.
   */
  saveDebounced(): Promise<SaveOutcome> {
    const promise = this.enqueueWaiter();
    this.scheduleDebounce();
    return promise;
  }

  /** Runs a pending debounced save now and waits for writes in progress. */
  async flush(): Promise<void> {
    if (this.debounceTimer) {
      this.clearDebounceTimer();
      await this.flushPending();
    }
    await this.inFlight;
  }

  dispose(): void {
    this.disposed = true;
    this.cancelPendingSave();
  }

  private publish(root: GroupNode, extra: Partial<ConfigSnapshot>): void {
    this.store.setState({ root, ...indexValidationErrors(this.validate(root)), ...extra });
  }

  private enqueueWaiter(): Promise<SaveOutcome> {
    if (this.disposed) return Promise.resolve("cancelled");
    return new Promise<SaveOutcome>((resolve) => {
      this.pendingWaiters.push(resolve);
    });
  }

  private scheduleDebounce(): void {
    if (this.disposed) return;
    this.clearDebounceTimer();
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.flushPending();
    }, this.debounceMs);
  }

  private clearDebounceTimer(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  private cancelPendingSave(): void {
    this.clearDebounceTimer();
    const waiters = [...this.pendingWaiters, ...this.deferredWaiters];
    this.pendingWaiters = [];
    this.deferredWaiters = [];
    waiters.forEach((resolve) => resolve("cancelled"));
  }

  private async flushPending(): Promise<void> {
    const waiters = this.pendingWaiters;
    this.pendingWaiters = [];
    if (waiters.length === 0) return;

    if (this.promptOpen) {
      this.deferredWaiters.push(...waiters);
      return;
    }

    const outcome = await this.enqueueSave();
    waiters.forEach((resolve) => resolve(outcome));
  }

  private enqueueSave(): Promise<SaveOutcome> {
    const run = this.inFlight.then(() => this.performSave());
    this.inFlight = run.then(() => undefined);
    return run;
  }

  private async performSave(): Promise<SaveOutcome> {
    if (this.disposed) return "cancelled";

    const state = this.store.getState();
    const filePath = this.configPath;

    if (state.loadError) {
      logWarn("Skipping save while the config file cannot be loaded", {
        filePath,
        loadError: state.loadError,
      });
      return "skipped";
    }
    if (state.isLoading) {
      logWarn("Skipping save while the config file is loading", { filePath });
      return "skipped";
    }

    const text = encodeConfig(state.root);
    const epoch = this.saveEpoch;

    try {
      if (this.lastReadChecksum !== null) {
        const current = await this.file.checksum(filePath);
        if (current !== null && current !== this.lastReadChecksum) {
          const resolution = await this.resolveConflict(filePath);
          if (resolution === "cancel") return "cancelled";
          if (resolution === "reload") {
            await this.reloadFromFile();
            return "reloaded";
          }
        }
      }

      if (epoch !== this.saveEpoch) {
        logInfo("Save dropped; the config file was loaded again meanwhile", { filePath });
        return "cancelled";
      }

      const write = this.file.writeAtomic(filePath, text);
      // failures are reported below; loads only wait for the write to settle
      this.activeWrite = write.then(
        () => undefined,
        () => undefined
      );
      const checksum = await write;
      this.lastReadChecksum = checksum;
      this.store.setState(indexValidationErrors(this.validate(this.store.getState().root)));
      logInfo("Saved config file", { filePath });
      this.events.emit("config:saved", { path: filePath, checksum });
      return "written";
    } catch (error) {
      logError("Failed to save config file", error, { filePath });
      this.alerts.showAlert({
        style: "critical",
        message: "Failed to save config file",
        informativeText: getUserMessage(error),
      });
      return "failed";
    }
  }

  private async resolveConflict(filePath: string): Promise<ConflictResolution> {
    this.promptOpen = true;
    let resolution: ConflictResolution;
    try {
      resolution = await this.conflictPrompt.askOverwriteCancelReload({ path: filePath });
    } catch (error) {
      logError("Conflict prompt failed; cancelling save", error, { filePath });
      resolution = "cancel";
    } finally {
      this.promptOpen = false;
    }

    logInfo(`${CONFLICT_MESSAGE}: ${resolution}`, { filePath });
    this.events.emit("config:conflict", { path: filePath, resolution });

    const deferred = this.deferredWaiters;
    this.deferredWaiters = [];
    if (resolution === "reload") {
      deferred.forEach((resolve) => resolve("cancelled"));
    } else if (deferred.length > 0) {
      this.pendingWaiters.push(...deferred);
      this.scheduleDebounce();
    }

    return resolution;
  }
}
