import type { ActionNode, ConfigNode, GroupNode, NodePath } from "../../shared/types/config.js";
import {
  DEFAULT_NAVIGATION_SETTINGS,
  type ModifierState,
  type NavigationSettings,
} from "../../shared/types/preferences.js";
import {
  appendChild,
  insertAfter,
  isGroup,
  removeChild,
  resolveGroupPath,
  type ResolvedGroupPath,
} from "../../shared/utils/configTree.js";
import { textFor } from "../../shared/utils/keyMaps.js";
import { findMatchingChild } from "../../shared/utils/keyMatcher.js";
import { logDebug, logError, logWarn } from "../utils/logger.js";
import { events as defaultEvents, type TypedEventBus } from "./events.js";
import { isGroupRun, isSticky } from "./navigation/modifiers.js";
import { createNavigationStore, type NavigationStore } from "./navigation/navigationStore.js";

/** Performs actions picked in the menu. */
export interface DispatchSink {
  runAction(action: ActionNode): Promise<void> | void;
  runGroupRecursively(group: GroupNode): Promise<void> | void;
}

export interface MenuWindow {
  hide(): void;
  /** Cue for a key that matches nothing */
  notFound(): void;
  show?(): void;
}

/** The part of the config service navigation needs. */
export interface ConfigSource {
  readonly root: GroupNode;
  edit(mutate: (root: GroupNode) => GroupNode): GroupNode;
}

export type KeyOutcome =
  | { kind: "run-action"; action: ActionNode; sticky: boolean }
  | { kind: "run-group"; group: GroupNode }
  | { kind: "preview"; action: ActionNode }
  | { kind: "descend"; group: GroupNode }
  | { kind: "not-found"; key: string };

export type MenuCommand =
  | "clear"
  | "hide"
  | "select-next"
  | "select-previous"
  | "execute-selected"
  | "enter-group"
  | "back";

export type KeyDownOutcome = KeyOutcome | { kind: "command"; command: MenuCommand };

export interface NavigationServiceOptions {
  config: ConfigSource;
  sink: DispatchSink;
  window?: MenuWindow;
  getSettings?: () => NavigationSettings;
  events?: TypedEventBus;
}

const headlessWindow: MenuWindow = {
  hide: () => undefined,
  notFound: () => undefined,
};

/**
 * Turns key presses into movement through the action tree and hands the
 * chosen actions to the dispatch sink. Structural edits go through the config
 * service; the navigation path is looked up again in the current tree each
 * time it is used.
 */
export class NavigationService {
  readonly store: NavigationStore;

  private readonly config: ConfigSource;
  private readonly sink: DispatchSink;
  private readonly window: MenuWindow;
  private readonly getSettings: () => NavigationSettings;
  private readonly events: TypedEventBus;
  private readonly unsubscribeReload: () => void;
  private reloadTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: NavigationServiceOptions) {
    this.config = options.config;
    this.sink = options.sink;
    this.window = options.window ?? headlessWindow;
    this.getSettings = options.getSettings ?? (() => DEFAULT_NAVIGATION_SETTINGS);
    this.events = options.events ?? defaultEvents;
    this.store = createNavigationStore(() => this.config.root);
    this.unsubscribeReload = this.events.on("config:did-reload", () => this.showReloadIndicator());
  }

  dispose(): void {
    this.unsubscribeReload();
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
      this.reloadTimer = null;
    }
  }

  /**
   * Resolves `key` among the children of the current group, first match in
   * child order. With `execute` false actions are only previewed.
   */
  handleKey(key: string, modifiers: ModifierState = {}, execute = true): KeyOutcome {
    const settings = this.getSettings();
    const group = this.store.getState().currentGroup();
    const hit = group
      ? findMatchingChild(group.actions, key, { caseSensitive: settings.caseSensitiveKeys })
      : undefined;

    if (!hit) {
      logDebug("No item for key", { key });
      this.events.emit("nav:not-found", { key });
      this.window.notFound();
      return { kind: "not-found", key };
    }

    return this.activate(hit, modifiers, execute, settings);
  }

  private activate(
    node: ConfigNode,
    modifiers: ModifierState,
    execute: boolean,
    settings: NavigationSettings
  ): KeyOutcome {
    const config = settings.modifierKeyConfiguration;

    if (isGroup(node)) {
      if (execute && isGroupRun(modifiers, config)) {
        this.hide();
        this.dispatch(() => this.sink.runGroupRecursively(node), node);
        return { kind: "run-group", group: node };
      }
      const state = this.store.getState();
      state.setDisplay(node.key ?? null);
      state.navigateToGroup(node);
      return { kind: "descend", group: node };
    }

    if (!execute) {
      return { kind: "preview", action: node };
    }

    const sticky = isSticky(modifiers, config);
    if (!sticky) {
      this.hide();
    }
    this.dispatch(() => this.sink.runAction(node), node);
    return { kind: "run-action", action: node, sticky };
  }

  private dispatch(run: () => Promise<void> | void, node: ConfigNode): void {
    const context = { type: node.type, key: node.key };
    try {
      void Promise.resolve(run()).catch((error: unknown) => {
        logError("Action failed", error, context);
      });
    } catch (error) {
      logError("Action failed", error, context);
    }
  }

  /** Routes a key press, handling the menu's own keys before item keys. */
  keyDown(key: string, modifiers: ModifierState = {}): KeyDownOutcome {
    if (modifiers.command && key.toLowerCase() === "w") {
      this.hide();
      return { kind: "command", command: "hide" };
    }

    switch (textFor(key)) {
      case "backspace":
        this.store.getState().clear();
        return { kind: "command", command: "clear" };
      case "escape":
        this.hide();
        return { kind: "command", command: "hide" };
      case "down":
      case "space":
        this.store.getState().moveSelection(1);
        return { kind: "command", command: "select-next" };
      case "up":
        this.store.getState().moveSelection(-1);
        return { kind: "command", command: "select-previous" };
      case "enter":
        this.executeSelectedItem(modifiers);
        return { kind: "command", command: "execute-selected" };
      case "right":
        this.enterSelectedGroup();
        return { kind: "command", command: "enter-group" };
      case "left":
        this.goBack();
        return { kind: "command", command: "back" };
      default:
        return this.handleKey(key, modifiers);
    }
  }

  /** Runs the selected action, or opens the selected group. */
  executeSelectedItem(modifiers: ModifierState = {}): KeyOutcome | null {
    const item = this.store.getState().selectedItem();
    if (!item) return null;
    return this.activate(item, modifiers, true, this.getSettings());
  }

  enterSelectedGroup(): boolean {
    const item = this.store.getState().selectedItem();
    if (!item || !isGroup(item)) return false;
    const state = this.store.getState();
    state.setDisplay(item.key ?? null);
    state.navigateToGroup(item);
    return true;
  }

  goBack(): boolean {
    return this.store.getState().goBack();
  }

  /** Hides the menu and returns to the root. */
  hide(): void {
    this.window.hide();
    this.store.getState().clear();
  }

  /**
   * Feeds `keys` through `handleKey` from the root, stopping after the first
   * key that does anything other than open a group.
   */
  navigateSequence(
    keys: readonly string[],
    options: { execute?: boolean; modifiers?: ModifierState } = {}
  ): KeyOutcome[] {
    const { execute = true, modifiers = {} } = options;
    this.store.getState().clear();

    const outcomes: KeyOutcome[] = [];
    for (const key of keys) {
      const outcome = this.handleKey(key, modifiers, execute);
      outcomes.push(outcome);
      if (outcome.kind !== "descend") break;
    }
    return outcomes;
  }

  private resolveCurrentPath(path: readonly GroupNode[]): ResolvedGroupPath | null {
    const resolved = resolveGroupPath(this.config.root, path);
    if (resolved?.ambiguous) {
      logWarn("Navigation path contains a group without key and label; using the first match", {
        indices: resolved.indices,
      });
    }
    return resolved;
  }

  private locateSelected(group: GroupNode, selected: ConfigNode, selectedIndex: number): number {
    const byId = group.actions.findIndex((node) => node.uiid === selected.uiid);
    if (byId !== -1) return byId;

    const atPosition = group.actions[selectedIndex];
    if (
      atPosition &&
      atPosition.type === selected.type &&
      atPosition.key === selected.key &&
      atPosition.label === selected.label
    ) {
      return selectedIndex;
    }

    if (!isGroup(selected)) {
      return group.actions.findIndex(
        (node) => !isGroup(node) && node.key === selected.key && node.value === selected.value
      );
    }
    return -1;
  }

  /**
   * Adds `action` next to the current selection: into a selected group, after
   * a selected action, or at the end of the current group. Falls back to the
   * root when the navigation path no longer exists. Returns the new node's path.
   */
  addAction(action: ConfigNode): NodePath {
    const state = this.store.getState();
    const resolved = this.resolveCurrentPath(state.navigationPath);

    if (!resolved) {
      logWarn("Navigation path no longer exists; adding to the root group", {
        depth: state.navigationPath.length,
      });
      const root = this.config.edit((current) => appendChild(current, [], action));
      return [root.actions.length - 1];
    }

    const selected = state.selectedItem();
    const index =
      selected && state.selectedIndex !== null
        ? this.locateSelected(resolved.group, selected, state.selectedIndex)
        : -1;
    const target = index === -1 ? undefined : resolved.group.actions[index];

    if (target && isGroup(target)) {
      const groupPath = [...resolved.indices, index];
      this.config.edit((current) => appendChild(current, groupPath, action));
      return [...groupPath, target.actions.length];
    }

    if (target) {
      this.config.edit((current) => insertAfter(current, resolved.indices, index, action));
      return [...resolved.indices, index + 1];
    }

    this.config.edit((current) => appendChild(current, resolved.indices, action));
    return [...resolved.indices, resolved.group.actions.length];
  }

  /** Removes the selected item from the current tree. Returns false when nothing was removed. */
  deleteSelectedItem(): boolean {
    const state = this.store.getState();
    const selected = state.selectedItem();
    if (!selected || state.selectedIndex === null) return false;

    const resolved = this.resolveCurrentPath(state.navigationPath);
    if (!resolved) {
      logError("Cannot delete: navigation path no longer exists", undefined, {
        depth: state.navigationPath.length,
      });
      return false;
    }

    const index = this.locateSelected(resolved.group, selected, state.selectedIndex);
    if (index === -1) {
      logError("Cannot delete: selected item is no longer in its group", undefined, {
        key: selected.key,
      });
      return false;
    }

    this.config.edit((current) => removeChild(current, resolved.indices, index));

    const remaining = resolved.group.actions.length - 1;
    state.setSelectedIndex(remaining === 0 ? null : Math.min(index, remaining - 1));
    return true;
  }

  private showReloadIndicator(): void {
    const state = this.store.getState();
    state.clear();
    state.setShowingRefreshState(true);
    this.window.show?.();

    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }
    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      this.store.getState().setShowingRefreshState(false);
      this.window.hide();
    }, this.getSettings().reloadIndicatorMs);
  }
}
