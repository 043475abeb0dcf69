import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import {
  NavigationService,
  type ConfigSource,
  type DispatchSink,
  type MenuWindow,
} from "../NavigationService.js";
import { TypedEventBus } from "../events.js";
import { logBuffer } from "../LogBuffer.js";
import {
  DEFAULT_NAVIGATION_SETTINGS,
  type NavigationSettings,
} from "../../../shared/types/preferences.js";
import { createAction, createGroup } from "../../../shared/utils/configTree.js";
import type { ActionNode, ConfigNode, GroupNode } from "../../../shared/types/config.js";

class FakeConfig implements ConfigSource {
  constructor(public root: GroupNode) {}

  edit(mutate: (root: GroupNode) => GroupNode): GroupNode {
    this.root = mutate(this.root);
    return this.root;
  }
}

function buildRoot(): GroupNode {
  return createGroup({
    actions: [
      createAction({ type: "application", key: "a", value: "/Applications/A.app" }),
      createAction({ type: "url", key: "b", value: "https://example.com" }),
      createGroup({
        key: "c",
        label: "Tools",
        actions: [
          createAction({ type: "command", key: "d", value: "echo d" }),
          createAction({ type: "command", key: "e", value: "echo e" }),
        ],
      }),
    ],
  });
}

function child(group: GroupNode, index: number): ConfigNode {
  const node = group.actions[index];
  if (!node) throw new Error(`No child at ${index}`);
  return node;
}

function keys(group: GroupNode | undefined): Array<string | undefined> {
  return group ? group.actions.map((node) => node.key) : [];
}

function errorMessages(): string[] {
  return logBuffer
    .getAll()
    .filter((entry) => entry.level === "error")
    .map((entry) => entry.message);
}

function groupChild(group: GroupNode, index: number): GroupNode {
  const node = child(group, index);
  if (node.type !== "group") throw new Error(`Not a group at ${index}`);
  return node;
}

describe("NavigationService", () => {
  let config: FakeConfig;
  let sink: {
    runAction: Mock<(action: ActionNode) => Promise<void> | void>;
    runGroupRecursively: Mock<(group: GroupNode) => Promise<void> | void>;
  };
  let window: { hide: Mock<() => void>; notFound: Mock<() => void>; show: Mock<() => void> };
  let settings: NavigationSettings;
  let bus: TypedEventBus;
  let service: NavigationService;

  beforeEach(() => {
    config = new FakeConfig(buildRoot());
    sink = {
      runAction: vi.fn<(action: ActionNode) => Promise<void> | void>(),
      runGroupRecursively: vi.fn<(group: GroupNode) => Promise<void> | void>(),
    };
    window = { hide: vi.fn<() => void>(), notFound: vi.fn<() => void>(), show: vi.fn<() => void>() };
    settings = { ...DEFAULT_NAVIGATION_SETTINGS };
    bus = new TypedEventBus();
    const dispatchSink: DispatchSink = sink;
    const menuWindow: MenuWindow = window;
    service = new NavigationService({
      config,
      sink: dispatchSink,
      window: menuWindow,
      getSettings: () => settings,
      events: bus,
    });
  });

  afterEach(() => {
    service.dispose();
    vi.useRealTimers();
  });

  describe("handleKey", () => {
    it("runs a top-level action and hides the menu", () => {
      const outcome = service.handleKey("a");

      expect(outcome).toEqual({ kind: "run-action", action: child(config.root, 0), sticky: false });
      expect(sink.runAction).toHaveBeenCalledWith(child(config.root, 0));
      expect(window.hide).toHaveBeenCalledTimes(1);
    });

    it("descends into a group and runs an action inside it", () => {
      expect(service.handleKey("c").kind).toBe("descend");
      const state = service.store.getState();
      expect(state.display).toBe("c");
      expect(state.currentActions().map((node) => node.key)).toEqual(["d", "e"]);

      const outcome = service.handleKey("d");

      expect(outcome.kind).toBe("run-action");
      expect(sink.runAction).toHaveBeenCalledWith(child(groupChild(config.root, 2), 0));
      expect(service.store.getState().navigationPath).toEqual([]);
      expect(service.store.getState().display).toBeNull();
    });

    it("keeps the menu open for a sticky action", () => {
      service.handleKey("c");
      const outcome = service.handleKey("e", { option: true });

      expect(outcome).toMatchObject({ kind: "run-action", sticky: true });
      expect(window.hide).not.toHaveBeenCalled();
      expect(service.store.getState().navigationPath).toHaveLength(1);
    });

    it("swaps the modifiers under the other configuration", () => {
      settings = { ...settings, modifierKeyConfiguration: "optionGroupControlSticky" };

      expect(service.handleKey("a", { control: true })).toMatchObject({ sticky: true });
      expect(service.handleKey("c", { option: true }).kind).toBe("run-group");
    });

    it("runs a whole group with the group modifier", () => {
      const outcome = service.handleKey("c", { control: true });

      expect(outcome).toEqual({ kind: "run-group", group: groupChild(config.root, 2) });
      expect(sink.runGroupRecursively).toHaveBeenCalledWith(groupChild(config.root, 2));
      expect(window.hide).toHaveBeenCalledTimes(1);
    });

    it("reports a key that matches nothing", () => {
      const notFound = vi.fn();
      bus.on("nav:not-found", notFound);

      expect(service.handleKey("x")).toEqual({ kind: "not-found", key: "x" });

      expect(window.notFound).toHaveBeenCalledTimes(1);
      expect(notFound).toHaveBeenCalledWith({ key: "x" });
      expect(sink.runAction).not.toHaveBeenCalled();
    });

    it("ignores case unless configured otherwise", () => {
      expect(service.handleKey("A").kind).toBe("run-action");

      settings = { ...settings, caseSensitiveKeys: true };
      expect(service.handleKey("A").kind).toBe("not-found");
    });

    it("previews an action without running it", () => {
      const outcome = service.handleKey("b", {}, false);

      expect(outcome).toEqual({ kind: "preview", action: child(config.root, 1) });
      expect(sink.runAction).not.toHaveBeenCalled();
      expect(window.hide).not.toHaveBeenCalled();
    });

    it("opens a group instead of running it when only previewing", () => {
      expect(service.handleKey("c", { control: true }, false).kind).toBe("descend");
      expect(sink.runGroupRecursively).not.toHaveBeenCalled();
    });

    it("logs a failed dispatch without throwing", async () => {
      logBuffer.clear();
      sink.runAction.mockRejectedValue(new Error("launch failed"));

      expect(() => service.handleKey("a")).not.toThrow();

      await vi.waitFor(() => {
        expect(errorMessages()).toEqual(["Action failed"]);
      });
    });

    it("logs an action that throws synchronously", () => {
      logBuffer.clear();
      sink.runAction.mockImplementation(() => {
        throw new Error("sync failure");
      });

      expect(() => service.handleKey("a")).not.toThrow();
      expect(errorMessages()).toEqual(["Action failed"]);
    });
  });

  describe("keyDown", () => {
    it("moves the selection with arrows and space", () => {
      expect(service.keyDown("down")).toEqual({ kind: "command", command: "select-next" });
      expect(service.store.getState().selectedIndex).toBe(0);

      service.keyDown(" ");
      expect(service.store.getState().selectedIndex).toBe(1);

      service.keyDown("ArrowUp");
      service.keyDown("up");
      expect(service.store.getState().selectedIndex).toBe(2);
    });

    it("enters the selected group and goes back", () => {
      service.store.getState().setSelectedIndex(2);

      expect(service.keyDown("right")).toEqual({ kind: "command", command: "enter-group" });
      expect(service.store.getState().display).toBe("c");
      expect(service.store.getState().currentActions()).toHaveLength(2);

      service.keyDown("left");
      expect(service.store.getState().navigationPath).toEqual([]);
      expect(service.store.getState().selectedIndex).toBe(2);
    });

    it("executes the selected item on enter", () => {
      service.store.getState().setSelectedIndex(1);

      expect(service.keyDown("enter")).toEqual({ kind: "command", command: "execute-selected" });
      expect(sink.runAction).toHaveBeenCalledWith(child(config.root, 1));
    });

    it("clears on backspace and hides on escape or command-w", () => {
      service.handleKey("c");
      service.keyDown("backspace");
      expect(service.store.getState().navigationPath).toEqual([]);

      service.keyDown("escape");
      service.keyDown("w", { command: true });
      expect(window.hide).toHaveBeenCalledTimes(2);
    });

    it("passes other keys to the item lookup", () => {
      expect(service.keyDown("a").kind).toBe("run-action");
      expect(service.keyDown("w").kind).toBe("not-found");
    });
  });

  describe("navigateSequence", () => {
    it("stops at the first key that does not open a group", () => {
      const outcomes = service.navigateSequence(["c", "d", "e"], { execute: false });

      expect(outcomes.map((outcome) => outcome.kind)).toEqual(["descend", "preview"]);
    });

    it("stops at a key that matches nothing", () => {
      const outcomes = service.navigateSequence(["x", "a"]);

      expect(outcomes).toEqual([{ kind: "not-found", key: "x" }]);
      expect(sink.runAction).not.toHaveBeenCalled();
    });

    it("starts from the root each time", () => {
      service.handleKey("c");
      const outcomes = service.navigateSequence(["a"]);

      expect(outcomes[0]?.kind).toBe("run-action");
    });
  });

  describe("editing", () => {
    const newAction = () => createAction({ type: "command", key: "n", value: "echo n" });

    it("appends to the current group when nothing is selected", () => {
      expect(service.addAction(newAction())).toEqual([3]);
      expect(keys(config.root)).toEqual(["a", "b", "c", "n"]);
    });

    it("inserts after the selected action", () => {
      service.store.getState().setSelectedIndex(0);

      expect(service.addAction(newAction())).toEqual([1]);
      expect(keys(config.root)).toEqual(["a", "n", "b", "c"]);
    });

    it("adds into the selected group", () => {
      service.store.getState().setSelectedIndex(2);

      expect(service.addAction(newAction())).toEqual([2, 2]);
      expect(keys(groupChild(config.root, 2))).toEqual(["d", "e", "n"]);
    });

    it("adds inside the group being shown", () => {
      service.handleKey("c");

      expect(service.addAction(newAction())).toEqual([2, 2]);
      expect(service.store.getState().currentActions().map((node) => node.key)).toEqual([
        "d",
        "e",
        "n",
      ]);
    });

    it("falls back to the root when the shown group is gone", () => {
      service.handleKey("c");
      config.root = createGroup({ actions: [createAction({ type: "url", key: "z", value: "https://z.test" })] });

      expect(service.addAction(newAction())).toEqual([1]);
      expect(keys(config.root)).toEqual(["z", "n"]);
    });

    it("deletes the selected item and keeps a nearby selection", () => {
      service.store.getState().setSelectedIndex(1);

      expect(service.deleteSelectedItem()).toBe(true);
      expect(keys(config.root)).toEqual(["a", "c"]);
      expect(service.store.getState().selectedIndex).toBe(1);

      expect(service.deleteSelectedItem()).toBe(true);
      expect(keys(config.root)).toEqual(["a"]);
      expect(service.store.getState().selectedIndex).toBe(0);

      expect(service.deleteSelectedItem()).toBe(true);
      expect(keys(config.root)).toEqual([]);
      expect(service.store.getState().selectedIndex).toBeNull();
    });

    it("deletes nothing without a selection", () => {
      expect(service.deleteSelectedItem()).toBe(false);
      expect(keys(config.root)).toEqual(["a", "b", "c"]);
    });

    it("refuses to delete when the shown group is gone", () => {
      service.handleKey("c");
      service.store.getState().setSelectedIndex(0);
      const replaced = createGroup({ actions: [] });
      config.root = replaced;

      expect(service.deleteSelectedItem()).toBe(false);
      expect(config.root).toBe(replaced);
    });

    it("stops offering items of a group that was removed", () => {
      service.handleKey("c");
      config.root = createGroup({
        actions: [createAction({ type: "command", key: "a", value: "echo a" })],
      });

      expect(service.handleKey("d")).toEqual({ kind: "not-found", key: "d" });
      expect(sink.runAction).not.toHaveBeenCalled();

      const outcome = service.handleKey("a");
      expect(outcome.kind).toBe("run-action");
      expect(sink.runAction).toHaveBeenCalledWith(child(config.root, 0));
    });

    it("deletes the item shown at the selection after a reorder", () => {
      service.store.getState().setSelectedIndex(1);
      config.edit((root) => ({ ...root, actions: [child(root, 1), child(root, 0), child(root, 2)] }));

      expect(service.deleteSelectedItem()).toBe(true);
      expect(keys(config.root)).toEqual(["b", "c"]);
    });
  });

  describe("reload indicator", () => {
    it("shows the refresh state for the configured time", () => {
      vi.useFakeTimers();
      settings = { ...settings, reloadIndicatorMs: 500 };
      service.handleKey("c");

      bus.emit("config:did-reload", { ok: true });

      expect(window.show).toHaveBeenCalledTimes(1);
      expect(service.store.getState().isShowingRefreshState).toBe(true);
      expect(service.store.getState().navigationPath).toEqual([]);

      vi.advanceTimersByTime(499);
      expect(service.store.getState().isShowingRefreshState).toBe(true);

      vi.advanceTimersByTime(1);
      expect(service.store.getState().isShowingRefreshState).toBe(false);
      expect(window.hide).toHaveBeenCalledTimes(1);
    });

    it("stops listening after dispose", () => {
      service.dispose();

      bus.emit("config:did-reload", { ok: true });

      expect(window.show).not.toHaveBeenCalled();
    });
  });
});
