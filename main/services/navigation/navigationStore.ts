import { createStore, type StateCreator, type StoreApi } from "zustand/vanilla";
import type { ConfigNode, GroupNode } from "../../../shared/types/config.js";
import { resolveGroupPath } from "../../../shared/utils/configTree.js";
import { logWarn } from "../../utils/logger.js";

export interface NavigationState {
  /** Groups entered from the root, outermost first */
  navigationPath: GroupNode[];
  selectedIndex: number | null;
  /** Selection of each enclosing level, restored by goBack */
  selectionHistory: Array<number | null>;
  /** Key shown for the current level, null at the root */
  display: string | null;
  isShowingRefreshState: boolean;

  currentGroup: () => GroupNode | null;
  currentActions: () => ConfigNode[];
  selectedItem: () => ConfigNode | null;
  navigateToGroup: (group: GroupNode) => void;
  goBack: () => boolean;
  moveSelection: (delta: number) => void;
  setSelectedIndex: (index: number | null) => void;
  setDisplay: (display: string | null) => void;
  setShowingRefreshState: (showing: boolean) => void;
  clear: () => void;
}

export type NavigationStore = StoreApi<NavigationState>;

const initialState = {
  navigationPath: [],
  selectedIndex: null,
  selectionHistory: [],
  display: null,
  isShowingRefreshState: false,
} satisfies Partial<NavigationState>;

/**
 * Selection and traversal state for the menu. The path holds snapshots of the
 * groups entered; `currentGroup` looks them up again in the tree returned by
 * `getRoot`, so edits made since entering are visible. A path that no longer
 * resolves shows the root.
 */
export function createNavigationStore(getRoot: () => GroupNode | null): NavigationStore {
  const creator: StateCreator<NavigationState> = (set, get) => ({
    ...initialState,

    currentGroup: () => {
      const root = getRoot();
      if (!root) return null;
      const { navigationPath } = get();
      if (navigationPath.length === 0) return root;
      const resolved = resolveGroupPath(root, navigationPath);
      if (resolved) return resolved.group;
      logWarn("Navigation path no longer exists; showing the root group", {
        depth: navigationPath.length,
      });
      return root;
    },

    currentActions: () => get().currentGroup()?.actions ?? [],

    selectedItem: () => {
      const { selectedIndex } = get();
      if (selectedIndex === null || selectedIndex < 0) return null;
      const actions = get().currentActions();
      if (selectedIndex >= actions.length) return null;
      return actions[selectedIndex] ?? null;
    },

    navigateToGroup: (group) =>
      set((state) => ({
        selectionHistory: [...state.selectionHistory, state.selectedIndex],
        navigationPath: [...state.navigationPath, group],
        selectedIndex: null,
      })),

    goBack: () => {
      const { navigationPath, selectionHistory } = get();
      if (navigationPath.length === 0) return false;

      const nextPath = navigationPath.slice(0, -1);
      const restored =
        selectionHistory.length > 0 ? (selectionHistory[selectionHistory.length - 1] ?? null) : null;

      set({
        navigationPath: nextPath,
        selectionHistory: selectionHistory.slice(0, -1),
        selectedIndex: restored,
        display: nextPath[nextPath.length - 1]?.key ?? null,
      });
      return true;
    },

    moveSelection: (delta) => {
      const count = get().currentActions().length;
      if (count === 0 || delta === 0) return;

      const { selectedIndex } = get();
      if (selectedIndex === null || selectedIndex < 0 || selectedIndex >= count) {
        set({ selectedIndex: delta > 0 ? 0 : count - 1 });
        return;
      }
      set({ selectedIndex: (((selectedIndex + delta) % count) + count) % count });
    },

    setSelectedIndex: (index) => set({ selectedIndex: index }),

    setDisplay: (display) => set({ display }),

    setShowingRefreshState: (showing) => set({ isShowingRefreshState: showing }),

    clear: () => set({ ...initialState }),
  });

  return createStore<NavigationState>()(creator);
}
