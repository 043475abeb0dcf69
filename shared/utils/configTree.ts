/**
 * Construction, lookup and immutable updates of the action tree.
 *
 * Every update returns a new root; nodes off the updated path are shared with
 * the previous tree and keep their `uiid`.
 */

import { nanoid } from "nanoid";
import type {
  ActionNode,
  ActionType,
  ConfigNode,
  GroupNode,
  NodePath,
  ScriptArgument,
} from "../types/config.js";

export const ERROR_ROOT_KEY = "🚫";
export const ERROR_ROOT_LABEL = "Config error";

export interface ActionFields {
  type: ActionType;
  value: string;
  key?: string;
  label?: string;
  iconPath?: string;
  openWith?: string;
  arguments?: ScriptArgument[];
}

export interface GroupFields {
  key?: string;
  label?: string;
  iconPath?: string;
  actions?: ConfigNode[];
}

export function createAction(fields: ActionFields): ActionNode {
  return { uiid: nanoid(), ...fields };
}

export function createGroup(fields: GroupFields = {}): GroupNode {
  const { actions = [], ...rest } = fields;
  return { uiid: nanoid(), type: "group", ...rest, actions };
}

export function createEmptyRoot(): GroupNode {
  return createGroup();
}

/** Root shown while the config file cannot be decoded. */
export function createErrorRoot(): GroupNode {
  return createGroup({ key: ERROR_ROOT_KEY, label: ERROR_ROOT_LABEL });
}

export function isGroup(node: ConfigNode): node is GroupNode {
  return node.type === "group";
}

export function isAction(node: ConfigNode): node is ActionNode {
  return node.type !== "group";
}

export function displayName(node: ConfigNode): string {
  if (node.label) return node.label;
  if (isAction(node)) return node.value;
  return node.key ?? "";
}

/**
 * Groups are the same logical node when key and label agree. A missing field
 * equals an empty one.
 */
export function groupsMatch(a: GroupNode, b: GroupNode): boolean {
  return (a.key ?? "") === (b.key ?? "") && (a.label ?? "") === (b.label ?? "");
}

/** Groups with neither key nor label match every other such group. */
export function isAmbiguousGroup(group: GroupNode): boolean {
  return !group.key && !group.label;
}

export interface ResolvedGroupPath {
  group: GroupNode;
  /** Child indices from the root down to `group` */
  indices: NodePath;
  /** True when some step matched a group without key and label */
  ambiguous: boolean;
}

/**
 * Finds the group reached by following `path` from `root`, matching each level
 * by key and label among the current children. The first matching sibling
 * wins. Returns null when a level has no match.
 */
export function resolveGroupPath(
  root: GroupNode,
  path: readonly GroupNode[]
): ResolvedGroupPath | null {
  let group = root;
  const indices: number[] = [];
  let ambiguous = false;

  for (const wanted of path) {
    const index = group.actions.findIndex(
      (child) => isGroup(child) && groupsMatch(child, wanted)
    );
    if (index === -1) return null;
    const next = group.actions[index];
    if (!next || !isGroup(next)) return null;
    if (isAmbiguousGroup(wanted)) ambiguous = true;
    indices.push(index);
    group = next;
  }

  return { group, indices, ambiguous };
}

export function nodeAtPath(root: GroupNode, path: NodePath): ConfigNode | undefined {
  let node: ConfigNode = root;
  for (const index of path) {
    if (!isGroup(node)) return undefined;
    const child: ConfigNode | undefined = node.actions[index];
    if (!child) return undefined;
    node = child;
  }
  return node;
}

export function groupAtPath(root: GroupNode, path: NodePath): GroupNode | undefined {
  const node = nodeAtPath(root, path);
  return node && isGroup(node) ? node : undefined;
}

/**
 * Rebuilds the spine from `root` to the group at `path` with `update` applied
 * to that group. Throws when `path` does not lead to a group.
 */
export function updateGroupAt(
  root: GroupNode,
  path: NodePath,
  update: (group: GroupNode) => GroupNode
): GroupNode {
  const [head, ...rest] = path;
  if (head === undefined) {
    return update(root);
  }
  const child = root.actions[head];
  if (!child || !isGroup(child)) {
    throw new RangeError(`No group at index ${head}`);
  }
  const actions = root.actions.slice();
  actions[head] = updateGroupAt(child, rest, update);
  return { ...root, actions };
}

export function appendChild(root: GroupNode, groupPath: NodePath, child: ConfigNode): GroupNode {
  return updateGroupAt(root, groupPath, (group) => ({
    ...group,
    actions: [...group.actions, child],
  }));
}

export function insertAfter(
  root: GroupNode,
  groupPath: NodePath,
  index: number,
  child: ConfigNode
): GroupNode {
  return updateGroupAt(root, groupPath, (group) => {
    const at = Math.min(Math.max(index + 1, 0), group.actions.length);
    const actions = group.actions.slice();
    actions.splice(at, 0, child);
    return { ...group, actions };
  });
}

export function removeChild(root: GroupNode, groupPath: NodePath, index: number): GroupNode {
  return updateGroupAt(root, groupPath, (group) => {
    if (index < 0 || index >= group.actions.length) {
      throw new RangeError(`No child at index ${index}`);
    }
    return { ...group, actions: group.actions.filter((_, i) => i !== index) };
  });
}

/** Replaces the node at `path`. An empty path replaces the root, which must stay a group. */
export function replaceSubtree(root: GroupNode, path: NodePath, node: ConfigNode): GroupNode {
  if (path.length === 0) {
    if (!isGroup(node)) {
      throw new TypeError("Root must be a group");
    }
    return node;
  }
  const parentPath = path.slice(0, -1);
  const index = path[path.length - 1] ?? 0;
  return updateGroupAt(root, parentPath, (group) => {
    if (index < 0 || index >= group.actions.length) {
      throw new RangeError(`No child at index ${index}`);
    }
    const actions = group.actions.slice();
    actions[index] = node;
    return { ...group, actions };
  });
}

/** Every action below `group`, depth-first in child order. */
export function collectActions(group: GroupNode): ActionNode[] {
  const result: ActionNode[] = [];
  const stack: ConfigNode[] = [...group.actions].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (isGroup(node)) {
      for (let i = node.actions.length - 1; i >= 0; i--) {
        const child = node.actions[i];
        if (child) stack.push(child);
      }
    } else {
      result.push(node);
    }
  }
  return result;
}

export function pathKey(path: NodePath): string {
  return path.join("/");
}
