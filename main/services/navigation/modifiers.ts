import type {
  ModifierKeyConfiguration,
  ModifierState,
} from "../../../shared/types/preferences.js";

/** Modifier that keeps the menu open after running an action. */
export function isSticky(modifiers: ModifierState, config: ModifierKeyConfiguration): boolean {
  return config === "controlGroupOptionSticky"
    ? Boolean(modifiers.option)
    : Boolean(modifiers.control);
}

/** Modifier that runs every action below a group instead of opening it. */
export function isGroupRun(modifiers: ModifierState, config: ModifierKeyConfiguration): boolean {
  return config === "controlGroupOptionSticky"
    ? Boolean(modifiers.control)
    : Boolean(modifiers.option);
}
