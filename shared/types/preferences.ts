import { z } from "zod";

/**
 * Which physical modifier keeps the menu open after an action (sticky) and
 * which one runs every action of a group at once.
 */
export const ModifierKeyConfigurationSchema = z.enum([
  "controlGroupOptionSticky",
  "optionGroupControlSticky",
]);
export type ModifierKeyConfiguration = z.infer<typeof ModifierKeyConfigurationSchema>;

export const DEFAULT_MODIFIER_KEY_CONFIGURATION: ModifierKeyConfiguration =
  "controlGroupOptionSticky";

export const DEFAULT_RELOAD_INDICATOR_MS = 900;

export const NavigationSettingsSchema = z.object({
  modifierKeyConfiguration: ModifierKeyConfigurationSchema.catch(
    DEFAULT_MODIFIER_KEY_CONFIGURATION
  ),
  caseSensitiveKeys: z.boolean().catch(false),
  reloadIndicatorMs: z.number().int().min(0).max(10_000).catch(DEFAULT_RELOAD_INDICATOR_MS),
});
export type NavigationSettings = z.infer<typeof NavigationSettingsSchema>;

export const DEFAULT_NAVIGATION_SETTINGS: NavigationSettings = {
  modifierKeyConfiguration: DEFAULT_MODIFIER_KEY_CONFIGURATION,
  caseSensitiveKeys: false,
  reloadIndicatorMs: DEFAULT_RELOAD_INDICATOR_MS,
};

export interface ModifierState {
  control?: boolean;
  option?: boolean;
  command?: boolean;
  shift?: boolean;
}
