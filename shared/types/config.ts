/**
 * Action Tree Types
 *
 * The user's leader-key configuration: a tree of groups (submenus) whose leaves
 * are actions addressed by a single key per level. Persisted as JSON in
 * `config.json`; the schemas below describe that persisted form one node at a
 * time, the interfaces describe the in-memory tree.
 */

import { z } from "zod";

export const ActionTypeSchema = z.enum(["application", "url", "command", "folder", "file", "script"]);
export type ActionType = z.infer<typeof ActionTypeSchema>;

export const NodeTypeSchema = z.enum([
  "group",
  "application",
  "url",
  "command",
  "folder",
  "file",
  "script",
]);
export type NodeType = z.infer<typeof NodeTypeSchema>;

export const ScriptArgumentSchema = z.object({
  /** Shown when asking for the value */
  name: z.string(),
  defaultValue: z.string().nullish(),
});

export interface ScriptArgument {
  name: string;
  defaultValue?: string;
}

/**
 * Fields of a persisted action. Optional strings may be missing or null.
 */
export const PersistedActionSchema = z.object({
  type: ActionTypeSchema,
  key: z.string().nullish(),
  label: z.string().nullish(),
  /** Application path, URL, shell command, path, or script path depending on type */
  value: z.string(),
  iconPath: z.string().nullish(),
  /** Application used to open a url, file or folder instead of the system default */
  openWith: z.string().nullish(),
  arguments: z.array(ScriptArgumentSchema).nullish(),
});

/**
 * Fields of a persisted group. Children are decoded one by one so that errors
 * can report where in the tree they occurred.
 */
export const PersistedGroupSchema = z.object({
  type: z.literal("group"),
  key: z.string().nullish(),
  label: z.string().nullish(),
  iconPath: z.string().nullish(),
  actions: z.array(z.unknown()),
});

/** The root object may omit its type. */
export const PersistedRootSchema = PersistedGroupSchema.extend({
  type: z.literal("group").optional(),
});

export interface ActionNode {
  /** Process-local identity. Never persisted, ignored by equality. */
  uiid: string;
  type: ActionType;
  key?: string;
  label?: string;
  value: string;
  iconPath?: string;
  openWith?: string;
  arguments?: ScriptArgument[];
}

export interface GroupNode {
  uiid: string;
  type: "group";
  key?: string;
  label?: string;
  iconPath?: string;
  actions: ConfigNode[];
}

export type ConfigNode = ActionNode | GroupNode;

/** Sequence of child indices from the root; the root itself is `[]`. */
export type NodePath = number[];

export type ValidationErrorType =
  | "emptyKey"
  | "nonSingleCharacterKey"
  | "duplicateKey"
  | "missingValue"
  | "invalidUrl";

export interface ValidationError {
  path: NodePath;
  type: ValidationErrorType;
  message: string;
}

export interface ValidationIndex {
  validationErrors: ValidationError[];
  /** First error per node, keyed by the `/`-joined path */
  validationErrorsByPath: Record<string, ValidationErrorType>;
}

export type ValidateConfig = (root: GroupNode) => ValidationError[];
