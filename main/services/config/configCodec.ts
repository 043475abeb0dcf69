/**
 * JSON form of the action tree.
 *
 * Encoding is deterministic: object keys are sorted, indentation is two
 * spaces, the text ends with a newline, special keys are written by name and
 * empty optional fields are left out. Two trees are equal exactly when they
 * encode to the same text.
 */

import { z } from "zod";
import {
  NodeTypeSchema,
  PersistedActionSchema,
  PersistedGroupSchema,
  PersistedRootSchema,
  type ActionNode,
  type ConfigNode,
  type GroupNode,
  type ScriptArgument,
} from "../../../shared/types/config.js";
import { createAction, createGroup } from "../../../shared/utils/configTree.js";
import { toStoredKey } from "../../../shared/utils/keyMaps.js";
import { ConfigDecodeError, toError } from "../../utils/errorTypes.js";

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
type JsonObject = { [key: string]: JsonValue };

const NodeTypeProbeSchema = z.object({ type: NodeTypeSchema });

function optionalString(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

function setIfPresent(target: JsonObject, field: string, value: string | undefined): void {
  if (value) target[field] = value;
}

function encodeArguments(args: ScriptArgument[]): JsonObject[] {
  return args.map((arg) => {
    const encoded: JsonObject = { name: arg.name };
    if (arg.defaultValue !== undefined) encoded.defaultValue = arg.defaultValue;
    return encoded;
  });
}

/** Plain JSON value for `node`, without `uiid`. */
export function toPersisted(node: ConfigNode): JsonObject {
  const result: JsonObject = { type: node.type };
  if (node.key) result.key = toStoredKey(node.key);
  setIfPresent(result, "label", node.label);
  setIfPresent(result, "iconPath", node.iconPath);

  if (node.type === "group") {
    result.actions = node.actions.map(toPersisted);
    return result;
  }

  result.value = node.value;
  setIfPresent(result, "openWith", node.openWith);
  if (node.arguments && node.arguments.length > 0) {
    result.arguments = encodeArguments(node.arguments);
  }
  return result;
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      if (child !== undefined) sorted[key] = sortKeys(child);
    }
    return sorted;
  }
  return value;
}

export function encodeConfig(root: GroupNode): string {
  return `${JSON.stringify(sortKeys(toPersisted(root)), null, 2)}\n`;
}

export function configNodesEqual(a: ConfigNode, b: ConfigNode): boolean {
  return JSON.stringify(sortKeys(toPersisted(a))) === JSON.stringify(sortKeys(toPersisted(b)));
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid value";
  const field = issue.path.join(".");
  return field ? `${field}: ${issue.message}` : issue.message;
}

function decodeArguments(
  args: Array<{ name: string; defaultValue?: string | null }> | null | undefined
): ScriptArgument[] | undefined {
  if (!args || args.length === 0) return undefined;
  return args.map((arg) => ({
    name: arg.name,
    defaultValue: arg.defaultValue ?? undefined,
  }));
}

function decodeAction(raw: unknown, nodePath: string): ActionNode {
  const parsed = PersistedActionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigDecodeError(`${nodePath}: ${describeIssue(parsed.error)}`, nodePath);
  }
  const data = parsed.data;
  return createAction({
    type: data.type,
    key: optionalString(data.key),
    label: optionalString(data.label),
    value: data.value,
    iconPath: optionalString(data.iconPath),
    openWith: optionalString(data.openWith),
    arguments: decodeArguments(data.arguments),
  });
}

function decodeChildren(children: unknown[], nodePath: string): ConfigNode[] {
  return children.map((child, index) => decodeNode(child, `${nodePath}.actions[${index}]`));
}

function decodeNode(raw: unknown, nodePath: string): ConfigNode {
  const probe = NodeTypeProbeSchema.safeParse(raw);
  if (!probe.success) {
    throw new ConfigDecodeError(`${nodePath}: ${describeIssue(probe.error)}`, nodePath);
  }
  if (probe.data.type !== "group") {
    return decodeAction(raw, nodePath);
  }

  const parsed = PersistedGroupSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigDecodeError(`${nodePath}: ${describeIssue(parsed.error)}`, nodePath);
  }
  return createGroup({
    key: optionalString(parsed.data.key),
    label: optionalString(parsed.data.label),
    iconPath: optionalString(parsed.data.iconPath),
    actions: decodeChildren(parsed.data.actions, nodePath),
  });
}

/** Decodes an already parsed JSON value into a root group with fresh `uiid`s. */
export function decodeConfigValue(value: unknown): GroupNode {
  const parsed = PersistedRootSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigDecodeError(`root: ${describeIssue(parsed.error)}`, "root");
  }
  return createGroup({
    key: optionalString(parsed.data.key),
    label: optionalString(parsed.data.label),
    iconPath: optionalString(parsed.data.iconPath),
    actions: decodeChildren(parsed.data.actions, "root"),
  });
}

/**
 * Parses config file text. Throws `ConfigDecodeError` naming the offending
 * node when the text is not JSON or not an action tree.
 */
export function decodeConfig(text: string): GroupNode {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigDecodeError(`Config file is not valid JSON: ${cause.message}`, "root", cause);
  }
  return decodeConfigValue(value);
}
