import type {
  ConfigNode,
  GroupNode,
  NodePath,
  ValidationError,
  ValidationErrorType,
  ValidationIndex,
} from "../types/config.js";
import { isSpecialKey } from "./keyMaps.js";
import { normalizeKey, type KeyMatchOptions } from "./keyMatcher.js";
import { pathKey } from "./configTree.js";

interface Frame {
  node: ConfigNode;
  path: NodePath;
  duplicate: boolean;
}

function isSingleCharacter(key: string): boolean {
  return Array.from(key).length === 1;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol.length > 1;
  } catch {
    return false;
  }
}

function keyError(node: ConfigNode, duplicate: boolean): ValidationError["type"] | null {
  if (!node.key) return "emptyKey";
  if (!isSingleCharacter(node.key) && !isSpecialKey(node.key)) return "nonSingleCharacterKey";
  if (duplicate) return "duplicateKey";
  return null;
}

function keyMessage(type: ValidationErrorType, key: string | undefined): string {
  switch (type) {
    case "emptyKey":
      return "Key is empty";
    case "nonSingleCharacterKey":
      return `Key "${key ?? ""}" must be a single character`;
    case "duplicateKey":
      return `Key "${key ?? ""}" is used by more than one item in this group`;
    default:
      return type;
  }
}

function duplicatedKeys(group: GroupNode, options: KeyMatchOptions): Set<string> {
  const counts = new Map<string, number>();
  for (const child of group.actions) {
    const normalized = normalizeKey(child.key, options);
    if (normalized === "") continue;
    counts.set(normalized, (counts.get(normalized) ?? 0) + 1);
  }
  const result = new Set<string>();
  for (const [key, count] of counts) {
    if (count > 1) result.add(key);
  }
  return result;
}

/**
 * Checks every node below `root` and returns the problems found, in tree
 * order. Never throws; uses an explicit stack so depth is unbounded.
 */
export function validateConfig(root: GroupNode, options: KeyMatchOptions = {}): ValidationError[] {
  const errors: ValidationError[] = [];
  const stack: Frame[] = [{ node: root, path: [], duplicate: false }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, path } = frame;

    if (path.length > 0) {
      const type = keyError(node, frame.duplicate);
      if (type) {
        errors.push({ path, type, message: keyMessage(type, node.key) });
      }
    }

    if (node.type === "group") {
      const duplicates = duplicatedKeys(node, options);
      for (let i = node.actions.length - 1; i >= 0; i--) {
        const child = node.actions[i];
        if (!child) continue;
        stack.push({
          node: child,
          path: [...path, i],
          duplicate: duplicates.has(normalizeKey(child.key, options)),
        });
      }
      continue;
    }

    if (node.value.trim() === "") {
      errors.push({ path, type: "missingValue", message: "Action has no value" });
    } else if (node.type === "url" && !isAbsoluteUrl(node.value)) {
      errors.push({
        path,
        type: "invalidUrl",
        message: `"${node.value}" is not a valid URL`,
      });
    }
  }

  return errors;
}

/** Keeps the first error reported for each node. */
export function indexValidationErrors(errors: ValidationError[]): ValidationIndex {
  const validationErrorsByPath: Record<string, ValidationErrorType> = {};
  for (const error of errors) {
    const key = pathKey(error.path);
    if (!(key in validationErrorsByPath)) {
      validationErrorsByPath[key] = error.type;
    }
  }
  return { validationErrors: errors, validationErrorsByPath };
}

export function validationErrorAt(
  byPath: Record<string, ValidationErrorType>,
  path: NodePath
): ValidationErrorType | undefined {
  return byPath[pathKey(path)];
}
