import type { ConfigNode } from "../types/config.js";
import { glyphFor } from "./keyMaps.js";

export interface KeyMatchOptions {
  /** When false (default), letter keys match regardless of case. */
  caseSensitive?: boolean;
}

/**
 * Canonical form used for comparing keys. Special keys collapse to their
 * glyph so that "enter", "Enter", "return" and "↵" compare equal. An absent
 * key normalizes to "" which never matches anything.
 */
export function normalizeKey(key: string | null | undefined, options: KeyMatchOptions = {}): string {
  if (!key) return "";
  const glyph = glyphFor(key);
  if (glyph) return glyph;
  return options.caseSensitive ? key : key.toLowerCase();
}

export function keysMatch(
  a: string | null | undefined,
  b: string | null | undefined,
  options: KeyMatchOptions = {}
): boolean {
  const left = normalizeKey(a, options);
  return left !== "" && left === normalizeKey(b, options);
}

/**
 * First child, in child order, whose key matches `key`. Later siblings with a
 * duplicate key are unreachable by keyboard.
 */
export function findMatchingChild<T extends ConfigNode>(
  children: readonly T[],
  key: string,
  options: KeyMatchOptions = {}
): T | undefined {
  const wanted = normalizeKey(key, options);
  if (wanted === "") return undefined;
  return children.find((child) => normalizeKey(child.key, options) === wanted);
}

export function findMatchingIndex(
  children: readonly ConfigNode[],
  key: string,
  options: KeyMatchOptions = {}
): number {
  const wanted = normalizeKey(key, options);
  if (wanted === "") return -1;
  return children.findIndex((child) => normalizeKey(child.key, options) === wanted);
}
