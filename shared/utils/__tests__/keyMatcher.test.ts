import { describe, it, expect } from "vitest";
import { createAction, createGroup } from "../configTree.js";
import { findMatchingChild, findMatchingIndex, keysMatch, normalizeKey } from "../keyMatcher.js";

describe("keyMatcher", () => {
  describe("normalizeKey", () => {
    it("collapses special keys to their glyph", () => {
      expect(normalizeKey("enter")).toBe("↵");
      expect(normalizeKey("Return")).toBe("↵");
      expect(normalizeKey("↵")).toBe("↵");
    });

    it("lower-cases letters unless case sensitive", () => {
      expect(normalizeKey("A")).toBe("a");
      expect(normalizeKey("A", { caseSensitive: true })).toBe("A");
    });

    it("normalizes absent keys to an empty string", () => {
      expect(normalizeKey(undefined)).toBe("");
      expect(normalizeKey(null)).toBe("");
      expect(normalizeKey("")).toBe("");
    });
  });

  describe("keysMatch", () => {
    it("matches equivalent spellings of the same key", () => {
      expect(keysMatch("enter", "↵")).toBe(true);
      expect(keysMatch("B", "b")).toBe(true);
      expect(keysMatch("B", "b", { caseSensitive: true })).toBe(false);
    });

    it("never matches absent keys", () => {
      expect(keysMatch(undefined, undefined)).toBe(false);
      expect(keysMatch("", "")).toBe(false);
    });
  });

  describe("findMatchingChild", () => {
    const first = createAction({ type: "command", key: "a", label: "first", value: "echo 1" });
    const second = createAction({ type: "command", key: "A", label: "second", value: "echo 2" });
    const enterGroup = createGroup({ key: "enter", label: "on enter" });
    const unkeyed = createAction({ type: "command", value: "echo none" });
    const children = [unkeyed, first, second, enterGroup];

    it("returns the first child in order when keys collide", () => {
      expect(findMatchingChild(children, "a")).toBe(first);
      expect(findMatchingChild(children, "A")).toBe(first);
    });

    it("respects case when asked to", () => {
      expect(findMatchingChild(children, "A", { caseSensitive: true })).toBe(second);
      expect(findMatchingChild(children, "a", { caseSensitive: true })).toBe(first);
    });

    it("matches special keys by glyph or name", () => {
      expect(findMatchingChild(children, "↵")).toBe(enterGroup);
      expect(findMatchingChild(children, "Enter")).toBe(enterGroup);
    });

    it("returns undefined when nothing matches", () => {
      expect(findMatchingChild(children, "z")).toBeUndefined();
      expect(findMatchingChild(children, "")).toBeUndefined();
      expect(findMatchingChild([], "a")).toBeUndefined();
    });

    it("reports the index of the match", () => {
      expect(findMatchingIndex(children, "a")).toBe(1);
      expect(findMatchingIndex(children, "return")).toBe(3);
      expect(findMatchingIndex(children, "z")).toBe(-1);
    });
  });
});
