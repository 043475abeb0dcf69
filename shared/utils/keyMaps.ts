/**
 * Special keys that have a display glyph and a text name.
 *
 * The config file always stores the text name ("enter"), menus show the glyph
 * ("↵"). Aliases cover DOM `KeyboardEvent.key` values and common spellings.
 */

interface SpecialKey {
  text: string;
  glyph: string;
  aliases: string[];
}

const SPECIAL_KEYS: SpecialKey[] = [
  { text: "enter", glyph: "↵", aliases: ["return"] },
  { text: "tab", glyph: "⇥", aliases: [] },
  { text: "space", glyph: "␣", aliases: [" ", "spacebar"] },
  { text: "backspace", glyph: "⌫", aliases: [] },
  { text: "delete", glyph: "⌦", aliases: ["del", "forwarddelete"] },
  { text: "escape", glyph: "⎋", aliases: ["esc"] },
  { text: "up", glyph: "↑", aliases: ["arrowup"] },
  { text: "down", glyph: "↓", aliases: ["arrowdown"] },
  { text: "left", glyph: "←", aliases: ["arrowleft"] },
  { text: "right", glyph: "→", aliases: ["arrowright"] },
  { text: "home", glyph: "↖", aliases: [] },
  { text: "end", glyph: "↘", aliases: [] },
  { text: "pageup", glyph: "⇞", aliases: [] },
  { text: "pagedown", glyph: "⇟", aliases: [] },
];

const byName = new Map<string, SpecialKey>();
const byGlyph = new Map<string, SpecialKey>();

for (const entry of SPECIAL_KEYS) {
  byName.set(entry.text, entry);
  byGlyph.set(entry.glyph, entry);
  for (const alias of entry.aliases) {
    byName.set(alias, entry);
  }
}

function lookup(key: string): SpecialKey | undefined {
  return byGlyph.get(key) ?? byName.get(key) ?? byName.get(key.toLowerCase());
}

/** Glyph for a special key given by name, alias or glyph. */
export function glyphFor(key: string): string | undefined {
  return lookup(key)?.glyph;
}

/** Text name for a special key given by name, alias or glyph. */
export function textFor(key: string): string | undefined {
  return lookup(key)?.text;
}

export function isSpecialKey(key: string): boolean {
  return lookup(key) !== undefined;
}

/** Form written to the config file: text names for special keys, anything else unchanged. */
export function toStoredKey(key: string): string {
  return textFor(key) ?? key;
}

/** Form shown in menus: glyphs for special keys, anything else unchanged. */
export function toDisplayKey(key: string): string {
  return glyphFor(key) ?? key;
}
