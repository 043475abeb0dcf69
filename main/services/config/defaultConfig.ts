import type { GroupNode } from "../../../shared/types/config.js";
import { decodeConfigValue, encodeConfig } from "./configCodec.js";

/** Written to `config.json` when no file exists yet. */
const DEFAULT_CONFIG_DOCUMENT = {
  type: "group",
  actions: [
    { key: "t", type: "application", value: "/System/Applications/Utilities/Terminal.app" },
    { key: "w", type: "url", label: "Wikipedia", value: "https://en.wikipedia.org" },
    {
      key: "o",
      type: "group",
      label: "Open",
      actions: [
        { key: "s", type: "application", value: "/Applications/Safari.app" },
        { key: "h", type: "folder", label: "Home", value: "~" },
        { key: "d", type: "folder", label: "Downloads", value: "~/Downloads" },
      ],
    },
    {
      key: "r",
      type: "group",
      label: "Run",
      actions: [
        { key: "u", type: "command", label: "Uptime", value: "uptime" },
        { key: "l", type: "command", label: "List home", value: "ls -la ~" },
      ],
    },
  ],
} as const;

export function createDefaultRoot(): GroupNode {
  return decodeConfigValue(DEFAULT_CONFIG_DOCUMENT);
}

export function defaultConfigText(): string {
  return encodeConfig(createDefaultRoot());
}
