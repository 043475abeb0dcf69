import { EventEmitter } from "events";
import type { ActionType } from "../../shared/types/config.js";

export type EventCategory = "config" | "navigation" | "action";

export type ConflictResolution = "overwrite" | "cancel" | "reload";

export interface LeaderEventMap {
  "config:loaded": { path: string; checksum: string | null };
  "config:load-failed": { path: string; message: string };
  "config:saved": { path: string; checksum: string };
  "config:conflict": { path: string; resolution: ConflictResolution };
  "config:will-reload": void;
  "config:did-reload": { ok: boolean };
  "config:directory-reset": { from: string; to: string };
  "nav:not-found": { key: string };
  "action:dispatched": { uiid: string; type: ActionType; value: string };
}

export interface EventMetadata {
  category: EventCategory;
  description: string;
}

export const EVENT_META: Record<keyof LeaderEventMap, EventMetadata> = {
  "config:loaded": {
    category: "config",
    description: "Config file read and decoded",
  },
  "config:load-failed": {
    category: "config",
    description: "Config file could not be decoded; the error root is shown",
  },
  "config:saved": {
    category: "config",
    description: "Config file written",
  },
  "config:conflict": {
    category: "config",
    description: "File changed on disk since it was read; user picked a resolution",
  },
  "config:will-reload": {
    category: "config",
    description: "Explicit reload from disk is starting",
  },
  "config:did-reload": {
    category: "config",
    description: "Explicit reload from disk finished",
  },
  "config:directory-reset": {
    category: "config",
    description: "Configured directory was missing and the default is used instead",
  },
  "nav:not-found": {
    category: "navigation",
    description: "Key pressed that matches nothing in the current group",
  },
  "action:dispatched": {
    category: "action",
    description: "Action handed to the runner",
  },
};

export function getEventCategory(event: keyof LeaderEventMap): EventCategory {
  return EVENT_META[event].category;
}

type Listener<K extends keyof LeaderEventMap> = LeaderEventMap[K] extends void
  ? () => void
  : (payload: LeaderEventMap[K]) => void;

export class TypedEventBus {
  private bus = new EventEmitter();

  private debugEnabled = process.env.LEADER_TREE_DEBUG_EVENTS === "1";

  constructor() {
    this.bus.setMaxListeners(100);
  }

  on<K extends keyof LeaderEventMap>(event: K, listener: Listener<K>): () => void {
    this.bus.on(event, listener);
    return () => {
      this.bus.off(event, listener);
    };
  }

  off<K extends keyof LeaderEventMap>(event: K, listener: Listener<K>): void {
    this.bus.off(event, listener);
  }

  emit<K extends keyof LeaderEventMap>(
    event: K,
    ...args: LeaderEventMap[K] extends void ? [] : [LeaderEventMap[K]]
  ): void {
    if (this.debugEnabled) {
      console.log("[events]", event, args[0]);
    }
    this.bus.emit(event, ...args);
  }

  removeAllListeners(): void {
    this.bus.removeAllListeners();
  }
}

export const events = new TypedEventBus();
