import { describe, it, expect, vi } from "vitest";
import { EVENT_META, TypedEventBus, getEventCategory } from "../events.js";

describe("TypedEventBus", () => {
  it("delivers payloads to listeners until unsubscribed", () => {
    const bus = new TypedEventBus();
    const listener = vi.fn();

    const unsubscribe = bus.on("config:saved", listener);
    bus.emit("config:saved", { path: "/tmp/config.json", checksum: "abc" });
    unsubscribe();
    bus.emit("config:saved", { path: "/tmp/config.json", checksum: "def" });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ path: "/tmp/config.json", checksum: "abc" });
  });

  it("emits events without a payload", () => {
    const bus = new TypedEventBus();
    const listener = vi.fn();
    bus.on("config:will-reload", listener);

    bus.emit("config:will-reload");

    expect(listener).toHaveBeenCalledWith();
  });

  it("removes listeners with off and removeAllListeners", () => {
    const bus = new TypedEventBus();
    const first = vi.fn();
    const second = vi.fn();
    bus.on("nav:not-found", first);
    bus.on("nav:not-found", second);

    bus.off("nav:not-found", first);
    bus.emit("nav:not-found", { key: "x" });
    bus.removeAllListeners();
    bus.emit("nav:not-found", { key: "y" });

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("categorizes every event", () => {
    expect(getEventCategory("nav:not-found")).toBe("navigation");
    expect(getEventCategory("action:dispatched")).toBe("action");
    expect(Object.values(EVENT_META).every((meta) => meta.description.length > 0)).toBe(true);
  });
});
