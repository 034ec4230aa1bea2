import { afterEach, describe, expect, it, vi } from "vitest";
import type { MemoryAdapter } from "../adapters/memory.js";
import { ADDRESSES, NAMES, controllerOptions, memoryAdapter, recordEvents } from "../test/harness.js";
import { silentLogger } from "../util/logger.js";
import { LedController, type ControllerOptions } from "./controller.js";

describe("LedController", () => {
  let adapter: MemoryAdapter;
  let controller: LedController;
  let events: string[];

  function setup(overrides: Partial<ControllerOptions> = {}) {
    adapter = memoryAdapter();
    controller = new LedController(adapter, controllerOptions(overrides), silentLogger);
    events = recordEvents(controller.notifier);
    controller.start();
  }

  afterEach(async () => {
    await controller.stop();
  });

  it("connects to each device by its advertised name", async () => {
    setup();
    expect(await controller.connect("LEFT")).toBe(true);
    expect(await controller.connect("LEFT")).toBe(true);
    expect(controller.status().devices).toEqual([
      { deviceId: "LEFT", name: NAMES.LEFT, address: ADDRESSES.LEFT, connected: true },
      { deviceId: "RIGHT", name: NAMES.RIGHT, address: null, connected: false },
    ]);
    expect(events).toEqual(["connection LEFT true"]);
  });

  it("reports a device that is not advertising", async () => {
    setup({ deviceNames: { LEFT: "NOT_THERE", RIGHT: NAMES.RIGHT } });
    expect(await controller.connect("LEFT")).toBe(false);
    expect(events).toEqual(["status LEFT device was not found"]);
  });

  it("sends only the mode in automatic mode and only the color in fixed mode", async () => {
    setup();
    await controller.connect("LEFT");
    expect(await controller.applySettings("LEFT", { autoMode: true, color: { r: 9, g: 9, b: 9 } })).toBe(true);
    expect(await controller.applySettings("LEFT", { autoMode: false, color: { r: 10, g: 20, b: 30 } })).toBe(true);
    expect(await controller.applySettings("LEFT", { autoMode: false })).toBe(true);
    expect(adapter.wiresFor(NAMES.LEFT)).toEqual(["M:1", "C:10,20,30", "C:0,0,0"]);
  });

  it("applies settings to both devices at once, or reports that none is connected", async () => {
    setup();
    expect(await controller.applySettingsToBoth({ autoMode: true })).toBe(false);
    await controller.connect("LEFT");
    await controller.connect("RIGHT");
    expect(await controller.applySettingsToBoth({ autoMode: true })).toBe(true);
    expect(adapter.wiresFor(NAMES.LEFT)).toEqual(["M:1"]);
    expect(adapter.wiresFor(NAMES.RIGHT)).toEqual(["M:1"]);
  });

  it("queues fire-and-forget commands with completion callbacks", async () => {
    setup();
    await controller.connect("RIGHT");
    const outcomes: boolean[] = [];
    await new Promise<void>((resolve) => {
      controller.setMode("RIGHT", false, (ok) => outcomes.push(ok));
      controller.setHue("RIGHT", 200, (ok) => outcomes.push(ok));
      controller.setTransitionColor("RIGHT", { r: 1, g: 2, b: 3 }, 400, (ok) => {
        outcomes.push(ok);
        resolve();
      });
    });
    expect(outcomes).toEqual([true, true, true]);
    expect(adapter.wiresFor(NAMES.RIGHT)).toEqual(["M:0", "H:200", "T:1,2,3,400"]);
  });

  it("drops set-color while ambient mode owns the color", async () => {
    setup();
    await controller.connect("LEFT");
    await controller.setAmbientMode(true);
    const ok = await new Promise<boolean>((resolve) => controller.setRgbColor("LEFT", { r: 5, g: 5, b: 5 }, resolve));
    expect(ok).toBe(false);
    expect(await controller.updateAmbientColor({ r: 5, g: 5, b: 5 })).toBe(true);
    expect(adapter.wiresFor(NAMES.LEFT)).toEqual(["T:5,5,5,100"]);
    expect(controller.status().ambient).toBe(true);
    expect(events).toContain("status Ambient color mode on");
  });

  it("ends a running animation when ambient mode is turned on", async () => {
    setup();
    await controller.connect("LEFT");
    expect(await controller.startAnimation("hazard", { speed: 5 })).toBe(true);
    await controller.setAmbientMode(true);
    expect(controller.status().animation).toEqual({ kind: "idle" });
    expect(controller.status().ambient).toBe(true);
    expect(events.filter((e) => e.startsWith("animation"))).toEqual([
      "animationStarted hazard",
      "animationStopped hazard",
    ]);
  });

  it("shares one connect between concurrent callers for the same device", async () => {
    setup();
    const connect = vi.spyOn(adapter, "connect");
    expect(await Promise.all([controller.connect("LEFT"), controller.connect("LEFT")])).toEqual([true, true]);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(events).toEqual(["connection LEFT true"]);
  });

  it("detects a dropped link and reconnects on request", async () => {
    setup();
    await controller.connect("LEFT");
    adapter.dropLink(ADDRESSES.LEFT);
    expect(await controller.checkAllConnections()).toEqual({ LEFT: false, RIGHT: false });
    expect(controller.status().devices[0]).toEqual({
      deviceId: "LEFT",
      name: NAMES.LEFT,
      address: ADDRESSES.LEFT,
      connected: false,
    });
    expect(await controller.reconnect("LEFT")).toBe(true);
    expect(await controller.checkConnection("LEFT")).toBe(true);
    expect(events).toEqual(["connection LEFT true", "connection LEFT false", "connection LEFT true"]);
  });

  it("reconnects lost devices from the periodic health check", async () => {
    setup({ healthCheckMs: 30, autoReconnect: true });
    await controller.connect("LEFT");
    adapter.dropLink(ADDRESSES.LEFT);
    await vi.waitFor(
      () => expect(events).toEqual(["connection LEFT true", "connection LEFT false", "connection LEFT true"]),
      { timeout: 2000, interval: 10 }
    );
  });

  it("disconnects once", async () => {
    setup();
    await controller.connect("RIGHT");
    expect(await controller.disconnect("RIGHT")).toBe(true);
    expect(await controller.disconnect("RIGHT")).toBe(false);
    expect(await controller.sendCommand("RIGHT", { name: "hue", value: 1 })).toBe(false);
  });

  it("parks the devices on stop and refuses commands afterwards", async () => {
    setup();
    await controller.connect("LEFT");
    await controller.stop();
    expect(adapter.wiresFor(NAMES.LEFT)).toEqual(["C:1,1,1", "M:0"]);
    expect(await controller.sendCommand("LEFT", { name: "hue", value: 1 })).toBe(false);
    expect(() => controller.start()).toThrow("Controller has been stopped");
  });
});
