import { afterEach, describe, expect, it } from "vitest";
import { delay } from "../util/async.js";
import { createCommand } from "../util/codec.js";
import { ADDRESSES, NAMES, type Rig, createRig } from "../test/harness.js";

describe("CommandDispatcher", () => {
  let rig: Rig;

  afterEach(async () => {
    await rig.stop();
  });

  it("writes one device's commands in enqueue order", async () => {
    rig = createRig();
    await rig.connect("LEFT");
    const results = await Promise.all([
      rig.dispatcher.send("LEFT", { name: "mode", value: true }),
      rig.dispatcher.send("LEFT", { name: "color", value: { r: 1, g: 2, b: 3 } }),
      rig.dispatcher.send("LEFT", { name: "hue", value: 5 }),
    ]);
    expect(results).toEqual([true, true, true]);
    expect(rig.adapter.wiresFor(NAMES.LEFT)).toEqual(["M:1", "C:1,2,3", "H:5"]);
    expect(rig.events).toEqual([
      "connection LEFT true",
      "command LEFT true Sent M:1",
      "command LEFT true Sent C:1,2,3",
      "command LEFT true Sent H:5",
    ]);
  });

  it("completes with false and writes nothing for a disconnected device", async () => {
    rig = createRig();
    await rig.connect("LEFT");
    expect(await rig.dispatcher.send("RIGHT", { name: "mode", value: false })).toBe(false);
    expect(rig.adapter.writes).toEqual([]);
    expect(rig.events).toEqual(["connection LEFT true"]);
  });

  it("drops plain color commands while ambient mode is on", async () => {
    rig = createRig();
    await rig.connect("LEFT");
    rig.ambient.setEnabled(true);
    expect(await rig.dispatcher.send("LEFT", { name: "color", value: { r: 9, g: 9, b: 9 } })).toBe(false);
    expect(await rig.dispatcher.send("LEFT", { name: "mode", value: false })).toBe(true);
    expect(await rig.dispatcher.send("LEFT", { name: "transition", value: { r: 9, g: 9, b: 9, durationMs: 50 } })).toBe(
      true
    );
    expect(rig.adapter.wiresFor(NAMES.LEFT)).toEqual(["M:0", "T:9,9,9,50"]);
  });

  it("marks the device disconnected when a write times out", async () => {
    rig = createRig({ timeoutMs: 50 });
    await rig.connect("LEFT", "RIGHT");
    rig.adapter.hangWrites(ADDRESSES.LEFT);
    expect(await rig.dispatcher.send("LEFT", { name: "mode", value: true })).toBe(false);
    expect(rig.connections.isConnected("LEFT")).toBe(false);
    expect(rig.connections.isConnected("RIGHT")).toBe(true);
    expect(rig.connections.address("LEFT")).toBe(ADDRESSES.LEFT);
    expect(rig.events.slice(2)).toEqual([
      "command LEFT false Timed out: M:1",
      "connection LEFT false",
      "failure CommandTimeoutError",
    ]);

    // The queue keeps serving the other device.
    expect(await rig.dispatcher.send("RIGHT", { name: "hue", value: 7 })).toBe(true);
    expect(rig.adapter.wiresFor(NAMES.RIGHT)).toEqual(["H:7"]);
  });

  it("never writes a command that timed out while waiting behind another transport call", async () => {
    rig = createRig({ timeoutMs: 100 });
    await rig.connect("LEFT");
    const slow = rig.bridge.execute(() => delay(250));
    expect(await rig.dispatcher.send("LEFT", { name: "color", value: { r: 9, g: 9, b: 9 } })).toBe(false);
    expect(rig.connections.isConnected("LEFT")).toBe(false);
    await slow;
    await delay(50);
    expect(rig.adapter.wiresFor(NAMES.LEFT)).toEqual([]);
    expect(rig.events).toEqual([
      "connection LEFT true",
      "command LEFT false Timed out: C:9,9,9",
      "connection LEFT false",
      "failure CommandTimeoutError",
    ]);
  });

  it("reports a failed write without dropping the link", async () => {
    rig = createRig();
    await rig.connect("RIGHT");
    rig.adapter.failWrites(ADDRESSES.RIGHT);
    expect(await rig.dispatcher.send("RIGHT", { name: "mode", value: true })).toBe(false);
    expect(rig.connections.isConnected("RIGHT")).toBe(true);
    expect(rig.events).toEqual(["connection RIGHT true", "command RIGHT false Send failed: M:1"]);

    rig.adapter.failWrites(ADDRESSES.RIGHT, null);
    expect(await rig.dispatcher.send("RIGHT", { name: "mode", value: true })).toBe(true);
  });

  it("paces writes by the configured interval", async () => {
    rig = createRig({ intervalMs: 100 });
    await rig.connect("LEFT");
    await Promise.all([
      rig.dispatcher.send("LEFT", { name: "color", value: { r: 255, g: 0, b: 0 } }),
      rig.dispatcher.send("LEFT", { name: "mode", value: false }),
    ]);
    const [first, second] = rig.adapter.writes;
    expect([first.wire, second.wire]).toEqual(["C:255,0,0", "M:0"]);
    expect(second.at - first.at).toBeGreaterThanOrEqual(95);
  });

  it("keeps going when a completion callback throws", async () => {
    rig = createRig();
    await rig.connect("LEFT");
    rig.dispatcher.enqueue(
      createCommand("LEFT", { name: "hue", value: 1 }, () => {
        throw new Error("listener bug");
      })
    );
    expect(await rig.dispatcher.send("LEFT", { name: "hue", value: 2 })).toBe(true);
    expect(rig.adapter.wiresFor(NAMES.LEFT)).toEqual(["H:1", "H:2"]);
  });

  it("fails queued and late commands once stopped", async () => {
    rig = createRig({ intervalMs: 5000 });
    await rig.connect("LEFT");
    const first = rig.dispatcher.send("LEFT", { name: "hue", value: 1 });
    const second = rig.dispatcher.send("LEFT", { name: "hue", value: 2 });
    expect(await first).toBe(true);
    expect(rig.dispatcher.pending).toBe(1);

    await rig.dispatcher.stop(200);
    expect(await second).toBe(false);
    expect(await rig.dispatcher.send("LEFT", { name: "hue", value: 3 })).toBe(false);
    expect(rig.dispatcher.running).toBe(false);
    expect(rig.adapter.wiresFor(NAMES.LEFT)).toEqual(["H:1"]);
  });
});
