import { MemoryAdapter } from "../adapters/memory.js";
import { AmbientColorPolicy } from "../core/ambient.js";
import { AsyncBridge } from "../core/bridge.js";
import { ConnectionRegistry } from "../core/connections.js";
import { CommandDispatcher } from "../core/dispatcher.js";
import { FanOut } from "../core/fanout.js";
import type { ControllerOptions } from "../core/controller.js";
import { Notifier } from "../util/events.js";
import { TokenBucketLimiter } from "../util/limiter.js";
import { silentLogger } from "../util/logger.js";
import type { DeviceId } from "../util/types.js";

export const ADDRESSES: Record<DeviceId, string> = {
  LEFT: "AA:00:00:00:00:01",
  RIGHT: "AA:00:00:00:00:02",
};

export const NAMES: Record<DeviceId, string> = { LEFT: "LED_LEFT", RIGHT: "LED_RIGHT" };

export function memoryAdapter(): MemoryAdapter {
  return new MemoryAdapter([
    { name: NAMES.LEFT, address: ADDRESSES.LEFT },
    { name: NAMES.RIGHT, address: ADDRESSES.RIGHT },
    { name: "SOMEONE_ELSES_LAMP", address: "AA:00:00:00:00:99" },
  ]);
}

/** Records every notification as one line, e.g. `command LEFT true Sent M:1`. */
export function recordEvents(notifier: Notifier): string[] {
  const lines: string[] = [];
  notifier.subscribe("connection", (id, connected) => lines.push(`connection ${id} ${connected}`));
  notifier.subscribe("command", (id, ok, message) => lines.push(`command ${id} ${ok} ${message}`));
  notifier.subscribe("animationStarted", (type) => lines.push(`animationStarted ${type}`));
  notifier.subscribe("animationStopped", (type) => lines.push(`animationStopped ${type}`));
  notifier.subscribe("status", (message) => lines.push(`status ${message}`));
  notifier.subscribe("failure", (err) => lines.push(`failure ${err.name}`));
  return lines;
}

export type RigOptions = {
  intervalMs?: number;
  timeoutMs?: number;
  ambientMaxFps?: number;
  ambientTransitionMs?: number;
};

/** The core components wired together over a {@link MemoryAdapter}, without the controller facade. */
export function createRig(options: RigOptions = {}) {
  const adapter = memoryAdapter();
  const notifier = new Notifier();
  const events = recordEvents(notifier);
  const connections = new ConnectionRegistry(notifier);
  const bridge = new AsyncBridge(silentLogger);
  const timeoutMs = options.timeoutMs ?? 1000;
  const fanout = new FanOut(bridge, connections, notifier, timeoutMs, silentLogger);
  const ambient = new AmbientColorPolicy(
    fanout,
    connections,
    options.ambientTransitionMs ?? 100,
    new TokenBucketLimiter(options.ambientMaxFps ?? 1000),
    silentLogger
  );
  const dispatcher = new CommandDispatcher(
    bridge,
    connections,
    notifier,
    ambient,
    { intervalMs: options.intervalMs ?? 0, timeoutMs, pollMs: 20 },
    silentLogger
  );

  return {
    adapter,
    notifier,
    events,
    connections,
    bridge,
    fanout,
    ambient,
    dispatcher,
    async connect(...ids: DeviceId[]) {
      for (const id of ids) connections.attach(id, await adapter.connect(ADDRESSES[id], 100));
    },
    async stop() {
      await dispatcher.stop(200);
      await bridge.stop(200);
    },
  };
}

export type Rig = ReturnType<typeof createRig>;

export function controllerOptions(overrides: Partial<ControllerOptions> = {}): ControllerOptions {
  return {
    deviceNames: { ...NAMES },
    commandIntervalMs: 0,
    commandTimeoutMs: 1000,
    discoverTimeoutMs: 100,
    ambientTransitionMs: 100,
    ambientMaxFps: 1000,
    afterAnimation: { enabled: false, color: { r: 255, g: 255, b: 255 } },
    afterAnimationStepMs: 0,
    settleTimeoutMs: 500,
    healthCheckMs: 0,
    autoReconnect: false,
    pollMs: 20,
    ...overrides,
  };
}
