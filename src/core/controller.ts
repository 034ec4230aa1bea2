import { createCommand } from "../util/codec.js";
import { errorMessage } from "../util/errors.js";
import { Notifier } from "../util/events.js";
import { TokenBucketLimiter } from "../util/limiter.js";
import { createLogger, type Logger } from "../util/logger.js";
import {
  DEVICE_IDS,
  type BatchItem,
  type ControlCmd,
  type DeviceId,
  type DeviceStatus,
  type Rgb,
  type Settings,
  type TransportPort,
} from "../util/types.js";
import { AmbientColorPolicy } from "./ambient.js";
import type { AnimationOptions, AnimationType } from "./animations.js";
import { AsyncBridge } from "./bridge.js";
import { type AfterAnimationPolicy, ChoreographyEngine, type EngineState } from "./choreography.js";
import { ConnectionRegistry } from "./connections.js";
import { CommandDispatcher } from "./dispatcher.js";
import { FanOut } from "./fanout.js";

export type ControllerOptions = {
  deviceNames: Record<DeviceId, string>;
  commandIntervalMs: number;
  commandTimeoutMs: number;
  discoverTimeoutMs: number;
  ambientTransitionMs: number;
  ambientMaxFps: number;
  afterAnimation: AfterAnimationPolicy;
  afterAnimationStepMs: number;
  settleTimeoutMs: number;
  /** 0 disables the periodic link check. */
  healthCheckMs: number;
  autoReconnect: boolean;
  /** Dispatcher pop timeout; only tests shorten it. */
  pollMs?: number;
};

export type ControllerStatus = {
  devices: DeviceStatus[];
  animation: EngineState;
  ambient: boolean;
  queued: number;
  afterAnimation: AfterAnimationPolicy;
};

/**
 * Facade over the bridge, dispatcher, fan-out and choreography engine for one
 * LEFT/RIGHT device pair. Lifecycle: construct, `start()`, `stop()`.
 */
export class LedController {
  readonly notifier = new Notifier();
  private readonly connections: ConnectionRegistry;
  private readonly bridge: AsyncBridge;
  private readonly dispatcher: CommandDispatcher;
  private readonly fanout: FanOut;
  private readonly ambient: AmbientColorPolicy;
  private readonly choreography: ChoreographyEngine;
  private readonly connecting = new Map<DeviceId, Promise<boolean>>();
  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;
  private log: Logger;

  constructor(
    private readonly transport: TransportPort,
    private readonly options: ControllerOptions,
    log: Logger = createLogger("controller")
  ) {
    this.log = log;
    this.connections = new ConnectionRegistry(this.notifier);
    this.bridge = new AsyncBridge(log.child("bridge"));
    this.fanout = new FanOut(this.bridge, this.connections, this.notifier, options.commandTimeoutMs, log.child("fanout"));
    this.ambient = new AmbientColorPolicy(
      this.fanout,
      this.connections,
      options.ambientTransitionMs,
      new TokenBucketLimiter(options.ambientMaxFps),
      log.child("ambient")
    );
    this.dispatcher = new CommandDispatcher(
      this.bridge,
      this.connections,
      this.notifier,
      this.ambient,
      { intervalMs: options.commandIntervalMs, timeoutMs: options.commandTimeoutMs, pollMs: options.pollMs },
      log.child("dispatcher")
    );
    this.choreography = new ChoreographyEngine(
      this.dispatcher,
      this.fanout,
      this.connections,
      this.notifier,
      this.ambient,
      {
        settleTimeoutMs: options.settleTimeoutMs,
        afterAnimationStepMs: options.afterAnimationStepMs,
        afterAnimation: options.afterAnimation,
      },
      log.child("animation")
    );
  }

  start(): void {
    if (this.stopped) throw new Error("Controller has been stopped");
    this.dispatcher.start();
    if (this.options.healthCheckMs > 0 && !this.healthTimer) {
      this.healthTimer = setInterval(() => {
        this.healthCheck().catch((err: unknown) => this.log.error(`health check failed: ${errorMessage(err)}`));
      }, this.options.healthCheckMs);
      this.healthTimer.unref();
    }
  }

  /** Parks the devices, then shuts the workers down; queued commands are discarded. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    await this.choreography.stop();
    this.stopped = true;
    await this.dispatcher.stop();
    await this.bridge.stop();
  }

  // ---- connections ----

  /**
   * Discovers the device by its configured name and connects to it. Callers
   * arriving while a connect for the same device is pending share its result.
   */
  connect(deviceId: DeviceId): Promise<boolean> {
    if (this.connections.isConnected(deviceId)) return Promise.resolve(true);
    const pending = this.connecting.get(deviceId);
    if (pending) return pending;
    const attempt = this.discoverAndConnect(deviceId).finally(() => {
      this.connecting.delete(deviceId);
    });
    this.connecting.set(deviceId, attempt);
    return attempt;
  }

  private async discoverAndConnect(deviceId: DeviceId): Promise<boolean> {
    const name = this.options.deviceNames[deviceId];
    this.log.info(`looking for ${deviceId} (${name})...`);
    try {
      const handle = await this.bridge.execute(async () => {
        const found = await this.transport.discover(this.options.discoverTimeoutMs);
        const target = found.find((d) => d.name === name);
        if (!target) return null;
        this.log.info(`found ${target.name} (${target.address})`);
        this.connections.rememberAddress(deviceId, target.address);
        return this.transport.connect(target.address, this.options.discoverTimeoutMs);
      });
      if (!handle) {
        this.log.warn(`${deviceId} device was not found`);
        this.notifier.notify("status", `${deviceId} device was not found`);
        return false;
      }
      this.connections.attach(deviceId, handle);
      this.log.info(`${deviceId} connected`);
      return true;
    } catch (err) {
      this.log.error(`${deviceId} connect failed: ${errorMessage(err)}`);
      this.notifier.notify("status", `${deviceId} connect failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async disconnect(deviceId: DeviceId): Promise<boolean> {
    const handle = this.connections.detach(deviceId);
    if (!handle) {
      this.log.warn(`${deviceId} device is not connected`);
      return false;
    }
    try {
      await this.bridge.execute(() => handle.disconnect());
      this.log.info(`${deviceId} disconnected`);
      return true;
    } catch (err) {
      this.log.error(`${deviceId} disconnect failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async reconnect(deviceId: DeviceId): Promise<boolean> {
    if (this.connections.isConnected(deviceId)) await this.disconnect(deviceId);
    return this.connect(deviceId);
  }

  /** Asks the transport whether the link is alive and records the answer. */
  async checkConnection(deviceId: DeviceId): Promise<boolean> {
    const handle = this.connections.handle(deviceId);
    if (!handle) return false;
    let alive: boolean;
    try {
      alive = await this.bridge.execute(() => handle.isConnected());
    } catch (err) {
      this.log.debug(`${deviceId} connection check failed: ${errorMessage(err)}`);
      alive = false;
    }
    if (!alive && this.connections.handle(deviceId) === handle) this.connections.detach(deviceId);
    return alive;
  }

  async checkAllConnections(): Promise<Record<DeviceId, boolean>> {
    const [left, right] = await Promise.all(DEVICE_IDS.map((id) => this.checkConnection(id)));
    return { LEFT: left, RIGHT: right };
  }

  private async healthCheck() {
    await this.checkAllConnections();
    if (!this.options.autoReconnect) return;
    for (const id of DEVICE_IDS) {
      if (!this.connections.isConnected(id) && this.connections.address(id)) {
        this.log.info(`${id} link lost; reconnecting`);
        await this.connect(id);
      }
    }
  }

  // ---- single-device commands ----

  enqueueCommand(deviceId: DeviceId, cmd: ControlCmd, onComplete?: (ok: boolean) => void): void {
    this.dispatcher.enqueue(createCommand(deviceId, cmd, onComplete));
  }

  /** Queues `cmd` and resolves with its outcome. */
  sendCommand(deviceId: DeviceId, cmd: ControlCmd): Promise<boolean> {
    return this.dispatcher.send(deviceId, cmd);
  }

  setRgbColor(deviceId: DeviceId, color: Rgb, onComplete?: (ok: boolean) => void): void {
    this.enqueueCommand(deviceId, { name: "color", value: color }, onComplete);
  }

  setMode(deviceId: DeviceId, autoMode: boolean, onComplete?: (ok: boolean) => void): void {
    this.enqueueCommand(deviceId, { name: "mode", value: autoMode }, onComplete);
  }

  setHue(deviceId: DeviceId, hue: number, onComplete?: (ok: boolean) => void): void {
    this.enqueueCommand(deviceId, { name: "hue", value: hue }, onComplete);
  }

  setTransitionColor(deviceId: DeviceId, color: Rgb, durationMs: number, onComplete?: (ok: boolean) => void): void {
    this.enqueueCommand(deviceId, { name: "transition", value: { ...color, durationMs } }, onComplete);
  }

  /** Automatic mode only switches the mode; fixed mode only sends the color. */
  applySettings(deviceId: DeviceId, settings: Settings): Promise<boolean> {
    return this.sendCommand(deviceId, settingsCommand(settings));
  }

  /** Same as {@link applySettings} for every connected device, simultaneously. */
  async applySettingsToBoth(settings: Settings): Promise<boolean> {
    const ids = this.connections.connectedIds();
    if (ids.length === 0) {
      this.log.warn("no device is connected");
      return false;
    }
    const cmd = settingsCommand(settings);
    return this.fanout.send(ids.map((deviceId) => ({ deviceId, cmd })));
  }

  sendSimultaneously(batch: BatchItem[], onComplete?: (ok: boolean) => void): Promise<boolean> {
    return this.fanout.send(batch, onComplete);
  }

  // ---- animations ----

  startAnimation(type: string, options?: AnimationOptions): Promise<boolean> {
    return this.choreography.start(type, options);
  }

  stopAnimation(): Promise<void> {
    return this.choreography.stop();
  }

  setAnimationColor(type: AnimationType, color: Rgb) {
    this.choreography.setAnimationColor(type, color);
  }

  getAnimationColor(type: AnimationType): Rgb {
    return this.choreography.getAnimationColor(type);
  }

  setAfterAnimationColor(policy: AfterAnimationPolicy) {
    this.choreography.setAfterAnimation(policy);
  }

  // ---- ambient ----

  /** Turning ambient mode on stops a running animation first. */
  async setAmbientMode(enabled: boolean): Promise<void> {
    if (enabled) await this.choreography.handOverToAmbient();
    else this.ambient.setEnabled(false);
    this.notifier.notify("status", enabled ? "Ambient color mode on" : "Ambient color mode off");
  }

  updateAmbientColor(color: Rgb): Promise<boolean> {
    return this.ambient.update(color);
  }

  status(): ControllerStatus {
    return {
      devices: DEVICE_IDS.map((deviceId) => ({
        deviceId,
        name: this.options.deviceNames[deviceId],
        address: this.connections.address(deviceId),
        connected: this.connections.isConnected(deviceId),
      })),
      animation: this.choreography.state,
      ambient: this.ambient.enabled,
      queued: this.dispatcher.pending,
      afterAnimation: this.choreography.getAfterAnimation(),
    };
  }
}

function settingsCommand(s: Settings): ControlCmd {
  if (s.autoMode) return { name: "mode", value: true };
  return { name: "color", value: s.color ?? { r: 0, g: 0, b: 0 } };
}
