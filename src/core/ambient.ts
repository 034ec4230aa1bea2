import type { TokenBucketLimiter } from "../util/limiter.js";
import { createLogger, type Logger } from "../util/logger.js";
import type { BatchItem, Rgb } from "../util/types.js";
import type { ConnectionRegistry } from "./connections.js";
import type { FanOut } from "./fanout.js";

/**
 * While enabled, an external producer (e.g. an audio analyser) owns the color
 * of both devices: the dispatcher drops plain color commands and frames pushed
 * here are faded in on every connected device at once.
 */
export class AmbientColorPolicy {
  private on = false;
  private log: Logger;

  constructor(
    private readonly fanout: FanOut,
    private readonly connections: ConnectionRegistry,
    readonly transitionMs: number,
    private readonly limiter: TokenBucketLimiter,
    log: Logger = createLogger("ambient")
  ) {
    this.log = log;
  }

  get enabled(): boolean {
    return this.on;
  }

  setEnabled(enabled: boolean) {
    if (this.on === enabled) return;
    this.on = enabled;
    this.log.info(enabled ? "ambient color mode started" : "ambient color mode stopped");
  }

  /**
   * Pushes one frame. Returns false when the frame was not sent: mode off,
   * nothing connected, or over the frame budget (dropped, not queued).
   */
  async update(color: Rgb): Promise<boolean> {
    if (!this.on) return false;
    const ids = this.connections.connectedIds();
    if (ids.length === 0) return false;
    const batch = ids.map((deviceId): BatchItem => ({
      deviceId,
      cmd: { name: "transition", value: { ...color, durationMs: this.transitionMs } },
    }));
    if (!this.limiter.tryTake()) {
      this.log.debug("frame over budget; dropped");
      return false;
    }
    return this.fanout.send(batch);
  }
}
