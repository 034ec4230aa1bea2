import { TimeoutError, withTimeout } from "../util/async.js";
import { encodeCommand, toBytes } from "../util/codec.js";
import { BatchPartialFailureError, CommandTimeoutError, TransportWriteError, errorMessage } from "../util/errors.js";
import type { Notifier } from "../util/events.js";
import { createLogger, type Logger } from "../util/logger.js";
import type { BatchItem, DeviceId, TransportHandle } from "../util/types.js";
import type { AsyncBridge } from "./bridge.js";
import type { ConnectionRegistry } from "./connections.js";

type Prepared = { deviceId: DeviceId; handle: TransportHandle; wire: string };

type Outcome = { deviceId: DeviceId; ok: boolean; timedOut: boolean; handle: TransportHandle };

/**
 * Sends one command per device so that they land together: every write is
 * started inside a single bridge unit and awaited as a group.
 */
export class FanOut {
  private log: Logger;

  constructor(
    private readonly bridge: AsyncBridge,
    private readonly connections: ConnectionRegistry,
    private readonly notifier: Notifier,
    private readonly timeoutMs: number,
    log: Logger = createLogger("fanout")
  ) {
    this.log = log;
  }

  /**
   * Resolves `true` only when every write succeeded (an empty batch after
   * dropping disconnected devices counts as success). Never rejects.
   */
  async send(batch: BatchItem[], onComplete?: (ok: boolean) => void): Promise<boolean> {
    const ok = await this.run(batch);
    if (onComplete) {
      try {
        onComplete(ok);
      } catch (err) {
        this.log.error(`completion callback threw: ${errorMessage(err)}`);
      }
    }
    return ok;
  }

  private async run(batch: BatchItem[]): Promise<boolean> {
    const prepared: Prepared[] = [];
    for (const item of batch) {
      const handle = this.connections.handle(item.deviceId);
      if (!handle) {
        this.log.warn(`${item.deviceId} device is not connected; leaving it out of the batch`);
        continue;
      }
      let wire: string;
      try {
        wire = encodeCommand(item.cmd);
      } catch (err) {
        this.log.error(`${item.deviceId} command could not be prepared: ${errorMessage(err)}`);
        return false;
      }
      prepared.push({ deviceId: item.deviceId, handle, wire });
    }

    if (prepared.length === 0) return true;

    this.log.info(`simultaneous send: ${prepared.map((p) => `${p.deviceId}:${p.wire}`).join(", ")}`);

    let outcomes: Outcome[];
    try {
      outcomes = await this.bridge.execute(() => Promise.all(prepared.map((p) => this.write(p))));
    } catch (err) {
      this.log.error(`simultaneous send failed: ${errorMessage(err)}`);
      return false;
    }

    for (const o of outcomes) {
      if (o.timedOut && this.connections.handle(o.deviceId) === o.handle) this.connections.detach(o.deviceId);
    }

    const failed = outcomes.filter((o) => !o.ok).map((o) => o.deviceId);
    if (failed.length === 0) return true;

    const succeeded = outcomes.filter((o) => o.ok).map((o) => o.deviceId);
    const partial = new BatchPartialFailureError(succeeded, failed);
    this.log.error(partial.message);
    this.notifier.notify("failure", partial);
    return false;
  }

  private async write(p: Prepared): Promise<Outcome> {
    try {
      this.log.debug(`${p.deviceId} write start: ${p.wire}`);
      await withTimeout(p.handle.write(toBytes(p.wire)), this.timeoutMs);
      this.log.debug(`${p.deviceId} write done: ${p.wire}`);
      return { deviceId: p.deviceId, ok: true, timedOut: false, handle: p.handle };
    } catch (err) {
      const timedOut = err instanceof TimeoutError;
      const message = timedOut
        ? new CommandTimeoutError(p.deviceId, p.wire, this.timeoutMs).message
        : new TransportWriteError(p.deviceId, p.wire, err).message;
      this.log.error(message);
      return { deviceId: p.deviceId, ok: false, timedOut, handle: p.handle };
    }
  }
}
