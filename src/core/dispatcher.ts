import { AsyncQueue, TimeoutError, delay, withTimeout } from "../util/async.js";
import { createCommand, describeCommand, encodeCommand, toBytes } from "../util/codec.js";
import {
  BridgeStoppedError,
  CommandTimeoutError,
  NotConnectedError,
  TransportWriteError,
  errorMessage,
} from "../util/errors.js";
import type { Notifier } from "../util/events.js";
import { createLogger, type Logger } from "../util/logger.js";
import type { Command, ControlCmd, DeviceId, TransportHandle } from "../util/types.js";
import type { AsyncBridge } from "./bridge.js";
import type { ConnectionRegistry } from "./connections.js";

export type DispatcherOptions = {
  /** Pause after each command that reached the transport. */
  intervalMs: number;
  /** Bound on a single write, measured from hand-off to the bridge. */
  timeoutMs: number;
  /** How long one pop waits before re-checking the stop signal. */
  pollMs?: number;
};

export class CommandDispatcher {
  private queue = new AsyncQueue<Command>();
  private worker: Promise<void> | null = null;
  private stopSignal = new AbortController();
  private log: Logger;

  constructor(
    private readonly bridge: AsyncBridge,
    private readonly connections: ConnectionRegistry,
    private readonly notifier: Notifier,
    private readonly ambient: { readonly enabled: boolean },
    private readonly options: DispatcherOptions,
    log: Logger = createLogger("dispatcher")
  ) {
    this.log = log;
  }

  get pending(): number {
    return this.queue.size;
  }

  get running(): boolean {
    return this.worker !== null;
  }

  enqueue(command: Command): void {
    if (this.stopSignal.signal.aborted) {
      this.log.warn(`dispatcher stopped; discarding ${describeCommand(command)}`);
      this.complete(command, false);
      return;
    }
    this.log.debug(`queued ${describeCommand(command)}`);
    this.queue.push(command);
    this.start();
  }

  /** Promise form of {@link enqueue}: resolves with the command's outcome, never rejects. */
  send(deviceId: DeviceId, cmd: ControlCmd): Promise<boolean> {
    return new Promise((resolve) => this.enqueue(createCommand(deviceId, cmd, resolve)));
  }

  start(): void {
    if (this.worker || this.stopSignal.signal.aborted) return;
    this.worker = this.loop().finally(() => {
      this.worker = null;
    });
  }

  private async loop(): Promise<void> {
    const { signal } = this.stopSignal;
    this.log.info("command queue processing started");
    while (!signal.aborted) {
      const command = await this.queue.pop(this.options.pollMs ?? 500);
      if (!command) continue;
      try {
        const reachedTransport = await this.process(command);
        if (reachedTransport) await delay(this.options.intervalMs, signal);
      } catch (err) {
        // process() handles its own failures; this only guards the loop.
        this.log.error(`unexpected error while processing ${command.deviceId} command: ${errorMessage(err)}`);
        this.complete(command, false);
      }
    }
    this.log.info("command queue processing stopped");
  }

  private async process(command: Command): Promise<boolean> {
    const { deviceId, cmd } = command;
    const wire = encodeCommand(cmd);
    const handle = this.connections.handle(deviceId);

    if (!handle) {
      this.log.warn(`${new NotConnectedError(deviceId).message}; skipping ${wire}`);
      this.complete(command, false);
      return false;
    }

    // The ambient producer owns color while its policy is on.
    if (cmd.name === "color" && this.ambient.enabled) {
      this.log.debug(`ambient mode active; dropping ${deviceId}:${wire}`);
      this.complete(command, false);
      return false;
    }

    const { timeoutMs } = this.options;
    const expired = new AbortController();
    let ok = false;
    try {
      this.log.debug(`${deviceId} write start: ${wire}`);
      await withTimeout(
        this.bridge.execute(async () => {
          // Already reported as timed out, or the link it was meant for is gone.
          if (expired.signal.aborted || this.connections.handle(deviceId) !== handle) {
            throw new NotConnectedError(deviceId);
          }
          await withTimeout(handle.write(toBytes(wire)), timeoutMs);
        }),
        timeoutMs
      );
      ok = true;
      this.log.info(`${deviceId} sent ${wire}`);
      this.notifier.notify("command", deviceId, true, `Sent ${wire}`);
    } catch (err) {
      expired.abort();
      this.fail(deviceId, wire, err, handle);
    }
    this.complete(command, ok);
    return true;
  }

  private fail(deviceId: DeviceId, wire: string, err: unknown, handle: TransportHandle) {
    if (err instanceof TimeoutError) {
      const timeout = new CommandTimeoutError(deviceId, wire, this.options.timeoutMs);
      this.log.error(timeout.message);
      this.notifier.notify("command", deviceId, false, `Timed out: ${wire}`);
      // Only drop the link we actually timed out on; a reconnect may have replaced it.
      if (this.connections.handle(deviceId) === handle) this.connections.detach(deviceId);
      this.notifier.notify("failure", timeout);
      return;
    }
    if (err instanceof BridgeStoppedError) {
      this.log.warn(`${deviceId} ${wire} not sent: ${err.message}`);
      this.notifier.notify("command", deviceId, false, `Not sent: ${wire}`);
      return;
    }
    const writeError = new TransportWriteError(deviceId, wire, err);
    this.log.error(writeError.message);
    this.notifier.notify("command", deviceId, false, `Send failed: ${wire}`);
  }

  private complete(command: Command, ok: boolean) {
    if (!command.onComplete) return;
    try {
      command.onComplete(ok);
    } catch (err) {
      this.log.error(`completion callback for ${command.deviceId} threw: ${errorMessage(err)}`);
    }
  }

  /** Stops the worker; queued commands are discarded and their callbacks get `false`. */
  async stop(graceMs = 1000): Promise<void> {
    if (this.stopSignal.signal.aborted) return;
    this.stopSignal.abort();
    const discarded = this.queue.drain();
    if (discarded.length) this.log.info(`discarding ${discarded.length} queued command(s)`);
    for (const command of discarded) this.complete(command, false);
    const worker = this.worker;
    if (!worker) return;
    const grace = new AbortController();
    await Promise.race([worker, delay(graceMs, grace.signal)]);
    grace.abort();
  }
}
