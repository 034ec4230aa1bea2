import { BridgeStoppedError } from "../util/errors.js";
import { AsyncQueue, delay } from "../util/async.js";
import { createLogger, type Logger } from "../util/logger.js";

type Unit<T> = () => Promise<T>;

type Job = {
  run: () => Promise<void>;
  cancel: (err: Error) => void;
};

/**
 * The single execution context for transport calls. Units run one at a time,
 * in submission order; anything concurrent has to happen inside one unit.
 */
export class AsyncBridge {
  private jobs = new AsyncQueue<Job>();
  private worker: Promise<void> | null = null;
  private stopping = false;
  private active = false;
  private log: Logger;

  constructor(log: Logger = createLogger("bridge")) {
    this.log = log;
  }

  get pending(): number {
    return this.jobs.size;
  }

  get running(): boolean {
    return this.worker !== null;
  }

  /** Queues `unit`; the returned promise settles with its result or its error. */
  execute<T>(unit: Unit<T>): Promise<T> {
    if (this.stopping) return Promise.reject(new BridgeStoppedError());
    return new Promise<T>((resolve, reject) => {
      this.jobs.push({
        run: async () => {
          try {
            resolve(await unit());
          } catch (err) {
            reject(err);
          }
        },
        cancel: reject,
      });
      this.ensureWorker();
    });
  }

  private ensureWorker() {
    if (this.worker) return;
    this.worker = this.loop().finally(() => {
      this.worker = null;
    });
  }

  private async loop(): Promise<void> {
    this.log.debug("worker started");
    while (!this.stopping) {
      const job = await this.jobs.pop(100);
      if (!job) continue;
      this.active = true;
      // run() never rejects: the unit's outcome goes to its own promise.
      await job.run();
      this.active = false;
    }
    this.log.debug("worker exited");
  }

  /**
   * Refuses new work, lets the in-flight unit finish for up to `graceMs`, and
   * returns regardless. Units that never started are rejected.
   */
  async stop(graceMs = 1000): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    for (const job of this.jobs.drain()) job.cancel(new BridgeStoppedError());
    const worker = this.worker;
    if (!worker) return;
    const grace = new AbortController();
    const finished = await Promise.race([worker.then(() => true), delay(graceMs, grace.signal).then(() => false)]);
    grace.abort();
    if (!finished) {
      this.log.warn(`in-flight unit still running after ${graceMs}ms; abandoning it`, { active: this.active });
    }
  }
}
