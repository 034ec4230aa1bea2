import { delay } from "../util/async.js";
import { NEAR_OFF, OFF, encodeCommand } from "../util/codec.js";
import { InvalidCommandError, UnknownAnimationTypeError, errorMessage } from "../util/errors.js";
import type { Notifier } from "../util/events.js";
import { createLogger, type Logger } from "../util/logger.js";
import type { BatchItem, ControlCmd, DeviceId, Rgb } from "../util/types.js";
import type { AmbientColorPolicy } from "./ambient.js";
import {
  type AnimationOptions,
  type AnimationPlan,
  type AnimationType,
  defaultAnimationColors,
  isAnimationType,
  resolvePlan,
} from "./animations.js";
import type { ConnectionRegistry } from "./connections.js";
import type { CommandDispatcher } from "./dispatcher.js";
import type { FanOut } from "./fanout.js";

export type EngineState = { kind: "idle" } | { kind: "running"; type: AnimationType };

/** Where the devices rest once a session ends: the configured color, or near-off. */
export type AfterAnimationPolicy = { enabled: boolean; color: Rgb };

export type ChoreographyOptions = {
  /** Bound on waiting for a cancelled worker before starting over. */
  settleTimeoutMs: number;
  /** Gap between latching the resting color and switching to fixed mode. */
  afterAnimationStepMs: number;
  afterAnimation: AfterAnimationPolicy;
};

type Session = {
  type: AnimationType;
  abort: AbortController;
  done: Promise<void>;
};

type PlanOf<K extends AnimationPlan["kind"]> = Extract<AnimationPlan, { kind: K }>;

const transition = (color: Rgb, durationMs: number): ControlCmd => ({
  name: "transition",
  value: { ...color, durationMs },
});

const toEach = (ids: DeviceId[], cmd: ControlCmd): BatchItem[] => ids.map((deviceId) => ({ deviceId, cmd }));

const opposite = (side: DeviceId): DeviceId => (side === "LEFT" ? "RIGHT" : "LEFT");

const seconds = (s: number) => Math.round(s * 1000);

/**
 * Runs at most one animation at a time. Workers are cancelled cooperatively
 * through their session's AbortSignal, checked around every wait.
 */
export class ChoreographyEngine {
  private session: Session | null = null;
  private colors = defaultAnimationColors();
  private afterAnimation: AfterAnimationPolicy;
  private tail: Promise<unknown> = Promise.resolve();
  private log: Logger;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly fanout: FanOut,
    private readonly connections: ConnectionRegistry,
    private readonly notifier: Notifier,
    private readonly ambient: AmbientColorPolicy,
    private readonly options: ChoreographyOptions,
    log: Logger = createLogger("animation")
  ) {
    this.afterAnimation = { ...options.afterAnimation, color: { ...options.afterAnimation.color } };
    this.log = log;
  }

  get state(): EngineState {
    return this.session ? { kind: "running", type: this.session.type } : { kind: "idle" };
  }

  setAnimationColor(type: AnimationType, color: Rgb) {
    encodeCommand({ name: "color", value: color });
    this.colors[type] = { ...color };
    this.log.debug(`custom color for ${type}: ${color.r},${color.g},${color.b}`);
  }

  getAnimationColor(type: AnimationType): Rgb {
    return { ...this.colors[type] };
  }

  setAfterAnimation(policy: AfterAnimationPolicy) {
    encodeCommand({ name: "color", value: policy.color });
    this.afterAnimation = { enabled: policy.enabled, color: { ...policy.color } };
  }

  getAfterAnimation(): AfterAnimationPolicy {
    return { enabled: this.afterAnimation.enabled, color: { ...this.afterAnimation.color } };
  }

  /**
   * Starts `type`, first stopping whatever is running. Resolves false for an
   * unknown type or unusable options, leaving the current state untouched.
   */
  start(type: string, options: AnimationOptions = {}): Promise<boolean> {
    return this.exclusive(async () => {
      if (!isAnimationType(type)) {
        this.log.warn(new UnknownAnimationTypeError(type).message);
        return false;
      }
      try {
        validateOptions(options);
      } catch (err) {
        this.log.warn(`${type}: ${errorMessage(err)}`);
        return false;
      }

      if (this.session) await this.stopLocked();

      if (this.ambient.enabled) {
        this.ambient.setEnabled(false);
        this.notifier.notify("status", "Ambient color mode disabled for animation");
      }

      const plan = resolvePlan(type, options);
      const abort = new AbortController();
      const session: Session = { type, abort, done: Promise.resolve() };
      this.session = session;
      this.log.info(`animation started: ${type}`);
      this.notifier.notify("animationStarted", type);
      this.notifier.notify("status", `${type} animation started`);

      session.done = this.run(plan, session).catch((err: unknown) => {
        const failure = err instanceof Error ? err : new Error(String(err));
        this.log.error(`${type} animation failed: ${failure.message}`);
        this.notifier.notify("failure", failure);
        this.finish(session);
      });
      return true;
    });
  }

  /**
   * Cancels the running session (if any), returns to idle and applies the
   * after-animation color to every connected device exactly once.
   */
  stop(): Promise<void> {
    return this.exclusive(() => this.stopLocked());
  }

  /** Enables ambient mode, stopping any running animation first so only one of them drives color. */
  handOverToAmbient(): Promise<void> {
    return this.exclusive(async () => {
      if (this.session) await this.stopLocked();
      this.ambient.setEnabled(true);
    });
  }

  private async stopLocked(): Promise<void> {
    const session = this.session;
    if (session) {
      session.abort.abort();
      this.session = null;
      const settle = new AbortController();
      const settled = await Promise.race([
        session.done.then(() => true),
        delay(this.options.settleTimeoutMs, settle.signal).then(() => false),
      ]);
      settle.abort();
      if (!settled) {
        this.log.warn(`${session.type} worker still running after ${this.options.settleTimeoutMs}ms; forcing it clear`);
      }
      this.log.info("animation stopped");
      this.notifier.notify("animationStopped", session.type);
      this.notifier.notify("status", "Animation stopped");
    }
    await this.applyAfterAnimation();
  }

  private async applyAfterAnimation() {
    const ids = this.connections.connectedIds();
    if (ids.length === 0) return;
    const { enabled, color } = this.afterAnimation;
    const resting = enabled ? color : NEAR_OFF;
    // The firmware only honours a mode switch once the color is latched.
    await this.fanout.send(toEach(ids, { name: "color", value: resting }));
    await delay(this.options.afterAnimationStepMs);
    await this.fanout.send(toEach(ids, { name: "mode", value: false }));
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Natural end of a session: back to idle unless someone already stopped it. */
  private finish(session: Session) {
    if (this.session !== session) return;
    this.session = null;
    this.log.info(`animation finished: ${session.type}`);
    this.notifier.notify("animationStopped", session.type);
  }

  private run(plan: AnimationPlan, session: Session): Promise<void> {
    switch (plan.kind) {
      case "turn":
        return this.turnSignal(plan, session);
      case "flash":
        return this.flash(plan, session);
      case "move":
        return this.move(plan, session);
    }
  }

  private unavailable(session: Session, message: string) {
    this.log.warn(message);
    this.notifier.notify("status", message);
    this.finish(session);
  }

  private async turnSignal(plan: PlanOf<"turn">, session: Session): Promise<void> {
    const { signal } = session.abort;
    const { side } = plan;
    if (!this.connections.isConnected(side)) {
      this.unavailable(session, `${side} device is not connected`);
      return;
    }

    const color = this.colors[plan.type];
    const sends: Promise<boolean>[] = [];
    const other = opposite(side);
    if (this.connections.isConnected(other)) {
      sends.push(this.dispatcher.send(other, { name: "color", value: NEAR_OFF }));
    }

    try {
      for (let i = 0; i < plan.cycles && !signal.aborted; i++) {
        sends.push(this.dispatcher.send(side, transition(color, plan.transitionMs)));
        await delay(seconds(plan.speed), signal);
        if (signal.aborted) break;
        sends.push(this.dispatcher.send(side, transition(OFF, plan.transitionMs)));
        await delay(seconds(plan.speed), signal);
      }
    } finally {
      // Let queued blinks drain so nothing lands after the resting color.
      await Promise.all(sends);
    }
    if (signal.aborted) return;

    await this.parkConnected();
    this.finish(session);
  }

  private async flash(plan: PlanOf<"flash">, session: Session): Promise<void> {
    const { signal } = session.abort;
    const ids = this.connections.connectedIds();
    if (ids.length === 0) {
      this.unavailable(session, "No device is connected");
      return;
    }

    const color = this.colors[plan.type];

    for (let i = 0; i < plan.cycles && !signal.aborted; i++) {
      await this.fanout.send(toEach(ids, transition(color, plan.transitionMs)));
      await delay(seconds(plan.speed), signal);
      if (signal.aborted) break;
      await this.fanout.send(toEach(ids, transition(OFF, plan.transitionMs)));
      await delay(seconds(plan.speed), signal);
    }
    if (signal.aborted) return;

    await this.parkConnected();
    this.finish(session);
  }

  private async move(plan: PlanOf<"move">, session: Session): Promise<void> {
    const { signal } = session.abort;
    const ids = this.connections.connectedIds();
    if (ids.length === 0) {
      this.unavailable(session, "No device is connected");
      return;
    }

    const color = this.colors[plan.type];

    await this.fanout.send(toEach(ids, transition(color, plan.transitionMs * 2)));
    await delay(seconds(plan.speed * 2), signal);
    if (signal.aborted) return;

    await this.fanout.send(toEach(ids, transition(OFF, plan.transitionMs * 3)));
    await delay(seconds(plan.speed * 3), signal);
    if (signal.aborted) return;

    this.finish(session);
  }

  private async parkConnected() {
    const ids = this.connections.connectedIds();
    await this.fanout.send(toEach(ids, { name: "color", value: NEAR_OFF }));
  }
}

function validateOptions(options: AnimationOptions) {
  const { speed, cycles, transitionMs } = options;
  if (speed !== undefined && !(Number.isFinite(speed) && speed > 0)) {
    throw new InvalidCommandError(`speed must be a positive number of seconds, got ${speed}`);
  }
  if (cycles !== undefined && !(Number.isInteger(cycles) && cycles > 0)) {
    throw new InvalidCommandError(`cycles must be a positive integer, got ${cycles}`);
  }
  if (transitionMs !== undefined && !(Number.isInteger(transitionMs) && transitionMs >= 0)) {
    throw new InvalidCommandError(`transitionMs must be a non-negative integer, got ${transitionMs}`);
  }
}
