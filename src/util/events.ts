import { EventEmitter } from "node:events";
import type { AnimationType } from "../core/animations.js";
import type { DeviceId } from "./types.js";

export type ControllerEvents = {
  connection: [deviceId: DeviceId, connected: boolean];
  command: [deviceId: DeviceId, ok: boolean, message: string];
  animationStarted: [type: AnimationType];
  animationStopped: [type: AnimationType];
  status: [message: string];
  // Not "error": an unhandled "error" event would throw out of the emitter.
  failure: [error: Error];
};

export type ControllerEvent = keyof ControllerEvents;

/** Notification channel from the controller back to whoever drives it. */
export class Notifier extends EventEmitter {
  notify<K extends ControllerEvent>(event: K, ...args: ControllerEvents[K]): boolean {
    return this.emit(event, ...args);
  }

  subscribe<K extends ControllerEvent>(event: K, listener: (...args: ControllerEvents[K]) => void): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}
