import type { DeviceId } from "./types.js";

export type LedErrorCode =
  | "NOT_CONNECTED"
  | "TRANSPORT_WRITE"
  | "TIMEOUT"
  | "UNKNOWN_ANIMATION"
  | "BATCH_PARTIAL_FAILURE"
  | "BRIDGE_STOPPED"
  | "INVALID_COMMAND";

export class LedError extends Error {
  readonly code: LedErrorCode;

  constructor(code: LedErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotConnectedError extends LedError {
  constructor(readonly deviceId: DeviceId) {
    super("NOT_CONNECTED", `${deviceId} device is not connected`);
  }
}

export class TransportWriteError extends LedError {
  constructor(readonly deviceId: DeviceId, wire: string, cause: unknown) {
    super("TRANSPORT_WRITE", `${deviceId} write of ${wire} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class CommandTimeoutError extends LedError {
  constructor(readonly deviceId: DeviceId, wire: string, timeoutMs: number) {
    super("TIMEOUT", `${deviceId} did not acknowledge ${wire} within ${timeoutMs}ms`);
  }
}

export class UnknownAnimationTypeError extends LedError {
  constructor(readonly type: string) {
    super("UNKNOWN_ANIMATION", `Unknown animation type: ${type}`);
  }
}

export class BatchPartialFailureError extends LedError {
  constructor(readonly succeeded: DeviceId[], readonly failed: DeviceId[]) {
    super(
      "BATCH_PARTIAL_FAILURE",
      `Simultaneous send failed for ${failed.join(", ")}` +
        (succeeded.length ? ` (succeeded: ${succeeded.join(", ")})` : "")
    );
  }
}

export class BridgeStoppedError extends LedError {
  constructor() {
    super("BRIDGE_STOPPED", "Transport bridge is stopped");
  }
}

export class InvalidCommandError extends LedError {
  constructor(message: string) {
    super("INVALID_COMMAND", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
