import { InvalidCommandError } from "./errors.js";
import type { BatchItem, Command, ControlCmd, DeviceId, Rgb } from "./types.js";

/** Not pure black: the firmware treats an exact 0,0,0 color specially. */
export const NEAR_OFF: Rgb = Object.freeze({ r: 1, g: 1, b: 1 });
export const OFF: Rgb = Object.freeze({ r: 0, g: 0, b: 0 });

const KIND_LETTER: Record<ControlCmd["name"], string> = {
  mode: "M",
  color: "C",
  hue: "H",
  transition: "T",
};

function byte(label: string, v: number): number {
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new InvalidCommandError(`${label} must be an integer 0-255, got ${v}`);
  }
  return v;
}

function rgbArgs(c: Rgb): number[] {
  return [byte("r", c.r), byte("g", c.g), byte("b", c.b)];
}

function commandArgs(cmd: ControlCmd): number[] {
  switch (cmd.name) {
    case "mode":
      return [cmd.value ? 1 : 0];
    case "color":
      return rgbArgs(cmd.value);
    case "hue":
      return [byte("hue", cmd.value)];
    case "transition": {
      const { durationMs } = cmd.value;
      if (!Number.isInteger(durationMs) || durationMs < 0) {
        throw new InvalidCommandError(`durationMs must be a non-negative integer, got ${durationMs}`);
      }
      return [...rgbArgs(cmd.value), durationMs];
    }
  }
}

/** Wire line for a command, e.g. `C:255,0,0` or `T:0,255,0,1000`. */
export function encodeCommand(cmd: ControlCmd): string {
  return `${KIND_LETTER[cmd.name]}:${commandArgs(cmd).join(",")}`;
}

export function toBytes(wire: string): Uint8Array {
  return new TextEncoder().encode(wire);
}

/**
 * Builds an immutable queue entry. Encoding happens here so a malformed
 * payload is rejected at the caller instead of inside the worker.
 */
export function createCommand(
  deviceId: DeviceId,
  cmd: ControlCmd,
  onComplete?: (ok: boolean) => void
): Command {
  encodeCommand(cmd);
  return Object.freeze({ deviceId, cmd: freezeCmd(cmd), enqueuedAt: Date.now(), onComplete });
}

function freezeCmd(cmd: ControlCmd): ControlCmd {
  switch (cmd.name) {
    case "mode":
    case "hue":
      return Object.freeze({ ...cmd });
    case "color":
      return Object.freeze({ name: cmd.name, value: Object.freeze({ ...cmd.value }) });
    case "transition":
      return Object.freeze({ name: cmd.name, value: Object.freeze({ ...cmd.value }) });
  }
}

export function describeCommand(c: Command | BatchItem): string {
  return `${c.deviceId}:${encodeCommand(c.cmd)}`;
}

export function parseRgb(text: string): Rgb {
  const parts = text.split(",").map((s) => Number(s.trim()));
  if (parts.length !== 3) throw new InvalidCommandError(`Expected "r,g,b", got "${text}"`);
  const [r, g, b] = parts;
  return { r: byte("r", r), g: byte("g", g), b: byte("b", b) };
}
