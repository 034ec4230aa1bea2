import type { DeviceId, Rgb } from "../util/types.js";

export const ANIMATION_TYPES = [
  "left_turn",
  "right_turn",
  "lane_change_left",
  "lane_change_right",
  "hazard",
  "thank_you",
  "emergency",
  "forward",
  "reverse",
] as const;

export type AnimationType = (typeof ANIMATION_TYPES)[number];

export type AnimationOptions = {
  /** Seconds each half-cycle (or fade) is held. */
  speed?: number;
  cycles?: number;
  transitionMs?: number;
};

export const AMBER: Rgb = { r: 255, g: 191, b: 0 };
export const RED: Rgb = { r: 255, g: 0, b: 0 };
export const BLUE: Rgb = { r: 0, g: 0, b: 255 };
export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

export const TIMING = {
  speed: 0.5,
  fastSpeed: 0.25,
  slowSpeed: 0.8,
  cycles: 6,
  shortCycles: 3,
  transitionMs: 300,
} as const;

export function defaultAnimationColors(): Record<AnimationType, Rgb> {
  return {
    left_turn: { ...AMBER },
    right_turn: { ...AMBER },
    lane_change_left: { ...AMBER },
    lane_change_right: { ...AMBER },
    hazard: { ...AMBER },
    thank_you: { ...AMBER },
    emergency: { ...RED },
    forward: { ...BLUE },
    reverse: { ...WHITE },
  };
}

export function isAnimationType(v: string): v is AnimationType {
  return (ANIMATION_TYPES as readonly string[]).includes(v);
}

type Timing = { speed: number; cycles: number; transitionMs: number };

/** What a worker needs to run one session; one variant per worker shape. */
export type AnimationPlan =
  | ({ kind: "turn"; type: AnimationType; side: DeviceId } & Timing)
  | ({ kind: "flash"; type: AnimationType } & Timing)
  | { kind: "move"; type: AnimationType; direction: "forward" | "reverse"; speed: number; transitionMs: number };

export function resolvePlan(type: AnimationType, options: AnimationOptions = {}): AnimationPlan {
  const timing = (cycles: number, speed: number = TIMING.speed, transitionMs: number = TIMING.transitionMs): Timing => ({
    speed: options.speed ?? speed,
    cycles: options.cycles ?? cycles,
    transitionMs: options.transitionMs ?? transitionMs,
  });

  switch (type) {
    case "left_turn":
      return { kind: "turn", type, side: "LEFT", ...timing(TIMING.cycles) };
    case "right_turn":
      return { kind: "turn", type, side: "RIGHT", ...timing(TIMING.cycles) };
    case "lane_change_left":
      return { kind: "turn", type, side: "LEFT", ...timing(TIMING.shortCycles) };
    case "lane_change_right":
      return { kind: "turn", type, side: "RIGHT", ...timing(TIMING.shortCycles) };
    case "hazard":
      return { kind: "flash", type, ...timing(TIMING.cycles) };
    case "thank_you":
      return { kind: "flash", type, ...timing(TIMING.shortCycles) };
    case "emergency":
      return {
        kind: "flash",
        type,
        ...timing(TIMING.cycles * 2, TIMING.fastSpeed, Math.floor(TIMING.transitionMs / 2)),
      };
    case "forward":
    case "reverse":
      return {
        kind: "move",
        type,
        direction: type,
        speed: options.speed ?? TIMING.slowSpeed,
        transitionMs: options.transitionMs ?? TIMING.transitionMs,
      };
  }
}
