import { z } from "zod";
import type { ControllerOptions } from "./core/controller.js";
import { parseRgb } from "./util/codec.js";
import type { LogLevel } from "./util/logger.js";

const flag = z
  .string()
  .optional()
  .transform((v) => /^true$/i.test(v ?? "false"));

const ms = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const rgbText = z
  .string()
  .optional()
  .transform((v, ctx) => {
    if (!v) return undefined;
    try {
      return parseRgb(v);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  });

const EnvSchema = z
  .object({
    LED_TRANSPORT: z.enum(["dry-run", "gateway"]).default("dry-run"),
    LED_GATEWAY_URL: z.string().url().optional(),
    LED_GATEWAY_TOKEN: z.string().optional(),
    LED_SERVICE_UUID: z.string().default("4fafc201-1fb5-459e-8fcc-c5c9c331914b"),
    LED_CHARACTERISTIC_UUID: z.string().default("beb5483e-36e1-4688-b7f5-ea07361b26a8"),
    LED_LEFT_NAME: z.string().min(1).default("LED_LEFT"),
    LED_RIGHT_NAME: z.string().min(1).default("LED_RIGHT"),
    LED_COMMAND_INTERVAL_MS: ms(100),
    LED_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LED_DISCOVER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LED_AMBIENT_TRANSITION_MS: ms(100),
    LED_AMBIENT_MAX_FPS: z.coerce.number().positive().default(25),
    LED_AFTER_ANIMATION_COLOR: rgbText,
    LED_AFTER_ANIMATION_STEP_MS: ms(100),
    LED_HEALTH_CHECK_MS: ms(0),
    LED_AUTO_RECONNECT: flag,
    LED_AUTO_CONNECT: flag,
    LED_RATE_RPS: z.coerce.number().positive().default(10),
    LED_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.LED_TRANSPORT === "gateway" && !env.LED_GATEWAY_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LED_GATEWAY_URL"],
        message: "required when LED_TRANSPORT=gateway",
      });
    }
  });

export type AppConfig = {
  transport:
    | { kind: "dry-run" }
    | { kind: "gateway"; baseUrl: string; token?: string; serviceUuid: string; characteristicUuid: string };
  controller: ControllerOptions;
  autoConnect: boolean;
  rateRps: number;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `  - ${i.path.join(".") || "env"}: ${i.message}`);
    throw new Error(`Configuration errors:\n${lines.join("\n")}`);
  }
  const e = parsed.data;
  return {
    transport:
      e.LED_TRANSPORT === "gateway" && e.LED_GATEWAY_URL
        ? {
            kind: "gateway",
            baseUrl: e.LED_GATEWAY_URL,
            token: e.LED_GATEWAY_TOKEN,
            serviceUuid: e.LED_SERVICE_UUID,
            characteristicUuid: e.LED_CHARACTERISTIC_UUID,
          }
        : { kind: "dry-run" },
    controller: {
      deviceNames: { LEFT: e.LED_LEFT_NAME, RIGHT: e.LED_RIGHT_NAME },
      commandIntervalMs: e.LED_COMMAND_INTERVAL_MS,
      commandTimeoutMs: e.LED_COMMAND_TIMEOUT_MS,
      discoverTimeoutMs: e.LED_DISCOVER_TIMEOUT_MS,
      ambientTransitionMs: e.LED_AMBIENT_TRANSITION_MS,
      ambientMaxFps: e.LED_AMBIENT_MAX_FPS,
      afterAnimation: e.LED_AFTER_ANIMATION_COLOR
        ? { enabled: true, color: e.LED_AFTER_ANIMATION_COLOR }
        : { enabled: false, color: { r: 255, g: 255, b: 255 } },
      afterAnimationStepMs: e.LED_AFTER_ANIMATION_STEP_MS,
      settleTimeoutMs: 500,
      healthCheckMs: e.LED_HEALTH_CHECK_MS,
      autoReconnect: e.LED_AUTO_RECONNECT,
    },
    autoConnect: e.LED_AUTO_CONNECT,
    rateRps: e.LED_RATE_RPS,
    logLevel: e.LED_LOG_LEVEL,
  };
}
