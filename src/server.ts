import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ANIMATION_TYPES } from "./core/animations.js";
import type { LedController } from "./core/controller.js";
import { errorMessage } from "./util/errors.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import { DEVICE_IDS, type DeviceId } from "./util/types.js";

export type ServerOptions = { rateRps: number; version?: string };

const channel = z.number().int().min(0).max(255);
const RgbShape = { r: channel, g: channel, b: channel };
const Device = z.enum(DEVICE_IDS).describe("LEFT or RIGHT device");
const Target = z.enum(["LEFT", "RIGHT", "BOTH"]).describe("LEFT, RIGHT or BOTH");

const CmdSchema = z.discriminatedUnion("name", [
  z.object({ name: z.literal("mode"), value: z.boolean().describe("true = automatic hue cycling") }),
  z.object({ name: z.literal("color"), value: z.object(RgbShape) }),
  z.object({ name: z.literal("hue"), value: channel }),
  z.object({
    name: z.literal("transition"),
    value: z.object({ ...RgbShape, durationMs: z.number().int().min(0) }),
  }),
]);

function text(t: string) {
  return { content: [{ type: "text" as const, text: t }] };
}

function targets(t: DeviceId | "BOTH"): DeviceId[] {
  return t === "BOTH" ? [...DEVICE_IDS] : [t];
}

export function buildServer(controller: LedController, options: ServerOptions): McpServer {
  const server = new McpServer(
    { name: "ledpair-mcp", version: options.version ?? "0.1.0" },
    { capabilities: { logging: {} } }
  );
  const limiter = new TokenBucketLimiter(options.rateRps);

  async function sendOrThrow(deviceId: DeviceId, ok: Promise<boolean>, what: string) {
    if (!(await ok)) throw new Error(`${deviceId}: ${what} was not delivered (see status)`);
    return text(`${deviceId}: ${what} sent.`);
  }

  // ---- TOOLS ----
  server.registerTool("led_status", {
    description: "Connection state, running animation, ambient mode and queue depth.",
    inputSchema: {}
  }, async () => {
    return text(JSON.stringify(controller.status(), null, 2));
  });

  server.registerTool("led_connect", {
    description: "Scan for the configured device(s) and connect.",
    inputSchema: { device: Target }
  }, async ({ device }) => {
    await limiter.take();
    const ids = targets(device);
    const results = await Promise.all(ids.map((id) => controller.connect(id)));
    return text(ids.map((id, i) => `${id}: ${results[i] ? "connected" : "not connected"}`).join("\n"));
  });

  server.registerTool("led_disconnect", {
    description: "Disconnect device(s).",
    inputSchema: { device: Target }
  }, async ({ device }) => {
    await limiter.take();
    const ids = targets(device);
    await Promise.all(ids.map((id) => controller.disconnect(id)));
    return text(`Disconnected ${ids.join(", ")}.`);
  });

  server.registerTool("led_check_connection", {
    description: "Ask the transport whether the link to a device is alive.",
    inputSchema: { device: Device }
  }, async ({ device }) => {
    await limiter.take();
    const alive = await controller.checkConnection(device);
    return text(`${device}: ${alive ? "connected" : "not connected"}`);
  });

  server.registerTool("led_set_color", {
    description: "Set a fixed RGB color (ignored while ambient mode owns color).",
    inputSchema: { device: Device, ...RgbShape }
  }, async ({ device, r, g, b }) => {
    await limiter.take();
    return sendOrThrow(device, controller.sendCommand(device, { name: "color", value: { r, g, b } }), `color rgb(${r},${g},${b})`);
  });

  server.registerTool("led_set_mode", {
    description: "Switch between fixed color (auto=false) and automatic hue cycling (auto=true).",
    inputSchema: { device: Device, auto: z.boolean() }
  }, async ({ device, auto }) => {
    await limiter.take();
    return sendOrThrow(device, controller.sendCommand(device, { name: "mode", value: auto }), `mode ${auto ? "auto" : "fixed"}`);
  });

  server.registerTool("led_set_hue", {
    description: "Set hue (0-255).",
    inputSchema: { device: Device, hue: channel }
  }, async ({ device, hue }) => {
    await limiter.take();
    return sendOrThrow(device, controller.sendCommand(device, { name: "hue", value: hue }), `hue ${hue}`);
  });

  server.registerTool("led_set_transition", {
    description: "Fade to an RGB color over durationMs.",
    inputSchema: { device: Device, ...RgbShape, durationMs: z.number().int().min(0) }
  }, async ({ device, r, g, b, durationMs }) => {
    await limiter.take();
    return sendOrThrow(
      device,
      controller.sendCommand(device, { name: "transition", value: { r, g, b, durationMs } }),
      `transition to rgb(${r},${g},${b}) over ${durationMs}ms`
    );
  });

  server.registerTool("led_apply_settings", {
    description: "Apply mode/color settings to one device, or to BOTH at the same instant.",
    inputSchema: {
      device: Target,
      autoMode: z.boolean(),
      color: z.object(RgbShape).optional().describe("fixed-mode color; defaults to off"),
    }
  }, async ({ device, autoMode, color }) => {
    await limiter.take();
    const settings = { autoMode, color };
    const ok = device === "BOTH"
      ? await controller.applySettingsToBoth(settings)
      : await controller.applySettings(device, settings);
    if (!ok) throw new Error(`Settings were not applied to ${device}`);
    return text(`Applied ${autoMode ? "automatic hue" : "fixed color"} mode to ${device}.`);
  });

  server.registerTool("led_send_simultaneously", {
    description: "Send one command per device so they take effect together.",
    inputSchema: {
      items: z.array(z.object({ device: Device, cmd: CmdSchema })).min(1)
    }
  }, async ({ items }) => {
    await limiter.take();
    const ok = await controller.sendSimultaneously(items.map((it) => ({ deviceId: it.device, cmd: it.cmd })));
    if (!ok) throw new Error("Simultaneous send failed for at least one device");
    return text(`Sent ${items.length} command(s) simultaneously.`);
  });

  server.registerTool("led_start_animation", {
    description: "Start a choreographed sequence; replaces any running one.",
    inputSchema: {
      type: z.enum(ANIMATION_TYPES),
      speed: z.number().positive().optional().describe("seconds per half-cycle"),
      cycles: z.number().int().positive().optional(),
      transitionMs: z.number().int().min(0).optional(),
    }
  }, async ({ type, speed, cycles, transitionMs }) => {
    await limiter.take();
    const started = await controller.startAnimation(type, { speed, cycles, transitionMs });
    if (!started) throw new Error(`Animation ${type} was rejected`);
    return text(`${type} animation started.`);
  });

  server.registerTool("led_stop_animation", {
    description: "Stop the running animation and park the devices.",
    inputSchema: {}
  }, async () => {
    await limiter.take();
    await controller.stopAnimation();
    return text("Animation stopped.");
  });

  server.registerTool("led_set_animation_color", {
    description: "Override the color an animation type uses.",
    inputSchema: { type: z.enum(ANIMATION_TYPES), ...RgbShape }
  }, async ({ type, r, g, b }) => {
    controller.setAnimationColor(type, { r, g, b });
    return text(`${type} color set to rgb(${r},${g},${b}).`);
  });

  server.registerTool("led_set_after_animation", {
    description: "Resting color after an animation; disabled means near-off.",
    inputSchema: { enabled: z.boolean(), ...RgbShape }
  }, async ({ enabled, r, g, b }) => {
    controller.setAfterAnimationColor({ enabled, color: { r, g, b } });
    return text(enabled ? `Devices will rest at rgb(${r},${g},${b}).` : "Devices will rest near-off.");
  });

  server.registerTool("led_set_ambient_mode", {
    description: "Let an external color producer own both devices' color.",
    inputSchema: { enabled: z.boolean() }
  }, async ({ enabled }) => {
    await controller.setAmbientMode(enabled);
    return text(`Ambient mode ${enabled ? "on" : "off"}.`);
  });

  server.registerTool("led_update_ambient_color", {
    description: "Push one ambient color frame (dropped when ambient mode is off or over the frame budget).",
    inputSchema: { ...RgbShape }
  }, async ({ r, g, b }) => {
    const sent = await controller.updateAmbientColor({ r, g, b });
    return text(sent ? `Ambient rgb(${r},${g},${b}) sent.` : "Ambient frame dropped.");
  });

  forwardNotifications(server, controller);
  return server;
}

/** Relays controller notifications to the connected MCP client as log messages. */
function forwardNotifications(server: McpServer, controller: LedController) {
  const send = (level: "info" | "warning" | "error", data: string) => {
    if (!server.isConnected()) return;
    server.server.sendLoggingMessage({ level, logger: "ledpair", data }).catch((err: unknown) => {
      console.error(`[server] could not forward notification: ${errorMessage(err)}`);
    });
  };
  const n = controller.notifier;
  n.subscribe("connection", (id, connected) => send("info", `${id} ${connected ? "connected" : "disconnected"}`));
  n.subscribe("command", (id, ok, message) => {
    if (!ok) send("warning", `${id}: ${message}`);
  });
  n.subscribe("animationStarted", (type) => send("info", `animation started: ${type}`));
  n.subscribe("animationStopped", (type) => send("info", `animation stopped: ${type}`));
  n.subscribe("status", (message) => send("info", message));
  n.subscribe("failure", (err) => send("error", err.message));
}
