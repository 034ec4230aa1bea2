#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GatewayAdapter } from "./adapters/gateway.js";
import { dryRunAdapter } from "./adapters/memory.js";
import { loadConfig } from "./config.js";
import { LedController } from "./core/controller.js";
import { buildServer } from "./server.js";
import { DEVICE_IDS, type TransportPort } from "./util/types.js";
import { createLogger, setLogLevel } from "./util/logger.js";

const log = createLogger("ledpair");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const t = config.transport;
  const transport: TransportPort =
    t.kind === "gateway"
      ? new GatewayAdapter({
          baseUrl: t.baseUrl,
          token: t.token,
          serviceUuid: t.serviceUuid,
          characteristicUuid: t.characteristicUuid,
        })
      : dryRunAdapter(DEVICE_IDS.map((id) => config.controller.deviceNames[id]));

  const controller = new LedController(transport, config.controller, log.child("controller"));
  controller.start();

  if (config.autoConnect) {
    const results = await Promise.all(DEVICE_IDS.map((id) => controller.connect(id)));
    log.info(`auto-connect: ${DEVICE_IDS.map((id, i) => `${id}=${results[i] ? "ok" : "missing"}`).join(" ")}`);
  }

  const server = buildServer(controller, { rateRps: config.rateRps });
  const stdio = new StdioServerTransport();
  await server.connect(stdio);
  log.info(`ledpair-mcp server running (stdio, transport=${t.kind})`);

  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    log.info("shutting down...");
    await controller.stop();
    await server.close();
    process.exit(0);
  };
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown().catch((e: unknown) => {
        console.error(e);
        process.exit(1);
      });
    });
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
