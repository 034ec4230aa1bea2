import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { DiscoveredDevice, TransportHandle, TransportPort } from "../util/types.js";

export type GatewayOptions = {
  baseUrl: string;
  token?: string;
  serviceUuid: string;
  characteristicUuid: string;
  /** undici dispatcher override (connection pool, proxy, or a MockAgent in tests). */
  dispatcher?: Dispatcher;
};

export class GatewayError extends Error {
  constructor(readonly status: number, path: string) {
    super(`Gateway error ${status}: ${path} failed`);
    this.name = "GatewayError";
  }
}

const DevicesResp = z.object({
  devices: z.array(z.object({ name: z.string().optional(), address: z.string() })).default([]),
});

const LinkResp = z.object({ connected: z.boolean() });

/**
 * Reaches the devices through an HTTP-to-BLE gateway that holds the radio:
 *   GET  /devices?timeoutMs=        scan
 *   POST /devices/:address/connect
 *   GET  /devices/:address          link state
 *   POST /devices/:address/write    { service, characteristic, data (base64) }
 *   POST /devices/:address/disconnect
 */
export class GatewayAdapter implements TransportPort {
  constructor(private readonly options: GatewayOptions) {}

  private headers(): Record<string, string> {
    const h: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.token) h.Authorization = `Bearer ${this.options.token}`;
    return h;
  }

  async request(method: "GET" | "POST", path: string, payload?: unknown): Promise<unknown> {
    const res = await fetch(`${this.options.baseUrl.replace(/\/+$/, "")}${path}`, {
      method,
      headers: this.headers(),
      body: method === "POST" ? JSON.stringify(payload ?? {}) : undefined,
      dispatcher: this.options.dispatcher,
    });
    if (!res.ok) {
      await res.body?.cancel();
      throw new GatewayError(res.status, path);
    }
    if (res.status === 204) return null;
    return res.json();
  }

  async discover(timeoutMs: number): Promise<DiscoveredDevice[]> {
    const out = DevicesResp.parse(await this.request("GET", `/devices?timeoutMs=${timeoutMs}`));
    // Unnamed advertisers can never match a configured device name.
    return out.devices.flatMap((d) => (d.name ? [{ name: d.name, address: d.address }] : []));
  }

  async connect(address: string, timeoutMs: number): Promise<TransportHandle> {
    const out = LinkResp.parse(await this.request("POST", `${devicePath(address)}/connect`, { timeoutMs }));
    if (!out.connected) throw new Error(`Gateway could not connect to ${address}`);
    return new GatewayHandle(this, address, this.options);
  }
}

class GatewayHandle implements TransportHandle {
  constructor(
    private readonly gateway: GatewayAdapter,
    readonly address: string,
    private readonly options: GatewayOptions
  ) {}

  async isConnected(): Promise<boolean> {
    const out = LinkResp.parse(await this.gateway.request("GET", devicePath(this.address)));
    return out.connected;
  }

  async write(data: Uint8Array): Promise<void> {
    await this.gateway.request("POST", `${devicePath(this.address)}/write`, {
      service: this.options.serviceUuid,
      characteristic: this.options.characteristicUuid,
      data: Buffer.from(data).toString("base64"),
    });
  }

  async disconnect(): Promise<void> {
    await this.gateway.request("POST", `${devicePath(this.address)}/disconnect`);
  }
}

function devicePath(address: string): string {
  return `/devices/${encodeURIComponent(address)}`;
}
