import { createLogger, type Logger } from "../util/logger.js";
import type { DiscoveredDevice, TransportHandle, TransportPort } from "../util/types.js";

export type WriteRecord = { address: string; name: string; wire: string; at: number };

type SimDevice = DiscoveredDevice & {
  linked: boolean;
  failWith: Error | null;
  hang: boolean;
};

/**
 * In-process stand-in for the radio: devices are simulated, every write is
 * recorded. Backs dry-run mode (LED_TRANSPORT=dry-run) and the test suite.
 */
export class MemoryAdapter implements TransportPort {
  readonly writes: WriteRecord[] = [];
  private devices = new Map<string, SimDevice>();
  private log: Logger | null;

  constructor(devices: DiscoveredDevice[], log: Logger | null = null) {
    for (const d of devices) {
      this.devices.set(d.address, { ...d, linked: false, failWith: null, hang: false });
    }
    this.log = log;
  }

  async discover(_timeoutMs: number): Promise<DiscoveredDevice[]> {
    return [...this.devices.values()].map(({ name, address }) => ({ name, address }));
  }

  async connect(address: string, _timeoutMs: number): Promise<TransportHandle> {
    const device = this.device(address);
    device.linked = true;
    this.log?.info(`[DRY-RUN] connected ${device.name} (${address})`);
    return new MemoryHandle(device, (wire) => {
      this.writes.push({ address, name: device.name, wire, at: Date.now() });
      this.log?.info(`[DRY-RUN] ${device.name} <- ${wire}`);
    });
  }

  /** Makes every later write to `address` reject with `err` (null clears it). */
  failWrites(address: string, err: Error | null = new Error("GATT write failed")) {
    this.device(address).failWith = err;
  }

  /** Makes every later write to `address` never settle. */
  hangWrites(address: string, hang = true) {
    this.device(address).hang = hang;
  }

  /** Simulates the radio link dropping without a disconnect call. */
  dropLink(address: string) {
    this.device(address).linked = false;
  }

  wiresFor(name: string): string[] {
    return this.writes.filter((w) => w.name === name).map((w) => w.wire);
  }

  private device(address: string): SimDevice {
    const device = this.devices.get(address);
    if (!device) throw new Error(`No simulated device at ${address}`);
    return device;
  }
}

class MemoryHandle implements TransportHandle {
  constructor(
    private readonly device: SimDevice,
    private readonly record: (wire: string) => void
  ) {}

  get address(): string {
    return this.device.address;
  }

  async isConnected(): Promise<boolean> {
    return this.device.linked;
  }

  write(data: Uint8Array): Promise<void> {
    if (this.device.hang) return new Promise<void>(() => {});
    if (!this.device.linked) return Promise.reject(new Error("Not connected"));
    if (this.device.failWith) return Promise.reject(this.device.failWith);
    this.record(new TextDecoder().decode(data));
    return Promise.resolve();
  }

  async disconnect(): Promise<void> {
    this.device.linked = false;
  }
}

export function dryRunAdapter(names: string[], log: Logger = createLogger("dry-run")): MemoryAdapter {
  return new MemoryAdapter(
    names.map((name, i) => ({ name, address: `SIM:00:00:00:00:0${i + 1}` })),
    log
  );
}
