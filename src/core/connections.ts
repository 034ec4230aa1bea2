import type { Notifier } from "../util/events.js";
import { DEVICE_IDS, type DeviceId, type TransportHandle } from "../util/types.js";

type Entry = {
  address: string | null;
  handle: TransportHandle | null;
};

/**
 * Per-device link bookkeeping. Every mutator is synchronous, so each update
 * lands atomically on the event loop; `connected` is derived from the handle
 * and therefore can never disagree with it.
 */
export class ConnectionRegistry {
  private entries: Record<DeviceId, Entry> = {
    LEFT: { address: null, handle: null },
    RIGHT: { address: null, handle: null },
  };

  constructor(private readonly notifier: Notifier) {}

  isConnected(id: DeviceId): boolean {
    return this.entries[id].handle !== null;
  }

  handle(id: DeviceId): TransportHandle | null {
    return this.entries[id].handle;
  }

  address(id: DeviceId): string | null {
    return this.entries[id].address;
  }

  connectedIds(): DeviceId[] {
    return DEVICE_IDS.filter((id) => this.isConnected(id));
  }

  rememberAddress(id: DeviceId, address: string) {
    this.entries[id].address = address;
  }

  attach(id: DeviceId, handle: TransportHandle) {
    const entry = this.entries[id];
    const was = entry.handle !== null;
    entry.address = handle.address;
    entry.handle = handle;
    if (!was) this.notifier.notify("connection", id, true);
  }

  /** Forgets the handle; the address is kept so the device can be reconnected. Returns the dropped handle. */
  detach(id: DeviceId): TransportHandle | null {
    const entry = this.entries[id];
    const dropped = entry.handle;
    entry.handle = null;
    if (dropped) this.notifier.notify("connection", id, false);
    return dropped;
  }
}
