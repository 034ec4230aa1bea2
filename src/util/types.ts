export const DEVICE_IDS = ["LEFT", "RIGHT"] as const;

export type DeviceId = (typeof DEVICE_IDS)[number];

export type Rgb = { r: number; g: number; b: number }; // each 0–255

export type ControlCmd =
  | { name: "mode"; value: boolean } // true = automatic hue cycling, false = fixed color
  | { name: "color"; value: Rgb }
  | { name: "hue"; value: number } // 0–255
  | { name: "transition"; value: Rgb & { durationMs: number } };

export type CommandName = ControlCmd["name"];

export type Command = {
  readonly deviceId: DeviceId;
  readonly cmd: ControlCmd;
  readonly enqueuedAt: number;
  readonly onComplete?: (ok: boolean) => void;
};

export type BatchItem = { deviceId: DeviceId; cmd: ControlCmd };

/** `color` is used only in fixed mode; automatic mode cycles hue on the device. */
export type Settings = {
  autoMode: boolean;
  color?: Rgb;
};

export type DiscoveredDevice = { name: string; address: string };

/** Live link to one device, as handed out by {@link TransportPort.connect}. */
export interface TransportHandle {
  readonly address: string;
  isConnected(): Promise<boolean>;
  /** Resolves once the bytes are on the link; rejects on any transport failure. */
  write(data: Uint8Array): Promise<void>;
  disconnect(): Promise<void>;
}

export interface TransportPort {
  discover(timeoutMs: number): Promise<DiscoveredDevice[]>;
  connect(address: string, timeoutMs: number): Promise<TransportHandle>;
}

export type DeviceStatus = {
  deviceId: DeviceId;
  name: string;
  address: string | null;
  connected: boolean;
};
