/** A BLE advertisement seen during a discovery scan */
export interface AdvertisedDevice {
  readonly address: string;
  readonly name?: string;
}

/** Open GATT connection to one printer characteristic */
export interface BleConnection {
  /** Write without waiting for a link-layer acknowledgment */
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

export interface ScanOptions {
  readonly timeoutMs: number;
  /** Stop early once an advertisement satisfies this predicate */
  readonly until?: (device: AdvertisedDevice) => boolean;
  readonly signal?: AbortSignal;
}

/** The host's BLE adapter */
export interface BleCentral {
  /** Advertisements in the order they were first seen */
  scan(options: ScanOptions): Promise<AdvertisedDevice[]>;
  connect(address: string, characteristicUuid: string, signal?: AbortSignal): Promise<BleConnection>;
}

/** Open serial port */
export interface SerialLink {
  /** Resolves once the chunk has been handed to the OS and drained */
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

export type SerialLinkFactory = (path: string, baudRate: number) => Promise<SerialLink>;
