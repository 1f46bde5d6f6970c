export type TransportKind = 'ble' | 'serial';

/** Per-model constants needed to drive a printer */
export interface DeviceProfile {
  readonly model: string;
  readonly widthDots: number;
  readonly imageMtuBytes?: number;
  readonly writeIntervalMs?: number;
}

/** DeviceProfile with transport defaults applied; what the transports consume */
export interface ResolvedProfile {
  readonly model: string;
  readonly widthDots: number;
  readonly imageMtuBytes: number;
  readonly writeIntervalMs: number;
}

/** Where the printer lives; fixed for the process lifetime */
export interface TargetSpec {
  readonly kind: TransportKind;
  /** BLE name prefix or hardware address, or a serial device path */
  readonly addressOrPath: string;
  readonly modelOverride?: string;
}

/** A printer resolved for one job */
export interface ResolvedDevice {
  readonly kind: TransportKind;
  readonly address: string;
  readonly advertisedName?: string;
  readonly profile: ResolvedProfile;
}

/** One registry entry as stored in data/printer-models.json */
export interface PrinterModelEntry {
  readonly name: string;
  readonly namePrefixes: readonly string[];
  readonly widthDots: number;
  readonly imageMtuBytes?: number;
  readonly writeIntervalMs?: number;
}

export const DEFAULT_BLE_MTU_BYTES = 20;
export const DEFAULT_SERIAL_MTU_BYTES = 180;
export const DEFAULT_WRITE_INTERVAL_MS = 4;
