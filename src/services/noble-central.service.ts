/**
 * BLE central backed by @abandonware/noble.
 *
 * Loaded lazily by the entry point: importing noble pulls in the HCI socket
 * bindings, which only exist on hosts with a Bluetooth adapter.
 */

import noble from '@abandonware/noble';
import type { AdvertisedDevice, BleCentral, BleConnection, ScanOptions } from '../models/link.model';
import { TransportError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const POWER_ON_TIMEOUT_MS = 10_000;

const BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

/** Noble reports SIG-base UUIDs in their 16-bit form */
export function shortUuid(uuid: string): string {
  const n = uuid.toLowerCase().replace(/-/g, '');
  if (n.length === 32 && n.startsWith('0000') && n.endsWith(BASE_UUID_SUFFIX)) {
    return n.slice(4, 8);
  }
  return n;
}

// ── Adapter surface ──

export interface NobleCharacteristic {
  readonly uuid: string;
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
}

/** The part of a noble Peripheral this central drives */
export interface NoblePeripheral {
  readonly id: string;
  readonly address: string;
  readonly advertisement: { readonly localName?: string };
  connectAsync(): Promise<void>;
  discoverSomeServicesAndCharacteristicsAsync(
    serviceUUIDs: string[],
    characteristicUUIDs: string[],
  ): Promise<{ readonly characteristics: readonly NobleCharacteristic[] }>;
  disconnectAsync(): Promise<void>;
}

/** The part of the noble module this central drives */
export interface NobleRadio {
  readonly _state: string;
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  on(event: 'discover', listener: (peripheral: NoblePeripheral) => void): unknown;
  removeListener(event: 'stateChange', listener: (state: string) => void): unknown;
  removeListener(event: 'discover', listener: (peripheral: NoblePeripheral) => void): unknown;
  startScanning(serviceUUIDs: string[], allowDuplicates: boolean, callback?: (error?: Error) => void): void;
  stopScanning(): void;
}

function peripheralAddress(peripheral: NoblePeripheral): string {
  return peripheral.address && peripheral.address !== 'unknown' ? peripheral.address : peripheral.id;
}

export class NobleCentral implements BleCentral {
  /** The last peripheral a scan stopped on; connect() reuses it */
  private target?: { readonly key: string; readonly peripheral: NoblePeripheral };

  constructor(
    private readonly scanTimeoutMs: number,
    private readonly radio: NobleRadio = noble,
  ) {}

  private async waitForPoweredOn(): Promise<void> {
    if (this.radio._state === 'poweredOn') return;

    logger.info('Waiting for Bluetooth to power on...');
    await new Promise<void>((resolve, reject) => {
      const onStateChange = (state: string) => {
        if (state !== 'poweredOn') return;
        clearTimeout(timer);
        this.radio.removeListener('stateChange', onStateChange);
        resolve();
      };
      const timer = setTimeout(() => {
        this.radio.removeListener('stateChange', onStateChange);
        reject(new TransportError(`Bluetooth adapter not powered on after ${POWER_ON_TIMEOUT_MS} ms`));
      }, POWER_ON_TIMEOUT_MS);
      this.radio.on('stateChange', onStateChange);
    });
  }

  async scan(options: ScanOptions): Promise<AdvertisedDevice[]> {
    const { timeoutMs, until, signal } = options;
    signal?.throwIfAborted();
    await this.waitForPoweredOn();
    signal?.throwIfAborted();

    const found: AdvertisedDevice[] = [];
    const keys = new Set<string>();

    return new Promise<AdvertisedDevice[]>((resolve, reject) => {
      let settled = false;

      const cleanup = () => {
        settled = true;
        clearTimeout(timer);
        this.radio.removeListener('discover', onDiscover);
        signal?.removeEventListener('abort', onAbort);
        this.radio.stopScanning();
      };

      const finish = () => {
        if (settled) return;
        cleanup();
        logger.debug({ devices: found.length }, 'BLE scan finished');
        resolve(found);
      };

      const fail = (error: unknown) => {
        if (settled) return;
        cleanup();
        reject(error);
      };

      const onAbort = () => fail(signal?.reason);

      const onDiscover = (peripheral: NoblePeripheral) => {
        const address = peripheralAddress(peripheral);
        const key = address.toLowerCase();
        if (keys.has(key)) return;
        keys.add(key);

        const device: AdvertisedDevice = { address, name: peripheral.advertisement.localName || undefined };
        found.push(device);
        logger.debug({ address: device.address, name: device.name }, 'BLE advertisement');
        if (until?.(device)) {
          this.target = { key, peripheral };
          finish();
        }
      };

      const timer = setTimeout(finish, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.radio.on('discover', onDiscover);
      this.radio.startScanning([], false, (error?: Error) => {
        if (error) fail(new TransportError(`BLE scan failed: ${error.message}`, { cause: error }));
      });
    });
  }

  async connect(address: string, characteristicUuid: string, signal?: AbortSignal): Promise<BleConnection> {
    const key = address.toLowerCase();
    if (this.target?.key !== key) {
      await this.scan({
        timeoutMs: this.scanTimeoutMs,
        until: (d) => d.address.toLowerCase() === key,
        signal,
      });
    }

    const peripheral = this.target?.key === key ? this.target.peripheral : undefined;
    if (!peripheral) {
      throw new TransportError(`BLE device ${address} is not advertising`);
    }

    signal?.throwIfAborted();
    await peripheral.connectAsync();
    logger.debug({ address }, 'BLE connected');

    try {
      const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync([], []);
      const wanted = shortUuid(characteristicUuid);
      const characteristic = characteristics.find((c) => shortUuid(c.uuid) === wanted);
      if (!characteristic) {
        throw new TransportError(`Characteristic ${characteristicUuid} not found on ${address}`);
      }

      return {
        write: (chunk) => characteristic.writeAsync(chunk, true),
        close: () => peripheral.disconnectAsync(),
      };
    } catch (err) {
      try {
        await peripheral.disconnectAsync();
      } catch (closeErr) {
        logger.warn({ address, error: describeError(closeErr) }, 'BLE disconnect after failed setup also failed');
      }
      throw err;
    }
  }
}
