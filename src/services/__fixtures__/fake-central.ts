import type { AdvertisedDevice, BleCentral, BleConnection, ScanOptions } from '../../models/link.model';

/** In-process BLE adapter: fixed advertisements, recorded writes */
export class FakeCentral implements BleCentral {
  readonly scans: ScanOptions[] = [];
  readonly connects: Array<{ address: string; characteristicUuid: string }> = [];
  readonly written: Buffer[] = [];
  /** 'connect' and 'close' in the order they happened */
  readonly linkEvents: string[] = [];
  closed = 0;
  connectError?: Error;
  /** Fail the write with this zero-based index */
  failWriteAt?: number;
  /** Called before each write resolves */
  onWrite?: (chunk: Buffer) => Promise<void> | void;

  constructor(private readonly advertisements: readonly AdvertisedDevice[] = []) {}

  async scan(options: ScanOptions): Promise<AdvertisedDevice[]> {
    this.scans.push(options);
    const seen: AdvertisedDevice[] = [];
    for (const device of this.advertisements) {
      seen.push(device);
      if (options.until?.(device)) break;
    }
    return seen;
  }

  async connect(address: string, characteristicUuid: string): Promise<BleConnection> {
    this.connects.push({ address, characteristicUuid });
    if (this.connectError) throw this.connectError;
    this.linkEvents.push('connect');

    return {
      write: async (chunk) => {
        if (this.failWriteAt === this.written.length) {
          throw new Error('GATT write failed');
        }
        await this.onWrite?.(chunk);
        this.written.push(Buffer.from(chunk));
      },
      close: async () => {
        this.closed++;
        this.linkEvents.push('close');
      },
    };
  }
}
