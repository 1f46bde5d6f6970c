import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { TransportError } from '../utils/errors';
import { NobleCentral, shortUuid, type NobleCharacteristic, type NoblePeripheral, type NobleRadio } from './noble-central.service';

// The real module binds to the HCI socket on import
vi.mock('@abandonware/noble', () => ({ default: {} }));

const WRITE_UUID = '0000ae01-0000-1000-8000-00805f9b34fb';

class FakeCharacteristic implements NobleCharacteristic {
  readonly writes: Array<{ data: number[]; withoutResponse: boolean }> = [];

  constructor(readonly uuid: string) {}

  async writeAsync(data: Buffer, withoutResponse: boolean): Promise<void> {
    this.writes.push({ data: [...data], withoutResponse });
  }
}

class FakePeripheral implements NoblePeripheral {
  readonly advertisement: { localName?: string };
  characteristics: FakeCharacteristic[] = [new FakeCharacteristic('ae01')];
  readonly connectAsync = vi.fn(async () => {});
  readonly disconnectAsync = vi.fn(async () => {});

  constructor(
    readonly address: string,
    localName?: string,
    readonly id = address.replace(/:/g, '').toLowerCase(),
  ) {
    this.advertisement = { localName };
  }

  async discoverSomeServicesAndCharacteristicsAsync(): Promise<{ characteristics: FakeCharacteristic[] }> {
    return { characteristics: this.characteristics };
  }
}

/** Emits every advertising peripheral as soon as scanning starts */
class FakeRadio extends EventEmitter implements NobleRadio {
  _state = 'poweredOn';
  advertising: FakePeripheral[] = [];
  scanError?: Error;

  readonly startScanning = vi.fn((_uuids: string[], _allowDuplicates: boolean, callback?: (error?: Error) => void) => {
    if (this.scanError) {
      callback?.(this.scanError);
      return;
    }
    callback?.();
    for (const peripheral of this.advertising) this.emit('discover', peripheral);
  });

  readonly stopScanning = vi.fn();
}

function setup(advertising: FakePeripheral[] = []) {
  const radio = new FakeRadio();
  radio.advertising = advertising;
  return { radio, central: new NobleCentral(10, radio) };
}

describe('shortUuid', () => {
  it('reduces SIG-base UUIDs to their 16-bit form', () => {
    expect(shortUuid(WRITE_UUID)).toBe('ae01');
    expect(shortUuid('0000AE0100001000800000805F9B34FB')).toBe('ae01');
  });

  it('leaves vendor UUIDs whole', () => {
    expect(shortUuid('6E400002-B5A3-F393-E0A9-E50E24DCCA9E')).toBe('6e400002b5a3f393e0a9e50e24dcca9e');
  });
});

describe('NobleCentral.scan', () => {
  it('collects each advertiser once until the timeout', async () => {
    const a = new FakePeripheral('AA:BB:CC:DD:EE:01', 'GB01-1');
    const b = new FakePeripheral('unknown', undefined, 'c0ffee');
    const { radio, central } = setup([a, b, a]);

    const found = await central.scan({ timeoutMs: 10 });

    expect(found).toEqual([{ address: 'AA:BB:CC:DD:EE:01', name: 'GB01-1' }, { address: 'c0ffee' }]);
    expect(radio.stopScanning).toHaveBeenCalledTimes(1);
    expect(radio.listenerCount('discover')).toBe(0);
  });

  it('stops on the first advertisement the predicate accepts', async () => {
    const { radio, central } = setup([
      new FakePeripheral('AA:BB:CC:DD:EE:01', 'GB01-1'),
      new FakePeripheral('AA:BB:CC:DD:EE:02', 'GB02-1'),
      new FakePeripheral('AA:BB:CC:DD:EE:03', 'GB03-1'),
    ]);

    const found = await central.scan({ timeoutMs: 10_000, until: (d) => d.name === 'GB02-1' });

    expect(found.map((d) => d.name)).toEqual(['GB01-1', 'GB02-1']);
    expect(radio.stopScanning).toHaveBeenCalledTimes(1);
  });

  it('removes its listener and stops scanning when aborted', async () => {
    const { radio, central } = setup();
    const controller = new AbortController();
    const reason = new Error('job deadline');

    const pending = central.scan({ timeoutMs: 10_000, signal: controller.signal });
    await vi.waitFor(() => expect(radio.startScanning).toHaveBeenCalledTimes(1));
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(radio.listenerCount('discover')).toBe(0);
    expect(radio.stopScanning).toHaveBeenCalledTimes(1);
  });

  it('does not start scanning for an already aborted signal', async () => {
    const { radio, central } = setup();
    const controller = new AbortController();
    controller.abort(new Error('gone'));

    await expect(central.scan({ timeoutMs: 10, signal: controller.signal })).rejects.toThrow('gone');
    expect(radio.startScanning).not.toHaveBeenCalled();
  });

  it('waits for the adapter to power on', async () => {
    const { radio, central } = setup([new FakePeripheral('AA:BB:CC:DD:EE:01')]);
    radio._state = 'poweredOff';

    const pending = central.scan({ timeoutMs: 10 });
    await vi.waitFor(() => expect(radio.listenerCount('stateChange')).toBe(1));
    expect(radio.startScanning).not.toHaveBeenCalled();

    radio._state = 'poweredOn';
    radio.emit('stateChange', 'poweredOn');

    expect(await pending).toEqual([{ address: 'AA:BB:CC:DD:EE:01' }]);
    expect(radio.listenerCount('stateChange')).toBe(0);
  });

  it('reports a scan the adapter refuses', async () => {
    const { radio, central } = setup();
    radio.scanError = new Error('adapter busy');

    const pending = central.scan({ timeoutMs: 10_000 });

    await expect(pending).rejects.toThrow(TransportError);
    await expect(pending).rejects.toThrow('BLE scan failed: adapter busy');
    expect(radio.listenerCount('discover')).toBe(0);
  });
});

describe('NobleCentral.connect', () => {
  it('reuses the device a scan stopped on', async () => {
    const printer = new FakePeripheral('AA:BB:CC:DD:EE:01', 'GB01-1');
    const { radio, central } = setup([printer]);
    await central.scan({ timeoutMs: 10_000, until: (d) => d.name === 'GB01-1' });

    const connection = await central.connect('aa:bb:cc:dd:ee:01', WRITE_UUID);
    await connection.write(Buffer.from([1, 2, 3]));
    await connection.close();

    expect(radio.startScanning).toHaveBeenCalledTimes(1);
    expect(printer.connectAsync).toHaveBeenCalledTimes(1);
    expect(printer.characteristics[0].writes).toEqual([{ data: [1, 2, 3], withoutResponse: true }]);
    expect(printer.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  it.each(['ae01', '0000ae0100001000800000805f9b34fb'])('matches a characteristic reported as %s', async (uuid) => {
    const printer = new FakePeripheral('AA:BB:CC:DD:EE:01');
    printer.characteristics = [new FakeCharacteristic('ae02'), new FakeCharacteristic(uuid)];
    const { central } = setup([printer]);

    const connection = await central.connect('AA:BB:CC:DD:EE:01', WRITE_UUID);
    await connection.write(Buffer.from([9]));

    expect(printer.characteristics[0].writes).toEqual([]);
    expect(printer.characteristics[1].writes).toEqual([{ data: [9], withoutResponse: true }]);
  });

  it('rejects an address that does not advertise within the scan timeout', async () => {
    const { radio, central } = setup([new FakePeripheral('AA:BB:CC:DD:EE:02')]);

    const pending = central.connect('AA:BB:CC:DD:EE:01', WRITE_UUID);

    await expect(pending).rejects.toThrow(TransportError);
    await expect(pending).rejects.toThrow('BLE device AA:BB:CC:DD:EE:01 is not advertising');
    expect(radio.startScanning).toHaveBeenCalledTimes(1);
  });

  it('disconnects when the write characteristic is missing', async () => {
    const printer = new FakePeripheral('AA:BB:CC:DD:EE:01');
    printer.characteristics = [new FakeCharacteristic('ae02')];
    const { central } = setup([printer]);

    await expect(central.connect('AA:BB:CC:DD:EE:01', WRITE_UUID)).rejects.toThrow(
      `Characteristic ${WRITE_UUID} not found on AA:BB:CC:DD:EE:01`,
    );
    expect(printer.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  it('keeps the setup error when the disconnect after it also fails', async () => {
    const printer = new FakePeripheral('AA:BB:CC:DD:EE:01');
    printer.characteristics = [];
    printer.disconnectAsync.mockRejectedValueOnce(new Error('link lost'));
    const { central } = setup([printer]);

    await expect(central.connect('AA:BB:CC:DD:EE:01', WRITE_UUID)).rejects.toThrow(TransportError);
    expect(printer.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  it('does not keep devices a scan merely passed over', async () => {
    const printer = new FakePeripheral('AA:BB:CC:DD:EE:01');
    const { radio, central } = setup([printer, new FakePeripheral('AA:BB:CC:DD:EE:02')]);

    await central.scan({ timeoutMs: 10 });
    await central.connect('AA:BB:CC:DD:EE:01', WRITE_UUID);

    expect(radio.startScanning).toHaveBeenCalledTimes(2);
    expect(printer.connectAsync).toHaveBeenCalledTimes(1);
  });
});
