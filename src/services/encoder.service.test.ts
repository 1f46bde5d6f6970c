import { describe, it, expect } from 'vitest';
import type { ResolvedProfile } from '../models/device-profile.model';
import { BLACK, createRaster } from '../utils/raster';
import { CatPrinterEncoder, crc8, frame, packRow } from './encoder.service';

const profile: ResolvedProfile = { model: 'GB01', widthDots: 8, imageMtuBytes: 20, writeIntervalMs: 4 };

describe('crc8', () => {
  it('matches the standard check value', () => {
    expect(crc8(Buffer.from('123456789'))).toBe(0xf4);
  });

  it('hashes command payloads', () => {
    expect(crc8([])).toBe(0x00);
    expect(crc8([0x01])).toBe(0x07);
    expect(crc8([0x33])).toBe(0x99);
    expect(crc8([0x00, 0x30])).toBe(0x90);
    expect(crc8([0x01, 0x02, 0x03])).toBe(0x48);
  });
});

describe('frame', () => {
  it('wraps the payload with header, length, checksum and trailer', () => {
    expect([...frame(0xa4, [0x33])]).toEqual([0x51, 0x78, 0xa4, 0x00, 0x01, 0x00, 0x33, 0x99, 0xff]);
  });

  it('rejects payloads over 255 bytes', () => {
    expect(() => frame(0xa2, new Uint8Array(256))).toThrow(RangeError);
  });
});

describe('packRow', () => {
  it('packs the leftmost dot into the least significant bit', () => {
    const image = createRaster(10, 1);
    image.data[0] = BLACK;
    image.data[9] = BLACK;
    expect([...packRow(image, 0, 16)]).toEqual([0x01, 0x02]);
  });

  it('prints dots darker than the threshold only', () => {
    const image = createRaster(8, 1);
    image.data[1] = 127;
    image.data[2] = 128;
    expect([...packRow(image, 0, 8)]).toEqual([0x02]);
  });

  it('reads the requested row', () => {
    const image = createRaster(8, 2);
    image.data[8 + 7] = BLACK;
    expect([...packRow(image, 0, 8)]).toEqual([0x00]);
    expect([...packRow(image, 1, 8)]).toEqual([0x80]);
  });
});

describe('CatPrinterEncoder', () => {
  const encoder = new CatPrinterEncoder();

  it('emits setup, one frame per row, feed and lattice end', () => {
    const bytes = encoder.encode(createRaster(8, 2, BLACK), profile);
    expect(bytes.length).toBe(94);

    expect([...bytes.subarray(0, 9)]).toEqual([0x51, 0x78, 0xa4, 0x00, 0x01, 0x00, 0x33, 0x99, 0xff]);
    expect([...bytes.subarray(9, 19)]).toEqual([0x51, 0x78, 0xaf, 0x00, 0x02, 0x00, 0x00, 0x30, 0x90, 0xff]);
    expect(bytes[30]).toBe(0xa6);

    const row = [0x51, 0x78, 0xa2, 0x00, 0x01, 0x00, 0xff, 0xf3, 0xff];
    expect([...bytes.subarray(47, 56)]).toEqual(row);
    expect([...bytes.subarray(56, 65)]).toEqual(row);

    expect([...bytes.subarray(65, 75)]).toEqual([0x51, 0x78, 0xa1, 0x00, 0x02, 0x00, 0x5a, 0x00, 0x8e, 0xff]);
    expect(bytes[77]).toBe(0xa6);
    expect(bytes[bytes.length - 1]).toBe(0xff);
  });

  it('sizes each row to the printer width', () => {
    const bytes = encoder.encode(createRaster(384, 1), { ...profile, widthDots: 384 });
    // 47 setup + (6 + 48 + 2) row + 10 feed + 19 end
    expect(bytes.length).toBe(47 + 56 + 10 + 19);
  });
});
