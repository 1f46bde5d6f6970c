/**
 * Command encoder for "cat printer" style thermal printers.
 *
 * Every command is framed as:
 *   51 78 <cmd> 00 <len> 00 <data...> <crc8(data)> FF
 *
 * Image rows are packed 8 dots per byte, least significant bit = leftmost dot.
 * A dot prints when its gray value is below PRINT_THRESHOLD.
 */

import type { ResolvedProfile } from '../models/device-profile.model';
import type { RasterImage } from '../utils/raster';

/** Turns a raster into the byte stream one printer model understands */
export interface CommandEncoder {
  encode(image: RasterImage, profile: ResolvedProfile): Buffer;
}

// ── Commands ──

const CMD_FEED_PAPER = 0xa1;
const CMD_DRAW_BITMAP = 0xa2;
const CMD_SET_QUALITY = 0xa4;
const CMD_LATTICE = 0xa6;
const CMD_SET_ENERGY = 0xaf;
const CMD_DRAWING_MODE = 0xbe;

const LATTICE_START = [0xaa, 0x55, 0x17, 0x38, 0x44, 0x5f, 0x5f, 0x5f, 0x44, 0x38, 0x2c];
const LATTICE_END = [0xaa, 0x55, 0x17, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x17];

const QUALITY_DEFAULT = 0x33;
const ENERGY_DEFAULT = 0x3000;
const DRAWING_MODE_IMAGE = 0x00;

/** Blank feed after the image so the label clears the tear bar */
const TRAILING_FEED_LINES = 90;

export const PRINT_THRESHOLD = 128;

// ── CRC ──

const CRC8_TABLE = (() => {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x80 ? ((crc << 1) ^ 0x07) & 0xff : (crc << 1) & 0xff;
    }
    table[i] = crc;
  }
  return table;
})();

/** CRC-8, polynomial 0x07, initial value 0 */
export function crc8(data: Uint8Array | readonly number[]): number {
  let crc = 0;
  for (const byte of data) {
    crc = CRC8_TABLE[(crc ^ byte) & 0xff];
  }
  return crc;
}

/** Frame one command */
export function frame(command: number, data: Uint8Array | readonly number[]): Buffer {
  if (data.length > 0xff) {
    throw new RangeError(`Command payload too long: ${data.length} bytes`);
  }
  return Buffer.from([0x51, 0x78, command, 0x00, data.length, 0x00, ...data, crc8(data), 0xff]);
}

function uint16le(value: number): number[] {
  return [value & 0xff, (value >> 8) & 0xff];
}

/** Pack one raster row into bytes, LSB first */
export function packRow(image: RasterImage, row: number, widthDots: number): Uint8Array {
  const out = new Uint8Array(Math.ceil(widthDots / 8));
  const offset = row * image.width;
  const limit = Math.min(widthDots, image.width);
  for (let x = 0; x < limit; x++) {
    if (image.data[offset + x] < PRINT_THRESHOLD) {
      out[x >> 3] |= 1 << (x & 7);
    }
  }
  return out;
}

export class CatPrinterEncoder implements CommandEncoder {
  encode(image: RasterImage, profile: ResolvedProfile): Buffer {
    const parts: Buffer[] = [
      frame(CMD_SET_QUALITY, [QUALITY_DEFAULT]),
      frame(CMD_SET_ENERGY, uint16le(ENERGY_DEFAULT)),
      frame(CMD_DRAWING_MODE, [DRAWING_MODE_IMAGE]),
      frame(CMD_LATTICE, LATTICE_START),
    ];

    for (let row = 0; row < image.height; row++) {
      parts.push(frame(CMD_DRAW_BITMAP, packRow(image, row, profile.widthDots)));
    }

    parts.push(frame(CMD_FEED_PAPER, uint16le(TRAILING_FEED_LINES)));
    parts.push(frame(CMD_LATTICE, LATTICE_END));
    return Buffer.concat(parts);
  }
}
