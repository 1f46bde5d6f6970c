import os from 'os';
import path from 'path';
import fs from 'fs';
import { afterAll, describe, it, expect } from 'vitest';
import { RenderError } from '../utils/errors';
import { createRaster, getPixel, WHITE } from '../utils/raster';
import { CELL_WIDTH, columnsForWidth, drawTextLine, fitFont, locateFont } from './bitmap-font.service';
import { createMonoFont } from './__fixtures__/mono-font';

describe('columnsForWidth', () => {
  it('divides the width into fixed cells', () => {
    expect(CELL_WIDTH).toBe(12);
    expect(columnsForWidth(384)).toBe(32);
    expect(columnsForWidth(192)).toBe(16);
    expect(columnsForWidth(200)).toBe(16);
  });

  it('never returns fewer than one column', () => {
    expect(columnsForWidth(5)).toBe(1);
  });
});

describe('fitFont', () => {
  const font = createMonoFont();

  it('picks the largest size where every column fits', () => {
    const fitted = fitFont(font, 384, 32);
    expect(fitted.size).toBe(24);
    expect(fitted.advance).toBe(12);
    expect(fitted.ascent).toBeCloseTo(19.2);
    expect(fitted.lineHeight).toBe(24);
  });

  it('allows fractional column advances', () => {
    const fitted = fitFont(font, 100, 8);
    expect(fitted.size).toBe(25);
    expect(fitted.advance).toBe(12.5);
    expect(fitted.lineHeight).toBe(25);
  });

  it('bottoms out at size 1', () => {
    expect(fitFont(font, 1, 32).size).toBe(1);
  });
});

describe('drawTextLine', () => {
  const fitted = fitFont(createMonoFont(), 384, 32);

  it('paints each glyph inside its own column', () => {
    const target = createRaster(384, 24);
    drawTextLine(target, fitted, 'A B', 0, 0);

    // Box glyph covers x 1..10 and y 2..19 of a 12 × 24 cell
    expect(getPixel(target, 5, 10)).toBe(0);
    expect(getPixel(target, 1, 2)).toBe(0);
    expect(getPixel(target, 10, 19)).toBe(0);
    expect(getPixel(target, 0, 10)).toBe(WHITE);
    expect(getPixel(target, 11, 10)).toBe(WHITE);
    expect(getPixel(target, 5, 1)).toBe(WHITE);
    expect(getPixel(target, 5, 20)).toBe(WHITE);

    // Column 1 is a space
    expect(getPixel(target, 17, 10)).toBe(WHITE);
    expect(getPixel(target, 29, 10)).toBe(0);
  });

  it('offsets the line by its origin', () => {
    const target = createRaster(384, 48);
    drawTextLine(target, fitted, 'A', 24, 24);
    expect(getPixel(target, 5, 10)).toBe(WHITE);
    expect(getPixel(target, 29, 34)).toBe(0);
  });

  it('draws nothing for a blank line', () => {
    const target = createRaster(48, 24);
    drawTextLine(target, fitted, '    ', 0, 0);
    expect(target.data.every((v) => v === WHITE)).toBe(true);
  });
});

describe('locateFont', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'font-test-'));
  const present = path.join(dir, 'present.ttf');
  fs.writeFileSync(present, 'placeholder');

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns an explicit path that exists', () => {
    expect(locateFont(present, [])).toBe(present);
  });

  it('rejects an explicit path that does not exist', () => {
    expect(() => locateFont(path.join(dir, 'missing.ttf'))).toThrow(RenderError);
  });

  it('takes the first existing candidate', () => {
    expect(locateFont(undefined, [path.join(dir, 'missing.ttf'), present])).toBe(present);
  });

  it('fails when no candidate exists', () => {
    expect(() => locateFont(undefined, [path.join(dir, 'missing.ttf')])).toThrow(
      'No monospace bold font found; set FONT_PATH to a TrueType font'
    );
  });
});
