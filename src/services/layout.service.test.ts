import { describe, it, expect } from 'vitest';
import { RenderError } from '../utils/errors';
import { getPixel, WHITE } from '../utils/raster';
import { compose, renderTextBlock } from './layout.service';
import { createMonoFont } from './__fixtures__/mono-font';

const font = createMonoFont();
const fontSource = () => font;

describe('renderTextBlock', () => {
  it('is one line height tall per output line', () => {
    const block = renderTextBlock('Order #1\nSmashburger\n\nToppings:\n\tCheese\n\tBacon', 384, font);
    expect(block.width).toBe(384);
    expect(block.height).toBe(144);
  });

  it('indents tab-expanded lines by four columns', () => {
    const block = renderTextBlock('Toppings:\n\tCheese', 384, font);
    expect(getPixel(block, 5, 34)).toBe(WHITE);
    expect(getPixel(block, 53, 34)).toBe(0);
  });
});

describe('compose', () => {
  it('renders text-only requests at full width and exact text height', () => {
    const image = compose('Order #1\nSmashburger\n\nToppings:\n\tCheese\n\tBacon', undefined, 384, fontSource);
    expect(image.width).toBe(384);
    expect(image.height).toBe(144);
    expect(getPixel(image, 5, 10)).toBe(0);
  });

  it('flattens structured text before layout', () => {
    const image = compose({ box: 1, shelf: 'A' }, undefined, 384, fontSource);
    expect(image.height).toBe(48);
  });

  it('puts the QR on the left half and centers the text beside it', () => {
    const image = compose('Box 1', 'http://x/box/1', 384, fontSource);
    expect(image.width).toBe(384);
    expect(image.height).toBe(192);

    // QR finder pattern
    expect(getPixel(image, 37, 37)).toBeLessThan(128);

    // One text line of height 24, centered at y = 84
    expect(getPixel(image, 197, 94)).toBe(0);
    expect(getPixel(image, 197, 80)).toBe(WHITE);
    expect(getPixel(image, 197, 110)).toBe(WHITE);
  });

  it('keeps the QR and text regions disjoint', () => {
    const image = compose('   ', 'http://x/box/1', 384, fontSource);
    let black = 0;
    for (let y = 0; y < image.height; y++) {
      for (let x = 0; x < image.width; x++) {
        if (getPixel(image, x, y) < 128) {
          black++;
          expect(x).toBeLessThan(192);
        }
      }
    }
    expect(black).toBeGreaterThan(0);
  });

  it('grows taller than the QR when the text needs it', () => {
    const lines = Array.from({ length: 10 }, (_, i) => `line ${i}`).join('\n');
    const image = compose(lines, 'http://x/box/1', 384, fontSource);
    expect(image.height).toBe(240);
  });

  it('produces a white image when the font draws nothing', () => {
    const blank = createMonoFont({ blank: true });
    const image = compose('Hi', undefined, 384, () => blank);
    expect(image.height).toBe(24);
    expect(image.data.every((v) => v === WHITE)).toBe(true);
  });

  it('rejects widths that cannot hold a layout', () => {
    expect(() => compose('Hi', undefined, 1, fontSource)).toThrow(RenderError);
    expect(() => compose('Hi', undefined, 383.5, fontSource)).toThrow('Invalid printer width: 383.5');
  });

  it('rejects QR payloads that cannot be encoded', () => {
    expect(() => compose('Hi', 'x'.repeat(5000), 384, fontSource)).toThrow(RenderError);
  });
});
