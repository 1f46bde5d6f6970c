import { PNG } from 'pngjs';

/** 8-bit grayscale bitmap, row-major, 0 = black, 255 = white */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export const WHITE = 255;
export const BLACK = 0;

/** Allocate a raster filled with one value (white by default) */
export function createRaster(width: number, height: number, fill: number = WHITE): RasterImage {
  const data = new Uint8Array(width * height);
  data.fill(fill);
  return { width, height, data };
}

export function getPixel(image: RasterImage, x: number, y: number): number {
  return image.data[y * image.width + x];
}

/** Copy `src` into `dest` with its top-left corner at (x, y); clipped to dest */
export function paste(dest: RasterImage, src: RasterImage, x: number, y: number): void {
  for (let sy = 0; sy < src.height; sy++) {
    const dy = y + sy;
    if (dy < 0 || dy >= dest.height) continue;
    for (let sx = 0; sx < src.width; sx++) {
      const dx = x + sx;
      if (dx < 0 || dx >= dest.width) continue;
      dest.data[dy * dest.width + dx] = src.data[sy * src.width + sx];
    }
  }
}

// ── Lanczos resampling ──

const LANCZOS_A = 3;

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

function lanczos(x: number): number {
  return Math.abs(x) < LANCZOS_A ? sinc(x) * sinc(x / LANCZOS_A) : 0;
}

interface Contribution {
  readonly start: number;
  readonly weights: Float64Array;
}

/**
 * Precompute filter taps for one axis. When shrinking, the kernel is
 * stretched by the scale factor so every source pixel contributes.
 */
function contributions(srcSize: number, dstSize: number): Contribution[] {
  const scale = srcSize / dstSize;
  const support = LANCZOS_A * Math.max(1, scale);
  const filterScale = Math.max(1, scale);
  const result: Contribution[] = [];

  for (let i = 0; i < dstSize; i++) {
    const center = (i + 0.5) * scale;
    const start = Math.max(0, Math.floor(center - support));
    const end = Math.min(srcSize, Math.ceil(center + support));
    const weights = new Float64Array(end - start);
    let total = 0;
    for (let j = start; j < end; j++) {
      const w = lanczos((j + 0.5 - center) / filterScale);
      weights[j - start] = w;
      total += w;
    }
    if (total !== 0) {
      for (let k = 0; k < weights.length; k++) weights[k] /= total;
    }
    result.push({ start, weights });
  }
  return result;
}

function clampByte(v: number): number {
  return v <= 0 ? 0 : v >= 255 ? 255 : Math.round(v);
}

/** Resize with a separable Lanczos-3 filter */
export function resizeLanczos(src: RasterImage, width: number, height: number): RasterImage {
  if (src.width === width && src.height === height) {
    return { width, height, data: Uint8Array.from(src.data) };
  }

  const horizontal = contributions(src.width, width);
  const vertical = contributions(src.height, height);

  const tmp = new Float64Array(width * src.height);
  for (let y = 0; y < src.height; y++) {
    const row = y * src.width;
    for (let x = 0; x < width; x++) {
      const { start, weights } = horizontal[x];
      let acc = 0;
      for (let k = 0; k < weights.length; k++) acc += src.data[row + start + k] * weights[k];
      tmp[y * width + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const { start, weights } = vertical[y];
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < weights.length; k++) acc += tmp[(start + k) * width + x] * weights[k];
      out[y * width + x] = clampByte(acc);
    }
  }

  return { width, height, data: out };
}

/** Nearest-neighbour upscale by an integer factor */
export function scaleNearest(src: RasterImage, factor: number): RasterImage {
  const out = createRaster(src.width * factor, src.height * factor);
  for (let y = 0; y < out.height; y++) {
    const sy = Math.floor(y / factor);
    for (let x = 0; x < out.width; x++) {
      out.data[y * out.width + x] = src.data[sy * src.width + Math.floor(x / factor)];
    }
  }
  return out;
}

/** Encode as an RGBA PNG for previews */
export function toPng(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  for (let i = 0; i < image.data.length; i++) {
    const v = image.data[i];
    png.data[i * 4] = v;
    png.data[i * 4 + 1] = v;
    png.data[i * 4 + 2] = v;
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png);
}
