/**
 * Bitmap Font Service: rasterizes monospace TrueType text into grayscale rasters.
 *
 * Uses opentype.js (pure JS, no native deps) to load the font and extract glyph
 * outlines, then fills them with a supersampled scanline rasterizer.
 */

import fs from 'fs';
import { loadSync, type Font, type PathCommand } from 'opentype.js';
import { RenderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { BLACK, type RasterImage } from '../utils/raster';

// ── Types ──

/** A font scaled to fit a column count inside a pixel width */
export interface FittedFont {
  readonly font: Font;
  readonly size: number;
  readonly columns: number;
  /** Pixel advance of one column */
  readonly advance: number;
  readonly ascent: number;
  readonly lineHeight: number;
}

// ── Constants ──

/** Nominal dots per text column when deciding how many columns fit */
export const CELL_WIDTH = 12;

export const MIN_FONT_SIZE = 1;
export const MAX_FONT_SIZE = 200;

/** Number of line segments to approximate a bezier curve */
const BEZIER_STEPS = 12;

/** Monospace bold faces tried in order when FONT_PATH is not set */
export const FONT_CANDIDATES: readonly string[] = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSansMono-Bold.ttf',
  '/usr/share/fonts/dejavu/DejaVuSansMono-Bold.ttf',
  '/usr/share/fonts/TTF/DejaVuSansMono-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationMono-Bold.ttf',
  '/usr/share/fonts/liberation-mono/LiberationMono-Bold.ttf',
  '/usr/share/fonts/truetype/noto/NotoSansMono-Bold.ttf',
  '/Library/Fonts/Menlo.ttc',
  '/System/Library/Fonts/Menlo.ttc',
  'C:\\Windows\\Fonts\\consolab.ttf',
  'C:\\Windows\\Fonts\\courbd.ttf',
];

// ── Font Management ──

const fontCache = new Map<string, Font>();

/** First existing font file: explicit path wins over the candidate list */
export function locateFont(
  explicitPath?: string,
  candidates: readonly string[] = FONT_CANDIDATES
): string {
  if (explicitPath) {
    if (!fs.existsSync(explicitPath)) {
      throw new RenderError(`Font not found: ${explicitPath}`);
    }
    return explicitPath;
  }
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) {
    throw new RenderError('No monospace bold font found; set FONT_PATH to a TrueType font');
  }
  return found;
}

/** Load (once) and cache a font file */
export function loadFont(fontPath: string): Font {
  const cached = fontCache.get(fontPath);
  if (cached) return cached;

  try {
    const font = loadSync(fontPath);
    fontCache.set(fontPath, font);
    logger.info({ fontPath, unitsPerEm: font.unitsPerEm }, 'Loaded monospace font');
    return font;
  } catch (err) {
    throw new RenderError(`Cannot load font: ${fontPath}`, { cause: err });
  }
}

// ── Fitting ──

/** How many text columns fit in a pixel width (at least one) */
export function columnsForWidth(width: number): number {
  return Math.max(1, Math.floor(width / CELL_WIDTH));
}

function columnAdvanceUnits(font: Font): number {
  const advance = font.charToGlyph('M').advanceWidth ?? 0;
  if (advance <= 0) {
    throw new RenderError('Font has no usable advance width');
  }
  return advance;
}

/**
 * Largest integer point size where `columns` glyphs fit in `width` pixels.
 * Compared in font units so the test is exact.
 */
export function fitFont(font: Font, width: number, columns: number): FittedFont {
  const advanceUnits = columnAdvanceUnits(font);
  const upm = font.unitsPerEm;

  let size = MAX_FONT_SIZE;
  while (size > MIN_FONT_SIZE && advanceUnits * columns * size > width * upm) {
    size--;
  }

  return {
    font,
    size,
    columns,
    advance: (advanceUnits * size) / upm,
    ascent: (font.ascender * size) / upm,
    lineHeight: Math.max(1, Math.ceil(((font.ascender - font.descender) * size) / upm)),
  };
}

// ── Scanline Rasterizer ──

type Point = [number, number];

function flattenQuadratic(
  x0: number, y0: number,
  cx: number, cy: number,
  x1: number, y1: number,
  segments: Point[],
): void {
  for (let i = 1; i <= BEZIER_STEPS; i++) {
    const t = i / BEZIER_STEPS;
    const mt = 1 - t;
    segments.push([
      mt * mt * x0 + 2 * mt * t * cx + t * t * x1,
      mt * mt * y0 + 2 * mt * t * cy + t * t * y1,
    ]);
  }
}

function flattenCubic(
  x0: number, y0: number,
  cx1: number, cy1: number,
  cx2: number, cy2: number,
  x1: number, y1: number,
  segments: Point[],
): void {
  for (let i = 1; i <= BEZIER_STEPS; i++) {
    const t = i / BEZIER_STEPS;
    const mt = 1 - t;
    segments.push([
      mt * mt * mt * x0 + 3 * mt * mt * t * cx1 + 3 * mt * t * t * cx2 + t * t * t * x1,
      mt * mt * mt * y0 + 3 * mt * mt * t * cy1 + 3 * mt * t * t * cy2 + t * t * t * y1,
    ]);
  }
}

/** Convert path commands into closed polygons */
function pathToPolygons(commands: readonly PathCommand[], polygons: Point[][]): void {
  let current: Point[] = [];
  let cx = 0;
  let cy = 0;

  for (const cmd of commands) {
    switch (cmd.type) {
      case 'M':
        if (current.length > 0) polygons.push(current);
        current = [[cmd.x, cmd.y]];
        cx = cmd.x;
        cy = cmd.y;
        break;
      case 'L':
        current.push([cmd.x, cmd.y]);
        cx = cmd.x;
        cy = cmd.y;
        break;
      case 'Q':
        flattenQuadratic(cx, cy, cmd.x1, cmd.y1, cmd.x, cmd.y, current);
        cx = cmd.x;
        cy = cmd.y;
        break;
      case 'C':
        flattenCubic(cx, cy, cmd.x1, cmd.y1, cmd.x2, cmd.y2, cmd.x, cmd.y, current);
        cx = cmd.x;
        cy = cmd.y;
        break;
      case 'Z':
        if (current.length > 0) {
          polygons.push(current);
          current = [];
        }
        break;
    }
  }

  if (current.length > 0) polygons.push(current);
}

/**
 * Non-zero winding scanline fill at SS× resolution, downsampled with an OR
 * rule so strokes thinner than a pixel survive.
 */
function scanlineFill(
  polygons: readonly Point[][],
  width: number,
  height: number,
  supersample = 3,
): Uint8Array {
  const ss = supersample;
  const ssW = width * ss;
  const ssH = height * ss;
  const ssBitmap = new Uint8Array(ssW * ssH);

  const edges: Array<{ x0: number; y0: number; x1: number; y1: number; dir: 1 | -1 }> = [];
  for (const poly of polygons) {
    for (let i = 0; i < poly.length; i++) {
      const [ax, ay] = poly[i];
      const [bx, by] = poly[(i + 1) % poly.length];
      if (Math.abs(ay - by) < 0.001 / ss) continue;
      edges.push({ x0: ax * ss, y0: ay * ss, x1: bx * ss, y1: by * ss, dir: ay < by ? 1 : -1 });
    }
  }

  for (let y = 0; y < ssH; y++) {
    const scanY = y + 0.5;
    const crossings: Array<{ x: number; dir: 1 | -1 }> = [];

    for (const { x0, y0, x1, y1, dir } of edges) {
      if ((y0 <= scanY && y1 > scanY) || (y1 <= scanY && y0 > scanY)) {
        const t = (scanY - y0) / (y1 - y0);
        crossings.push({ x: x0 + t * (x1 - x0), dir });
      }
    }

    crossings.sort((a, b) => a.x - b.x);

    let winding = 0;
    for (let i = 0; i < crossings.length; i++) {
      winding += crossings[i].dir;
      if (winding !== 0 && i + 1 < crossings.length) {
        const xStart = Math.max(0, Math.ceil(crossings[i].x - 0.5));
        const xEnd = Math.min(ssW - 1, Math.floor(crossings[i + 1].x - 0.5));
        for (let x = xStart; x <= xEnd; x++) {
          ssBitmap[y * ssW + x] = 1;
        }
      }
    }
  }

  const bitmap = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      outer:
      for (let sy = 0; sy < ss; sy++) {
        for (let sx = 0; sx < ss; sx++) {
          if (ssBitmap[(y * ss + sy) * ssW + (x * ss + sx)]) {
            bitmap[y * width + x] = 1;
            break outer;
          }
        }
      }
    }
  }

  return bitmap;
}

// ── Line Rendering ──

/**
 * Draw one line of text in black onto `target`, top-left of the line at (x, y).
 * Characters are placed on the fixed column grid.
 */
export function drawTextLine(
  target: RasterImage,
  fitted: FittedFont,
  text: string,
  x: number,
  y: number,
): void {
  if (text.trim() === '') return;

  const polygons: Point[][] = [];
  let column = 0;
  for (const char of text) {
    if (char !== ' ') {
      const glyph = fitted.font.charToGlyph(char);
      const path = glyph.getPath(column * fitted.advance, fitted.ascent, fitted.size);
      pathToPolygons(path.commands, polygons);
    }
    column++;
  }

  const lineWidth = Math.max(0, Math.min(target.width - x, Math.ceil(column * fitted.advance)));
  const lineHeight = Math.max(0, Math.min(target.height - y, fitted.lineHeight));
  if (lineWidth === 0 || lineHeight === 0) return;

  const mask = scanlineFill(polygons, lineWidth, lineHeight);
  for (let row = 0; row < lineHeight; row++) {
    for (let col = 0; col < lineWidth; col++) {
      if (mask[row * lineWidth + col]) {
        target.data[(y + row) * target.width + x + col] = BLACK;
      }
    }
  }
}
