/**
 * Layout Service: composes a print request into one grayscale raster
 * exactly `printerWidthDots` wide.
 *
 * QR mode: the QR occupies the left half (width / 2 square), text fills the
 * rest; both are vertically centered in max(qrSize, textHeight).
 * Text mode: text spans the full width and the image is exactly as tall as
 * the text block.
 */

import type { Font } from 'opentype.js';
import type { TextContent } from '../models/print-job.model';
import { RenderError } from '../utils/errors';
import { createRaster, paste, type RasterImage } from '../utils/raster';
import { columnsForWidth, drawTextLine, fitFont, loadFont, locateFont } from './bitmap-font.service';
import { renderQr } from './qr.service';
import { splitTextLines, toDisplayText } from './text-format.service';

export type FontSource = () => Font;

/** Font source backed by FONT_PATH or the host's monospace bold fonts */
export function systemFontSource(fontPath?: string): FontSource {
  return () => loadFont(locateFont(fontPath));
}

/** Render the text block for an area `width` dots wide */
export function renderTextBlock(text: string, width: number, font: Font): RasterImage {
  const columns = columnsForWidth(width);
  const fitted = fitFont(font, width, columns);
  const lines = splitTextLines(text, columns);
  const height = Math.max(1, fitted.lineHeight * lines.length);

  const block = createRaster(width, height);
  lines.forEach((line, i) => drawTextLine(block, fitted, line, 0, i * fitted.lineHeight));
  return block;
}

export function compose(
  displayText: TextContent,
  qrData: string | undefined,
  printerWidthDots: number,
  fontSource: FontSource,
): RasterImage {
  if (!Number.isInteger(printerWidthDots) || printerWidthDots < 2) {
    throw new RenderError(`Invalid printer width: ${printerWidthDots}`);
  }

  const text = toDisplayText(displayText);
  const font = fontSource();

  if (qrData === undefined) {
    return renderTextBlock(text, printerWidthDots, font);
  }

  const qrSize = Math.floor(printerWidthDots / 2);
  const qr = renderQr(qrData, qrSize);
  const textBlock = renderTextBlock(text, printerWidthDots - qrSize, font);

  const height = Math.max(qrSize, textBlock.height);
  const out = createRaster(printerWidthDots, height);
  paste(out, qr, 0, Math.floor((height - qrSize) / 2));
  paste(out, textBlock, qrSize, Math.floor((height - textBlock.height) / 2));
  return out;
}
