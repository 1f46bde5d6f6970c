import QRCode from 'qrcode';
import { RenderError } from '../utils/errors';
import { BLACK, createRaster, resizeLanczos, scaleNearest, type RasterImage } from '../utils/raster';

/** Quiet-zone width in modules around the symbol */
export const QR_BORDER_MODULES = 1;

export const QR_ERROR_CORRECTION = 'M';

function encodeMatrix(data: string) {
  try {
    return QRCode.create(data, { errorCorrectionLevel: QR_ERROR_CORRECTION }).modules;
  } catch (err) {
    throw new RenderError(`QR payload cannot be encoded: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}

/** Module-per-pixel raster of the symbol including its quiet zone */
export function renderQrModules(data: string): RasterImage {
  const matrix = encodeMatrix(data);
  const side = matrix.size + QR_BORDER_MODULES * 2;
  const image = createRaster(side, side);
  for (let row = 0; row < matrix.size; row++) {
    for (let col = 0; col < matrix.size; col++) {
      if (matrix.get(row, col)) {
        image.data[(row + QR_BORDER_MODULES) * side + col + QR_BORDER_MODULES] = BLACK;
      }
    }
  }
  return image;
}

/**
 * QR symbol scaled to exactly size × size dots. Modules are first blown up
 * with nearest-neighbour so the final Lanczos pass only ever shrinks.
 */
export function renderQr(data: string, size: number): RasterImage {
  const modules = renderQrModules(data);
  const factor = Math.max(1, Math.ceil(size / modules.width));
  return resizeLanczos(scaleNearest(modules, factor), size, size);
}
