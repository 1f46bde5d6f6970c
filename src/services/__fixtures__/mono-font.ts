import { Font, Glyph, Path } from 'opentype.js';

/** Font metrics of the synthetic test face */
export const MONO_UNITS_PER_EM = 1000;
export const MONO_ASCENDER = 800;
export const MONO_DESCENDER = -200;
export const MONO_ADVANCE = 500;

function boxPath(): Path {
  const path = new Path();
  path.moveTo(50, 0);
  path.lineTo(450, 0);
  path.lineTo(450, 700);
  path.lineTo(50, 700);
  path.close();
  return path;
}

/**
 * Monospace face whose printable ASCII glyphs are solid boxes
 * (x 50..450, y 0..700 font units). `blank` gives every glyph an empty outline.
 */
export function createMonoFont(options: { blank?: boolean } = {}): Font {
  const glyphs = [
    new Glyph({ name: '.notdef', advanceWidth: MONO_ADVANCE, path: new Path() }),
  ];
  for (let code = 0x20; code <= 0x7e; code++) {
    const drawn = code !== 0x20 && !options.blank;
    glyphs.push(
      new Glyph({
        name: `uni${code.toString(16).padStart(4, '0')}`,
        unicode: code,
        advanceWidth: MONO_ADVANCE,
        path: drawn ? boxPath() : new Path(),
      })
    );
  }

  return new Font({
    familyName: 'Test Mono',
    styleName: 'Bold',
    unitsPerEm: MONO_UNITS_PER_EM,
    ascender: MONO_ASCENDER,
    descender: MONO_DESCENDER,
    glyphs,
  });
}
