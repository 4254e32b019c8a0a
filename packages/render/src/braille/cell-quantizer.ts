import type { Block, DotPattern, Pixel, RGB } from '@termdots/protocol';
import { BRAILLE_BASE, BRAILLE_GLYPH_COUNT } from '@termdots/protocol';

/**
 * Output bit for each block sample (block index is row-major, py * 2 + px).
 *
 * Braille dot numbering runs down the left column for the top three rows,
 * then down the right column, and only then the bottom row:
 *   bit 0  bit 3
 *   bit 1  bit 4
 *   bit 2  bit 5
 *   bit 6  bit 7
 */
export const DOT_BIT_ORDER = [0, 3, 1, 4, 2, 5, 6, 7] as const;

/**
 * Fixed luma cutoff (midpoint of the 8-bit range). Not derived from the image.
 */
export const BRIGHTNESS_THRESHOLD = 128;

/**
 * BT.709 luma of a pixel
 */
export function luminance(pixel: RGB): number {
  return 0.2126 * pixel.r + 0.7152 * pixel.g + 0.0722 * pixel.b;
}

/**
 * Whether a pixel lights its dot
 */
export function isBright(pixel: Pixel): boolean {
  return pixel !== null && luminance(pixel) > BRIGHTNESS_THRESHOLD;
}

/**
 * Dot pattern for a 2×4 block. Absent samples leave their dot unset.
 */
export function quantizeBlock(block: Block): DotPattern {
  let pattern = 0;
  DOT_BIT_ORDER.forEach((bit, i) => {
    if (isBright(block[i] ?? null)) {
      pattern |= 1 << bit;
    }
  });
  return pattern;
}

/**
 * Braille glyph for a dot pattern (U+2800 + pattern)
 */
export function dotPatternToGlyph(pattern: DotPattern): string {
  return String.fromCharCode(BRAILLE_BASE + (pattern & (BRAILLE_GLYPH_COUNT - 1)));
}
