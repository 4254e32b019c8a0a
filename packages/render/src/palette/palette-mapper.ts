import type { PaletteIndex } from '@termdots/protocol';
import {
  COLOR_CUBE_START,
  GRAYSCALE_START,
  PALETTE_BLACK,
  PALETTE_WHITE,
} from '@termdots/protocol';

/**
 * Gray values below this map to palette black, above GRAY_WHITE_FLOOR to white
 */
const GRAY_BLACK_CEILING = 8;
const GRAY_WHITE_FLOOR = 248;
const GRAY_RAMP_SPAN = 247;
const GRAY_RAMP_STEPS = 24;

/**
 * Width of one color cube level in 8-bit channel units (255 / 5)
 */
const CUBE_LEVEL_WIDTH = 51;
const CUBE_MAX_LEVEL = 5;

/**
 * Round to nearest integer, ties to even.
 * Used for every rounding step of the palette mapping so that the
 * gray ramp and the cube agree on one tie-break policy.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Quantize one 8-bit channel to a 0-5 color cube level
 */
export function cubeLevel(channel: number): number {
  return Math.max(0, Math.min(CUBE_MAX_LEVEL, roundHalfEven(channel / CUBE_LEVEL_WIDTH)));
}

/**
 * Convert an RGB triple to an xterm 256-color index (16-255)
 *
 * Achromatic input uses the 24-step grayscale ramp (232-255), with the
 * extremes snapped to cube black (16) and white (231). Everything else goes
 * through the 6×6×6 color cube.
 */
export function rgbToAnsi256(r: number, g: number, b: number): PaletteIndex {
  if (r === g && g === b) {
    if (r < GRAY_BLACK_CEILING) return PALETTE_BLACK;
    if (r > GRAY_WHITE_FLOOR) return PALETTE_WHITE;
    return roundHalfEven(((r - GRAY_BLACK_CEILING) / GRAY_RAMP_SPAN) * GRAY_RAMP_STEPS) + GRAYSCALE_START;
  }

  return COLOR_CUBE_START + 36 * cubeLevel(r) + 6 * cubeLevel(g) + cubeLevel(b);
}
