import type { RGB } from '@termdots/protocol';
import type { PixelMap } from '@termdots/render';

/**
 * Photographic negative of one color
 */
export function invertColor(color: RGB): RGB {
  return { r: 255 - color.r, g: 255 - color.g, b: 255 - color.b };
}

/**
 * Invert every sample. Applied at ingestion, before the core sees the pixels.
 */
export function invertPixelMap(pixels: PixelMap): PixelMap {
  return pixels.mapColors(invertColor);
}
