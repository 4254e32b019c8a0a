import type { PixelGrid, Pixel } from '@termdots/protocol';

/**
 * Convert an interleaved raw buffer back to a PixelGrid.
 * Reads the first three channels of each pixel; alpha, when present, is
 * ignored so every in-bounds pixel is present.
 */
export function rawBufferToPixelGrid(
  data: Buffer,
  width: number,
  height: number,
  channels: number
): PixelGrid {
  const grid: PixelGrid = [];

  for (let y = 0; y < height; y++) {
    const row: Pixel[] = [];
    for (let x = 0; x < width; x++) {
      const idx = (y * width + x) * channels;
      row.push({
        r: data[idx] ?? 0,
        g: data[idx + 1] ?? 0,
        b: data[idx + 2] ?? 0,
      });
    }
    grid.push(row);
  }

  return grid;
}
