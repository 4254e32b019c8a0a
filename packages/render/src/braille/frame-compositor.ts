import type { Block, RGB, StyledCell } from '@termdots/protocol';
import { BLANK_CELL, CELL_PIXEL_HEIGHT, CELL_PIXEL_WIDTH } from '@termdots/protocol';
import type { PixelMap } from '../pixel/pixel-map.js';
import { PaletteCache } from '../palette/palette-cache.js';
import { dotPatternToGlyph, quantizeBlock } from './cell-quantizer.js';

/**
 * Character grid dimensions
 */
export interface FrameSize {
  width: number;
  height: number;
}

/**
 * Character grid needed to cover pixels 0..maxX, 0..maxY.
 * A partially filled trailing block still gets a cell.
 */
export function frameSize(maxX: number, maxY: number): FrameSize {
  if (maxX < 0 || maxY < 0) return { width: 0, height: 0 };
  return {
    width: Math.ceil((maxX + 1) / CELL_PIXEL_WIDTH),
    height: Math.ceil((maxY + 1) / CELL_PIXEL_HEIGHT),
  };
}

/**
 * Collect the 8 samples of cell (charX, charY) in row-major order
 */
export function gatherBlock(pixels: PixelMap, charX: number, charY: number): Block {
  const x = charX * CELL_PIXEL_WIDTH;
  const y = charY * CELL_PIXEL_HEIGHT;
  return [
    pixels.get(x, y), pixels.get(x + 1, y),
    pixels.get(x, y + 1), pixels.get(x + 1, y + 1),
    pixels.get(x, y + 2), pixels.get(x + 1, y + 2),
    pixels.get(x, y + 3), pixels.get(x + 1, y + 3),
  ];
}

/**
 * Unweighted mean of the present samples, truncated per channel.
 * Returns null when the block has no samples.
 */
export function averageColor(block: Block): RGB | null {
  const present = block.filter((p): p is RGB => p !== null);
  if (present.length === 0) return null;

  const sum = present.reduce(
    (acc, p) => ({ r: acc.r + p.r, g: acc.g + p.g, b: acc.b + p.b }),
    { r: 0, g: 0, b: 0 }
  );

  return {
    r: Math.trunc(sum.r / present.length),
    g: Math.trunc(sum.g / present.length),
    b: Math.trunc(sum.b / present.length),
  };
}

/**
 * Turn one block into a glyph and its palette color
 */
export function composeCell(block: Block, cache: PaletteCache): StyledCell {
  const avg = averageColor(block);
  if (avg === null) return { ...BLANK_CELL };

  return {
    char: dotPatternToGlyph(quantizeBlock(block)),
    color: cache.resolve(avg),
  };
}

/**
 * Compose character rows [fromRow, toRow) of a frame.
 * Cells carry no state between each other apart from the palette cache,
 * so callers may split a frame into row ranges and concatenate the results.
 */
export function composeRows(
  pixels: PixelMap,
  fromRow: number,
  toRow: number,
  cache: PaletteCache
): StyledCell[][] {
  const { width, height } = frameSize(pixels.maxX, pixels.maxY);
  const rows: StyledCell[][] = [];

  for (let charY = Math.max(0, fromRow); charY < Math.min(height, toRow); charY++) {
    const row: StyledCell[] = [];
    for (let charX = 0; charX < width; charX++) {
      row.push(composeCell(gatherBlock(pixels, charX, charY), cache));
    }
    rows.push(row);
  }

  return rows;
}

/**
 * Compose every cell of a frame, top row first
 */
export function composeFrame(pixels: PixelMap, cache: PaletteCache = new PaletteCache()): StyledCell[][] {
  const { height } = frameSize(pixels.maxX, pixels.maxY);
  return composeRows(pixels, 0, height, cache);
}
