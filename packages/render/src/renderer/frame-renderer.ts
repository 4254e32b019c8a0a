import type { EncodeOptions, StyledCell } from '@termdots/protocol';
import type { PixelMap } from '../pixel/pixel-map.js';
import { PaletteCache } from '../palette/palette-cache.js';
import { composeFrame, frameSize } from '../braille/frame-compositor.js';
import { countStyleDirectives, encodeRows } from '../ansi/stream-encoder.js';

/**
 * Result of rendering one image
 */
export interface RenderedFrame {
  /** Width in characters */
  width: number;
  /** Height in characters */
  height: number;
  cells: StyledCell[][];
  lines: string[];
  /** Palette lookups made by this render */
  cache: PaletteCache;
}

/**
 * Totals for a rendered frame
 */
export interface FrameStats {
  cells: number;
  blankCells: number;
  styleSets: number;
  styleResets: number;
  paletteHits: number;
  paletteMisses: number;
}

/**
 * Render decoded samples as Braille lines.
 * Each call owns a fresh palette cache.
 */
export function renderFrame(pixels: PixelMap, options: EncodeOptions): RenderedFrame {
  const { width, height } = frameSize(pixels.maxX, pixels.maxY);
  const cache = new PaletteCache();
  const cells = composeFrame(pixels, cache);

  return {
    width,
    height,
    cells,
    lines: encodeRows(cells, options),
    cache,
  };
}

/**
 * Summarize a rendered frame
 */
export function frameStats(frame: RenderedFrame): FrameStats {
  let cells = 0;
  let blankCells = 0;
  for (const row of frame.cells) {
    cells += row.length;
    blankCells += row.filter(cell => cell.color === null).length;
  }

  let styleSets = 0;
  let styleResets = 0;
  for (const line of frame.lines) {
    const counts = countStyleDirectives(line);
    styleSets += counts.sets;
    styleResets += counts.resets;
  }

  return {
    cells,
    blankCells,
    styleSets,
    styleResets,
    paletteHits: frame.cache.hits,
    paletteMisses: frame.cache.misses,
  };
}
