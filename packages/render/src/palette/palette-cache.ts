import type { PaletteIndex, RGB } from '@termdots/protocol';
import { rgbToAnsi256 } from './palette-mapper.js';

/**
 * Memo of RGB → palette index lookups for a single render.
 *
 * Neighbouring blocks often average to the same color, so one render
 * resolves far fewer distinct triples than it has cells. Create one per
 * render call; instances are not shared between renders.
 */
export class PaletteCache {
  private entries: Map<number, PaletteIndex> = new Map();
  private hitCount = 0;
  private missCount = 0;

  private getKey(color: RGB): number {
    return (color.r << 16) | (color.g << 8) | color.b;
  }

  /**
   * Get palette index, computing it if not cached
   */
  resolve(color: RGB): PaletteIndex {
    const key = this.getKey(color);

    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hitCount++;
      return cached;
    }

    const index = rgbToAnsi256(color.r, color.g, color.b);
    this.entries.set(key, index);
    this.missCount++;
    return index;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  get size(): number {
    return this.entries.size;
  }
}
