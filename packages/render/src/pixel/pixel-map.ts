import type { Pixel, PixelBounds, PixelGrid, PixelSample, RGB } from '@termdots/protocol';

/**
 * Sparse, read-only store of decoded samples keyed by (x, y).
 *
 * Coordinates that were never supplied are absent. Bounds track only the
 * coordinates that are present, so a sample listing that skips its last
 * column does not widen the frame.
 */
export class PixelMap implements Iterable<PixelSample> {
  private readonly rows: Map<number, Map<number, RGB>>;
  private readonly count: number;
  readonly maxX: number;
  readonly maxY: number;

  private constructor(rows: Map<number, Map<number, RGB>>) {
    let count = 0;
    let maxX = -1;
    let maxY = -1;
    for (const [y, row] of rows) {
      count += row.size;
      if (y > maxY) maxY = y;
      for (const x of row.keys()) {
        if (x > maxX) maxX = x;
      }
    }
    this.rows = rows;
    this.count = count;
    this.maxX = maxX;
    this.maxY = maxY;
  }

  /**
   * Build from a list of samples. A later sample at the same coordinate wins.
   */
  static fromSamples(samples: Iterable<PixelSample>): PixelMap {
    const rows = new Map<number, Map<number, RGB>>();
    for (const { x, y, color } of samples) {
      let row = rows.get(y);
      if (!row) {
        row = new Map();
        rows.set(y, row);
      }
      row.set(x, { r: color.r, g: color.g, b: color.b });
    }
    return new PixelMap(rows);
  }

  /**
   * Build from a dense grid [y][x]; null pixels are absent
   */
  static fromGrid(grid: PixelGrid): PixelMap {
    const samples: PixelSample[] = [];
    for (let y = 0; y < grid.length; y++) {
      const row = grid[y];
      if (!row) continue;
      for (let x = 0; x < row.length; x++) {
        const pixel = row[x];
        if (pixel) samples.push({ x, y, color: pixel });
      }
    }
    return PixelMap.fromSamples(samples);
  }

  static empty(): PixelMap {
    return new PixelMap(new Map());
  }

  get(x: number, y: number): Pixel {
    return this.rows.get(y)?.get(x) ?? null;
  }

  has(x: number, y: number): boolean {
    return this.rows.get(y)?.has(x) ?? false;
  }

  get size(): number {
    return this.count;
  }

  get bounds(): PixelBounds {
    return { maxX: this.maxX, maxY: this.maxY };
  }

  /**
   * New map with every color transformed; coordinates are unchanged
   */
  mapColors(transform: (color: RGB) => RGB): PixelMap {
    const samples: PixelSample[] = [];
    for (const sample of this) {
      samples.push({ x: sample.x, y: sample.y, color: transform(sample.color) });
    }
    return PixelMap.fromSamples(samples);
  }

  *[Symbol.iterator](): Iterator<PixelSample> {
    for (const [y, row] of this.rows) {
      for (const [x, color] of row) {
        yield { x, y, color };
      }
    }
  }
}
