import { describe, it, expect } from 'vitest';
import { rawBufferToPixelGrid } from './pixel-buffer.js';

describe('rawBufferToPixelGrid', () => {
  it('reads RGB buffers row by row', () => {
    const data = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

    expect(rawBufferToPixelGrid(data, 2, 2, 3)).toEqual([
      [{ r: 1, g: 2, b: 3 }, { r: 4, g: 5, b: 6 }],
      [{ r: 7, g: 8, b: 9 }, { r: 10, g: 11, b: 12 }],
    ]);
  });

  it('ignores the alpha channel', () => {
    const data = Buffer.from([255, 0, 0, 0, 0, 255, 0, 127, 0, 0, 255, 128]);

    expect(rawBufferToPixelGrid(data, 3, 1, 4)).toEqual([
      [{ r: 255, g: 0, b: 0 }, { r: 0, g: 255, b: 0 }, { r: 0, g: 0, b: 255 }],
    ]);
  });
});
