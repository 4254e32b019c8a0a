/**
 * RGB color for a single pixel
 */
export interface RGB {
  r: number; // 0-255
  g: number; // 0-255
  b: number; // 0-255
}

/**
 * A single pixel can be a color or absent
 */
export type Pixel = RGB | null;

/**
 * A dense pixel grid - 2D array of pixels [y][x]
 * Row-major for efficient line rendering
 */
export type PixelGrid = Pixel[][];

/**
 * One decoded sample: an integer coordinate and its color
 */
export interface PixelSample {
  x: number;
  y: number;
  color: RGB;
}

/**
 * Inclusive bounds of the present samples.
 * Both are -1 when nothing is present.
 */
export interface PixelBounds {
  maxX: number;
  maxY: number;
}

/**
 * Eight samples of one 2×4 cell in row-major order.
 * Index = py * 2 + px
 */
export type Block = readonly [Pixel, Pixel, Pixel, Pixel, Pixel, Pixel, Pixel, Pixel];

/**
 * 8-bit Braille dot pattern (0-255)
 */
export type DotPattern = number;
