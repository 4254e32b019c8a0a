import * as fs from 'fs';
import * as path from 'path';
import { HEADER_RULE_MAX } from '@termdots/protocol';
import { frameStats, renderFrame, type RenderedFrame } from '@termdots/render';
import type { CliConfig } from '../config.js';
import type { DecodedImage, ImageDecoder } from '../decode/decoder.js';
import { invertPixelMap } from '../decode/transforms.js';
import { EmptyImageError, ImageNotFoundError } from '../errors.js';

export type DisplayOptions = Pick<CliConfig, 'width' | 'useBackground' | 'invert' | 'dither' | 'quiet' | 'stats'>;

/**
 * Fail with ImageNotFoundError unless imagePath is a readable file
 */
export async function ensureReadable(imagePath: string): Promise<void> {
  const stats = await fs.promises.stat(imagePath).catch((error: unknown) => {
    throw new ImageNotFoundError(imagePath, error);
  });
  if (!stats.isFile()) {
    throw new ImageNotFoundError(imagePath);
  }
  await fs.promises.access(imagePath, fs.constants.R_OK).catch((error: unknown) => {
    throw new ImageNotFoundError(imagePath, error);
  });
}

/**
 * Everything printed for one image, header and rules included
 */
export function formatDisplay(
  imagePath: string,
  decoded: DecodedImage,
  frame: RenderedFrame,
  quiet: boolean
): string[] {
  if (quiet) return [...frame.lines];

  const lines: string[] = [];
  if (decoded.source) {
    lines.push(`Original dimensions: ${decoded.source.width}x${decoded.source.height}`);
  }

  const { maxX, maxY } = decoded.pixels.bounds;
  const rule = '='.repeat(Math.min(HEADER_RULE_MAX, frame.width));
  lines.push(
    `Displaying image: ${path.basename(imagePath)} (${maxX + 1}x${maxY + 1}) - Using Braille characters`,
    `Character dimensions: ${frame.width}x${frame.height}`,
    rule,
    ...frame.lines,
    rule
  );
  return lines;
}

/**
 * One-line render summary for --stats
 */
export function formatStats(frame: RenderedFrame, elapsedMs: number): string {
  const stats = frameStats(frame);
  return [
    `[stats] ${frame.width}x${frame.height} cells (${stats.blankCells} blank)`,
    `${stats.styleSets} style sets, ${stats.styleResets} resets`,
    `palette ${stats.paletteHits} hits / ${stats.paletteMisses} misses`,
    `${elapsedMs.toFixed(1)}ms`,
  ].join(', ');
}

/**
 * Decode, render and print one image.
 * Nothing is printed unless decoding and rendering both succeed.
 */
export async function displayImage(
  imagePath: string,
  decoder: ImageDecoder,
  options: DisplayOptions
): Promise<RenderedFrame> {
  await ensureReadable(imagePath);

  const decoded = await decoder.decode(imagePath, options.width * 2, options.dither);
  if (decoded.pixels.size === 0) {
    throw new EmptyImageError(imagePath);
  }

  const pixels = options.invert ? invertPixelMap(decoded.pixels) : decoded.pixels;

  const start = performance.now();
  const frame = renderFrame(pixels, { useBackground: options.useBackground });
  const elapsed = performance.now() - start;

  for (const line of formatDisplay(imagePath, { ...decoded, pixels }, frame, options.quiet)) {
    console.log(line);
  }
  if (options.stats) {
    console.error(formatStats(frame, elapsed));
  }

  return frame;
}
