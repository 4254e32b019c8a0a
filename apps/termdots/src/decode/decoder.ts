import type { PixelMap } from '@termdots/render';

/**
 * Size of the file before resizing, when the decoder can tell
 */
export interface SourceDimensions {
  width: number;
  height: number;
}

/**
 * Decoded, resized samples ready for rendering
 */
export interface DecodedImage {
  pixels: PixelMap;
  source: SourceDimensions | null;
}

/**
 * Turns an image file into samples `targetPixelWidth` wide.
 * Rejects with DecodeError when the underlying tool fails.
 */
export interface ImageDecoder {
  readonly name: string;
  decode(path: string, targetPixelWidth: number, dither: boolean): Promise<DecodedImage>;
}
