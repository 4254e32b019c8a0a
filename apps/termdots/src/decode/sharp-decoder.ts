import sharp from 'sharp';
import { PixelMap } from '@termdots/render';
import { DecodeError } from '../errors.js';
import { rawBufferToPixelGrid } from '../utils/pixel-buffer.js';
import type { DecodedImage, ImageDecoder } from './decoder.js';

// One image per run; skip libvips' operation cache
sharp.cache(false);

/**
 * Decoder backed by sharp (libvips), running in-process
 */
export class SharpDecoder implements ImageDecoder {
  readonly name = 'sharp';

  async decode(path: string, targetPixelWidth: number, dither: boolean): Promise<DecodedImage> {
    try {
      const metadata = await sharp(path).metadata();
      const source = metadata.width && metadata.height
        ? { width: metadata.width, height: metadata.height }
        : null;

      // Drop alpha before filtering, which would premultiply it into the color
      const flat = await sharp(path)
        .toColourspace('srgb')
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      // Resize keeping aspect ratio, then a light unsharp mask
      const resized = sharp(flat.data, {
        raw: { width: flat.info.width, height: flat.info.height, channels: flat.info.channels },
      })
        .resize({ width: targetPixelWidth })
        .sharpen({ sigma: 0.5 });

      // Floyd-Steinberg error diffusion happens in the palette quantizer
      const prepared = dither
        ? sharp(await resized.png({ palette: true, dither: 1.0 }).toBuffer())
        : resized;

      const raw = await prepared
        .toColourspace('srgb')
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      const grid = rawBufferToPixelGrid(raw.data, raw.info.width, raw.info.height, raw.info.channels);
      return { pixels: PixelMap.fromGrid(grid), source };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DecodeError(this.name, message, error);
    }
  }
}
