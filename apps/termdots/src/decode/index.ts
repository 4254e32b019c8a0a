import type { CliConfig } from '../config.js';
import type { ImageDecoder } from './decoder.js';
import { MagickDecoder } from './magick-decoder.js';
import { SharpDecoder } from './sharp-decoder.js';

export type { DecodedImage, ImageDecoder, SourceDimensions } from './decoder.js';
export { MagickDecoder } from './magick-decoder.js';
export { SharpDecoder } from './sharp-decoder.js';
export { parsePixelText, parsePixelLine, parseChannel } from './pixel-text.js';
export { invertPixelMap, invertColor } from './transforms.js';

/**
 * Decoder selected by configuration
 */
export function createDecoder(config: Pick<CliConfig, 'decoder' | 'magickBin' | 'identifyBin'>): ImageDecoder {
  switch (config.decoder) {
    case 'magick':
      return new MagickDecoder({ convertBin: config.magickBin, identifyBin: config.identifyBin });
    case 'sharp':
      return new SharpDecoder();
  }
}
