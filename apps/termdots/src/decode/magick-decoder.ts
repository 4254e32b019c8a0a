import { PixelMap } from '@termdots/render';
import { DecodeError } from '../errors.js';
import { runCommand, type CommandRunner } from '../utils/run-command.js';
import { parsePixelText } from './pixel-text.js';
import type { DecodedImage, ImageDecoder, SourceDimensions } from './decoder.js';

export interface MagickDecoderConfig {
  /** convert (IM6) or magick (IM7) */
  convertBin: string;
  identifyBin: string;
  runner?: CommandRunner;
}

/**
 * Decoder that shells out to ImageMagick and parses its `txt:` pixel listing
 */
export class MagickDecoder implements ImageDecoder {
  readonly name = 'ImageMagick';
  private config: MagickDecoderConfig;
  private run: CommandRunner;

  constructor(config: MagickDecoderConfig) {
    this.config = config;
    this.run = config.runner ?? runCommand;
  }

  /**
   * Arguments for the resize-and-enumerate call
   */
  buildArgs(path: string, targetPixelWidth: number, dither: boolean): string[] {
    const args = [path];
    if (dither) {
      args.push('-dither', 'FloydSteinberg');
    }
    args.push(
      '-resize', `${targetPixelWidth}x`,
      '-unsharp', '0.5x0.5+0.5+0.008',
      '-colorspace', 'RGB',
      '-depth', '8',
      'txt:-'
    );
    return args;
  }

  /**
   * Original image size via identify; null if identify is unavailable or fails
   */
  async identify(path: string): Promise<SourceDimensions | null> {
    try {
      const result = await this.run(this.config.identifyBin, ['-format', '%w %h', path]);
      if (result.code !== 0) return null;

      const [width, height] = result.stdout.trim().split(/\s+/).map(Number);
      if (!width || !height) return null;
      return { width, height };
    } catch {
      // Dimensions are informational only
      return null;
    }
  }

  async decode(path: string, targetPixelWidth: number, dither: boolean): Promise<DecodedImage> {
    const source = await this.identify(path);

    const result = await this.run(this.config.convertBin, this.buildArgs(path, targetPixelWidth, dither))
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        throw new DecodeError(this.name, message, error);
      });

    if (result.code !== 0) {
      throw new DecodeError(this.name, result.stderr);
    }

    const { samples } = parsePixelText(result.stdout);
    return { pixels: PixelMap.fromSamples(samples), source };
  }
}
