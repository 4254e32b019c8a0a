import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_CHAR_WIDTH } from '@termdots/protocol';
import { ConfigError } from './errors.js';

/**
 * Validated CLI configuration
 */
export const CliConfigSchema = z.object({
  image: z.string().min(1).optional().describe('Image file path'),
  width: z.number().int().positive().describe('Display width in characters'),
  useBackground: z.boolean().describe('Color the cell background instead of the glyph'),
  invert: z.boolean().describe('Invert colors before rendering'),
  dither: z.boolean().describe('Floyd-Steinberg dither while decoding'),
  decoder: z.enum(['sharp', 'magick']).describe('Image decoder backend'),
  magickBin: z.string().min(1).describe('ImageMagick convert binary'),
  identifyBin: z.string().min(1).describe('ImageMagick identify binary'),
  quiet: z.boolean().describe('Print image lines only'),
  stats: z.boolean().describe('Print render statistics to stderr'),
  test: z.boolean().describe('Print the 256-color self-test'),
  help: z.boolean(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

function envFlag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      options: {
        width: { type: 'string', short: 'w' },
        bg: { type: 'boolean', short: 'b' },
        invert: { type: 'boolean', short: 'i' },
        dither: { type: 'boolean', short: 'd' },
        test: { type: 'boolean', short: 't' },
        quiet: { type: 'boolean', short: 'q' },
        stats: { type: 'boolean' },
        decoder: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    // parseArgs throws TypeError for unknown flags and missing values
    throw new ConfigError(error instanceof Error ? error.message : String(error), error);
  }
}

/**
 * Merge CLI flags over environment defaults and validate.
 * `args` excludes the node binary and script path.
 */
export function loadConfig(args: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const { values, positionals } = parseFlags(args);
  if (positionals.length > 1) {
    throw new ConfigError(`Expected one image path, got ${positionals.length}`);
  }

  const result = CliConfigSchema.safeParse({
    image: positionals[0],
    width: Number(values.width ?? (env.TERMDOTS_WIDTH || DEFAULT_CHAR_WIDTH)),
    useBackground: values.bg ?? envFlag(env.TERMDOTS_BG),
    invert: values.invert ?? false,
    dither: values.dither ?? false,
    decoder: values.decoder ?? (env.TERMDOTS_DECODER || 'sharp'),
    magickBin: env.TERMDOTS_MAGICK_BIN || 'convert',
    identifyBin: env.TERMDOTS_IDENTIFY_BIN || 'identify',
    quiet: values.quiet ?? false,
    stats: values.stats ?? false,
    test: values.test ?? false,
    help: values.help ?? false,
  });

  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration - ${detail}`, result.error);
  }

  return result.data;
}
