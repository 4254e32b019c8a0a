import { DEFAULT_CHAR_WIDTH } from '@termdots/protocol';

export function usage(program: string = 'termdots'): string {
  return `
${program} - display images in the terminal with Braille characters

Usage:
  ${program} <image> [options]
  ${program} --test

Options:
  -w, --width <number>   Display width in characters (default ${DEFAULT_CHAR_WIDTH})
  -b, --bg               Color the cell background instead of the dots
  -i, --invert           Invert colors
  -d, --dither           Floyd-Steinberg dithering while decoding
      --decoder <name>   sharp (default) or magick
  -q, --quiet            Print only the image lines
      --stats            Print render statistics to stderr
  -t, --test             Test 256-color support
  -h, --help             Show this help

Environment:
  TERMDOTS_WIDTH, TERMDOTS_BG, TERMDOTS_DECODER,
  TERMDOTS_MAGICK_BIN, TERMDOTS_IDENTIFY_BIN, SENTRY_DSN

Examples:
  ${program} image.jpg -w 100      # Display with 100 character width
  ${program} image.png -b -i       # Background color mode, invert colors
  ${program} image.gif -d          # Use dithering for better quality
  ${program} --test                # Test 256-color support
`;
}
