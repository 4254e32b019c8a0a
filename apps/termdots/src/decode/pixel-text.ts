import type { PixelSample, RGB } from '@termdots/protocol';
import { roundHalfEven } from '@termdots/render';

/**
 * Result of parsing a pixel enumeration listing
 */
export interface PixelTextParseResult {
  samples: PixelSample[];
  /** Lines that looked like data but could not be parsed */
  skipped: number;
}

const COORDINATE = /^\s*(\d+)\s*,\s*(\d+)\s*$/;
const CHANNEL = /^(\d+(?:\.\d+)?)(%?)$/;

/**
 * Convert one channel token ("128", "50%", "49.8%") to 0-255.
 * Returns null when the token is not a number.
 */
export function parseChannel(token: string): number | null {
  const match = CHANNEL.exec(token.trim());
  if (!match) return null;

  const value = Number(match[1]);
  const scaled = match[2] === '%' ? (value * 255) / 100 : value;
  return Math.max(0, Math.min(255, roundHalfEven(scaled)));
}

/**
 * Parse a single `x,y: (r,g,b[,a]) ...` line
 */
export function parsePixelLine(line: string): PixelSample | null {
  const colon = line.indexOf(':');
  if (colon === -1) return null;

  const position = COORDINATE.exec(line.slice(0, colon));
  if (!position) return null;

  const colorPart = line.slice(colon + 1);
  const open = colorPart.indexOf('(');
  const close = colorPart.indexOf(')', open);
  if (open === -1 || close === -1) return null;

  const channels = colorPart.slice(open + 1, close).split(',');
  if (channels.length < 3) return null;

  const [r, g, b] = channels.slice(0, 3).map(parseChannel);
  if (r == null || g == null || b == null) return null;

  const color: RGB = { r, g, b };
  return { x: Number(position[1]), y: Number(position[2]), color };
}

/**
 * Parse ImageMagick `txt:` pixel enumeration output.
 *
 * Blank and `#` comment lines are ignored. Anything else that fails to
 * parse is dropped on its own and counted in `skipped`; one bad line never
 * fails the listing.
 */
export function parsePixelText(text: string): PixelTextParseResult {
  const samples: PixelSample[] = [];
  let skipped = 0;

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const sample = parsePixelLine(line);
    if (sample) {
      samples.push(sample);
    } else {
      skipped++;
    }
  }

  return { samples, skipped };
}
