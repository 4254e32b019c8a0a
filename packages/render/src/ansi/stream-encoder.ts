import type { ColorMode, EncodeOptions, PaletteIndex, StyledCell } from '@termdots/protocol';
import { ANSIBuilder } from './builder.js';
import { color256 } from './colors.js';
import { CSI, SGR, STYLE } from './codes.js';

/**
 * Style directives found in an encoded line
 */
export interface DirectiveCount {
  sets: number;
  resets: number;
}

/**
 * Encode one row of styled cells as a terminal line.
 *
 * A color directive is written only when the cell color differs from the
 * active one. Blank cells drop back to the default style, and the line ends
 * with a reset whenever a color is still active so nothing leaks into
 * whatever is printed next.
 */
export function encodeRow(cells: readonly StyledCell[], options: EncodeOptions): string {
  const mode: ColorMode = options.useBackground ? 'background' : 'foreground';
  const out = new ANSIBuilder();
  let lastColor: PaletteIndex | null = null;

  for (const cell of cells) {
    if (cell.color !== null) {
      if (cell.color !== lastColor) {
        out.setColor(color256(cell.color), mode);
        lastColor = cell.color;
      }
    } else if (lastColor !== null) {
      out.resetAttributes();
      lastColor = null;
    }
    out.write(cell.char);
  }

  if (lastColor !== null) {
    out.resetAttributes();
  }

  return out.build();
}

/**
 * Encode every row of a frame
 */
export function encodeRows(rows: readonly (readonly StyledCell[])[], options: EncodeOptions): string[] {
  return rows.map(row => encodeRow(row, options));
}

const SET_PATTERN = new RegExp(`\\x1b\\[(?:${SGR.fg256}|${SGR.bg256});\\d+m`, 'g');

/**
 * Count color-set and reset directives in an encoded line
 */
export function countStyleDirectives(line: string): DirectiveCount {
  const sets = line.match(SET_PATTERN)?.length ?? 0;
  const resets = line.split(STYLE.reset).length - 1;
  return { sets, resets };
}

/**
 * Strip style directives, leaving only the printed characters
 */
export function stripStyles(line: string): string {
  return line.split(CSI).map((part, i) => (i === 0 ? part : part.slice(part.indexOf('m') + 1))).join('');
}
