/**
 * Color representation for terminal rendering
 */
export type Color = { type: '256'; value: number };

/**
 * Index into the xterm 256-color palette.
 * Always 16-255 when produced by the palette mapper.
 */
export type PaletteIndex = number;

/**
 * One character cell of a rendered frame.
 * A null color marks a blank cell (space, no color directive).
 */
export interface StyledCell {
  char: string;
  color: PaletteIndex | null;
}

/**
 * Blank cell for blocks without any samples
 */
export const BLANK_CELL: StyledCell = {
  char: ' ',
  color: null,
};

/**
 * Which color plane style directives target
 */
export type ColorMode = 'foreground' | 'background';

/**
 * Options for turning styled cells into terminal text
 */
export interface EncodeOptions {
  useBackground: boolean;
}
