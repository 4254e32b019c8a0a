// Glyph constants
export const BRAILLE_BASE = 0x2800;
export const BRAILLE_GLYPH_COUNT = 256;

// Cell geometry (source pixels per character)
export const CELL_PIXEL_WIDTH = 2;
export const CELL_PIXEL_HEIGHT = 4;

// Palette layout
export const PALETTE_BLACK = 16;
export const PALETTE_WHITE = 231;
export const COLOR_CUBE_START = 16;
export const GRAYSCALE_START = 232;
export const GRAYSCALE_END = 255;

// Terminal defaults
export const DEFAULT_CHAR_WIDTH = 80;
export const HEADER_RULE_MAX = 80;
