/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * Text styling
 */
export const STYLE = {
  /** Reset all attributes */
  reset: `${CSI}0m`,
} as const;

/**
 * SGR parameter prefixes for extended colors
 */
export const SGR = {
  /** 256-color foreground: 38;5;N */
  fg256: '38;5',
  /** 256-color background: 48;5;N */
  bg256: '48;5',
} as const;
