import { CSI, SGR } from './codes.js';
import type { Color, ColorMode } from '@termdots/protocol';

/**
 * Generate foreground color code
 */
export function fgColor(color: Color): string {
  return `${CSI}${SGR.fg256};${color.value}m`;
}

/**
 * Generate background color code
 */
export function bgColor(color: Color): string {
  return `${CSI}${SGR.bg256};${color.value}m`;
}

/**
 * Color code for the given plane
 */
export function colorCode(color: Color, mode: ColorMode): string {
  return mode === 'background' ? bgColor(color) : fgColor(color);
}

/**
 * Create 256-color from index
 */
export function color256(index: number): Color {
  return { type: '256', value: Math.max(0, Math.min(255, index)) };
}
