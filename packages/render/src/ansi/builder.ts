import { STYLE } from './codes.js';
import { bgColor, colorCode } from './colors.js';
import type { Color, ColorMode } from '@termdots/protocol';

/**
 * Fluent ANSI escape sequence builder
 */
export class ANSIBuilder {
  private output: string = '';

  // Colors
  setBackground(color: Color): this {
    this.output += bgColor(color);
    return this;
  }

  setColor(color: Color, mode: ColorMode): this {
    this.output += colorCode(color, mode);
    return this;
  }

  resetAttributes(): this {
    this.output += STYLE.reset;
    return this;
  }

  // Text output
  write(text: string): this {
    this.output += text;
    return this;
  }

  // Build and clear
  build(): string {
    const result = this.output;
    this.output = '';
    return result;
  }
}
