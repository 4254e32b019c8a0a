import { describe, it, expect } from 'vitest';
import { bgColor, color256, colorCode, fgColor } from './colors.js';
import { ANSIBuilder } from './builder.js';

describe('color codes', () => {
  it('formats 256-color directives', () => {
    expect(fgColor(color256(196))).toBe('\x1b[38;5;196m');
    expect(bgColor(color256(21))).toBe('\x1b[48;5;21m');
  });

  it('clamps indices into the palette', () => {
    expect(color256(300)).toEqual({ type: '256', value: 255 });
    expect(color256(-1)).toEqual({ type: '256', value: 0 });
  });

  it('picks the plane by mode', () => {
    expect(colorCode(color256(16), 'foreground')).toBe('\x1b[38;5;16m');
    expect(colorCode(color256(16), 'background')).toBe('\x1b[48;5;16m');
  });
});

describe('ANSIBuilder', () => {
  it('chains directives and text, then clears on build', () => {
    const builder = new ANSIBuilder();
    const out = builder
      .setColor(color256(46), 'foreground')
      .write('x')
      .setBackground(color256(16))
      .write('y')
      .resetAttributes()
      .build();

    expect(out).toBe('\x1b[38;5;46mx\x1b[48;5;16my\x1b[0m');
    expect(builder.build()).toBe('');
  });
});
