import { describe, it, expect } from 'vitest';
import { colorTestLines } from './color-test.js';

describe('colorTestLines', () => {
  const lines = colorTestLines();

  it('prints every section', () => {
    expect(lines).toHaveLength(60);
    expect(lines[0]).toBe('256-color Terminal Support Test');
    expect(lines).toContain('1. System colors (0-15):');
    expect(lines).toContain('2. 216-color cube (16-231):');
    expect(lines).toContain('3. Grayscale gradient (232-255):');
    expect(lines).toContain('4. Braille character test:');
    expect(lines).toContain('5. Color accuracy test:');
  });

  it('shows system colors as background swatches', () => {
    expect(lines[4]?.startsWith('\x1b[48;5;0m   \x1b[0m\x1b[48;5;1m   \x1b[0m')).toBe(true);
  });

  it('lists one cube row per R/G pair', () => {
    const cubeRows = lines.filter(line => /^R\dG\d: /.test(line));
    expect(cubeRows).toHaveLength(36);
    expect(cubeRows[1]).toBe(
      'R1G0: ' + [52, 53, 54, 55, 56, 57].map(i => `\x1b[48;5;${i}m  \x1b[0m`).join('')
    );
  });

  it('prints the first 32 Braille glyphs, 16 per line', () => {
    const start = lines.indexOf('4. Braille character test:');
    expect(lines[start + 1]).toBe(
      Array.from({ length: 16 }, (_, i) => String.fromCharCode(0x2800 + i)).join(' ')
    );
    expect(lines[start + 2]?.split(' ')).toHaveLength(16);
  });

  it('labels the palette index chosen for each reference color', () => {
    expect(lines.slice(-6)).toEqual([
      '\x1b[48;5;196m RGB(255,  0,  0) → 196 \x1b[0m',
      '\x1b[48;5;46m RGB(  0,255,  0) →  46 \x1b[0m',
      '\x1b[48;5;21m RGB(  0,  0,255) →  21 \x1b[0m',
      '\x1b[48;5;226m RGB(255,255,  0) → 226 \x1b[0m',
      '\x1b[48;5;201m RGB(255,  0,255) → 201 \x1b[0m',
      '\x1b[48;5;51m RGB(  0,255,255) →  51 \x1b[0m',
    ]);
  });
});
