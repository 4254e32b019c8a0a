import { BRAILLE_BASE, GRAYSCALE_END, GRAYSCALE_START } from '@termdots/protocol';
import { ANSIBuilder, color256, rgbToAnsi256 } from '@termdots/render';

/**
 * Reference colors for the accuracy section
 */
const ACCURACY_COLORS: Array<[number, number, number]> = [
  [255, 0, 0],    // Red
  [0, 255, 0],    // Green
  [0, 0, 255],    // Blue
  [255, 255, 0],  // Yellow
  [255, 0, 255],  // Magenta
  [0, 255, 255],  // Cyan
];

function swatch(index: number, text: string): string {
  return new ANSIBuilder()
    .setBackground(color256(index))
    .write(text)
    .resetAttributes()
    .build();
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

/**
 * Lines of the 256-color terminal self-test
 */
export function colorTestLines(): string[] {
  const lines: string[] = [
    '256-color Terminal Support Test',
    '='.repeat(60),
    '',
    '1. System colors (0-15):',
    range(0, 7).map(i => swatch(i, '   ')).join(''),
    range(8, 15).map(i => swatch(i, '   ')).join(''),
    '',
    '2. 216-color cube (16-231):',
    'R steps across rows, G down the groups, B within each row',
  ];

  for (let g = 0; g < 6; g++) {
    for (let r = 0; r < 6; r++) {
      const cube = range(0, 5).map(b => swatch(16 + 36 * r + 6 * g + b, '  ')).join('');
      lines.push(`R${r}G${g}: ${cube}`);
    }
  }

  lines.push(
    '',
    '3. Grayscale gradient (232-255):',
    range(GRAYSCALE_START, GRAYSCALE_END).map(i => swatch(i, '  ')).join(''),
    '',
    '4. Braille character test:'
  );

  for (let rowStart = 0; rowStart < 32; rowStart += 16) {
    lines.push(
      range(rowStart, rowStart + 15)
        .map(i => String.fromCharCode(BRAILLE_BASE + i))
        .join(' ')
    );
  }

  lines.push('', '5. Color accuracy test:');
  for (const [r, g, b] of ACCURACY_COLORS) {
    const index = rgbToAnsi256(r, g, b);
    const label = `RGB(${pad(r)},${pad(g)},${pad(b)}) → ${pad(index)}`;
    lines.push(swatch(index, ` ${label} `));
  }

  return lines;
}

function pad(value: number): string {
  return String(value).padStart(3, ' ');
}
