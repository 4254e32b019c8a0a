// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';

// Sample store
export { PixelMap } from './pixel/pixel-map.js';

// Palette mapping
export { rgbToAnsi256, roundHalfEven, cubeLevel } from './palette/palette-mapper.js';
export { PaletteCache } from './palette/palette-cache.js';

// Braille compositing
export {
  DOT_BIT_ORDER,
  BRIGHTNESS_THRESHOLD,
  luminance,
  isBright,
  quantizeBlock,
  dotPatternToGlyph,
} from './braille/cell-quantizer.js';

export {
  frameSize,
  gatherBlock,
  averageColor,
  composeCell,
  composeRows,
  composeFrame,
  type FrameSize,
} from './braille/frame-compositor.js';

// Stream encoding
export {
  encodeRow,
  encodeRows,
  countStyleDirectives,
  stripStyles,
  type DirectiveCount,
} from './ansi/stream-encoder.js';

// Renderer
export {
  renderFrame,
  frameStats,
  type RenderedFrame,
  type FrameStats,
} from './renderer/frame-renderer.js';
