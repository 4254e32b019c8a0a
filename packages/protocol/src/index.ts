export * from './constants.js';
export * from './types/pixel.js';
export * from './types/render.js';
