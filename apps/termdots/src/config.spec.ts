import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig([], {})).toEqual({
      image: undefined,
      width: 80,
      useBackground: false,
      invert: false,
      dither: false,
      decoder: 'sharp',
      magickBin: 'convert',
      identifyBin: 'identify',
      quiet: false,
      stats: false,
      test: false,
      help: false,
    });
  });

  it('reads flags', () => {
    const config = loadConfig(
      ['pic.png', '-w', '100', '-b', '-i', '-d', '--decoder', 'magick', '-q', '--stats'],
      {}
    );

    expect(config).toMatchObject({
      image: 'pic.png',
      width: 100,
      useBackground: true,
      invert: true,
      dither: true,
      decoder: 'magick',
      quiet: true,
      stats: true,
    });
  });

  it('reads environment defaults', () => {
    const config = loadConfig([], {
      TERMDOTS_WIDTH: '40',
      TERMDOTS_BG: 'true',
      TERMDOTS_DECODER: 'magick',
      TERMDOTS_MAGICK_BIN: 'magick',
    });

    expect(config).toMatchObject({
      width: 40,
      useBackground: true,
      decoder: 'magick',
      magickBin: 'magick',
    });
  });

  it('treats empty environment values as unset', () => {
    const config = loadConfig([], {
      TERMDOTS_WIDTH: '',
      TERMDOTS_DECODER: '',
      TERMDOTS_MAGICK_BIN: '',
      TERMDOTS_IDENTIFY_BIN: '',
    });

    expect(config).toMatchObject({
      width: 80,
      decoder: 'sharp',
      magickBin: 'convert',
      identifyBin: 'identify',
    });
  });

  it('lets flags override the environment', () => {
    const config = loadConfig(['--width', '60'], { TERMDOTS_WIDTH: '40' });
    expect(config.width).toBe(60);
  });

  it('rejects widths that are not positive integers', () => {
    expect(() => loadConfig(['-w', '0'], {})).toThrow(ConfigError);
    expect(() => loadConfig(['-w', 'abc'], {})).toThrow(ConfigError);
    expect(() => loadConfig(['-w', '12.5'], {})).toThrow(ConfigError);
    expect(() => loadConfig([], { TERMDOTS_WIDTH: '-3' })).toThrow(ConfigError);
  });

  it('names the failing field', () => {
    expect(() => loadConfig(['-w', '0'], {})).toThrow(/^Invalid configuration - width: /);
  });

  it('rejects unknown decoders and flags', () => {
    expect(() => loadConfig(['--decoder', 'gif'], {})).toThrow(ConfigError);
    expect(() => loadConfig(['--nope'], {})).toThrow(ConfigError);
  });

  it('rejects more than one image', () => {
    expect(() => loadConfig(['a.png', 'b.png'], {})).toThrow('Expected one image path, got 2');
  });
});
