import { describe, it, expect, vi } from 'vitest';
import { MagickDecoder } from './magick-decoder.js';
import { DecodeError } from '../errors.js';
import type { CommandResult, CommandRunner } from '../utils/run-command.js';

const LISTING = [
  '# ImageMagick pixel enumeration: 2,1,255,rgb',
  '0,0: (255,0,0)  #FF0000  rgb(255,0,0)',
  '1,0: (0%,100%,0%)  #00FF00  rgb(0%,100%,0%)',
].join('\n');

function ok(stdout: string): CommandResult {
  return { code: 0, stdout, stderr: '' };
}

function createRunner(convert: CommandResult, identify: CommandResult = ok('640 480')) {
  return vi.fn<CommandRunner>(async (command) => (command === 'identify' ? identify : convert));
}

describe('MagickDecoder', () => {
  it('builds the resize-and-enumerate arguments', () => {
    const decoder = new MagickDecoder({ convertBin: 'convert', identifyBin: 'identify' });

    expect(decoder.buildArgs('in.png', 160, false)).toEqual([
      'in.png',
      '-resize', '160x',
      '-unsharp', '0.5x0.5+0.5+0.008',
      '-colorspace', 'RGB',
      '-depth', '8',
      'txt:-',
    ]);
    expect(decoder.buildArgs('in.png', 40, true).slice(0, 4)).toEqual([
      'in.png', '-dither', 'FloydSteinberg', '-resize',
    ]);
  });

  it('parses the listing into pixels', async () => {
    const runner = createRunner(ok(LISTING));
    const decoder = new MagickDecoder({ convertBin: 'convert', identifyBin: 'identify', runner });

    const image = await decoder.decode('in.png', 160, false);

    expect(image.source).toEqual({ width: 640, height: 480 });
    expect(image.pixels.size).toBe(2);
    expect(image.pixels.get(0, 0)).toEqual({ r: 255, g: 0, b: 0 });
    expect(image.pixels.get(1, 0)).toEqual({ r: 0, g: 255, b: 0 });
    expect(runner).toHaveBeenCalledWith('identify', ['-format', '%w %h', 'in.png']);
    expect(runner).toHaveBeenCalledWith('convert', decoder.buildArgs('in.png', 160, false));
  });

  it('uses the configured binaries', async () => {
    const runner = vi.fn<CommandRunner>(async () => ok(LISTING));
    const decoder = new MagickDecoder({ convertBin: 'magick', identifyBin: 'magick-identify', runner });

    await decoder.decode('in.png', 10, true);

    expect(runner.mock.calls.map(([command]) => command)).toEqual(['magick-identify', 'magick']);
  });

  it('reports the tool diagnostic on a non-zero exit', async () => {
    const runner = createRunner({ code: 1, stdout: '', stderr: 'convert: no decode delegate\n' });
    const decoder = new MagickDecoder({ convertBin: 'convert', identifyBin: 'identify', runner });

    const error = await decoder.decode('in.xyz', 160, false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({
      code: 'decode-failed',
      diagnostic: 'convert: no decode delegate\n',
      message: 'ImageMagick error: convert: no decode delegate',
    });
  });

  it('wraps a failure to start the tool', async () => {
    const runner = vi.fn<CommandRunner>(async (command) => {
      throw new Error(`spawn ${command} ENOENT`);
    });
    const decoder = new MagickDecoder({ convertBin: 'convert', identifyBin: 'identify', runner });

    await expect(decoder.decode('in.png', 160, false)).rejects.toThrow('ImageMagick error: spawn convert ENOENT');
  });

  it('continues without source dimensions when identify fails', async () => {
    const runner = createRunner(ok(LISTING), { code: 1, stdout: '', stderr: 'identify: nope' });
    const decoder = new MagickDecoder({ convertBin: 'convert', identifyBin: 'identify', runner });

    const image = await decoder.decode('in.png', 160, false);

    expect(image.source).toBeNull();
    expect(image.pixels.size).toBe(2);
  });
});
