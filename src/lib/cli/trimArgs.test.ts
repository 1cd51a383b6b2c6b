import { ZodError } from 'zod';
import { parseTrimArgs } from './trimArgs';

describe('parseTrimArgs', () => {
  it('applies defaults', () => {
    expect(parseTrimArgs(['song.mp3'])).toEqual({
      input: 'song.mp3',
      unit: 'seconds',
      mixdown: false,
      verbose: false,
    });
  });

  it('parses a full trim request', () => {
    const args = parseTrimArgs([
      'song.wav',
      '--start',
      '1500',
      '--end',
      '2500',
      '--unit',
      'milliseconds',
      '--out',
      'clip.ogg',
      '--mixdown',
    ]);

    expect(args).toEqual({
      input: 'song.wav',
      unit: 'milliseconds',
      start: 1500,
      end: 2500,
      out: 'clip.ogg',
      mixdown: true,
      verbose: false,
    });
  });

  it('requires an input file', () => {
    expect(() => parseTrimArgs(['--start', '1'])).toThrow(ZodError);
  });

  it('rejects an unknown unit', () => {
    expect(() => parseTrimArgs(['song.wav', '--unit', 'minutes'])).toThrow(ZodError);
  });

  it('rejects a negative or non-numeric bound', () => {
    expect(() => parseTrimArgs(['song.wav', '--start=-1'])).toThrow(ZodError);
    expect(() => parseTrimArgs(['song.wav', '--end', 'soon'])).toThrow(ZodError);
  });
});
