/**
 * Tests for trimmer error classes and assertion helpers.
 */

import {
  AudioTrimmerError,
  DecodeError,
  EncodeError,
  ValidationError,
  assertBufferLoaded,
  assertValidRange,
  describeError,
} from './errors';
import { createTestBuffer } from '@/lib/test-utils/audio-fixtures';

describe('error classes', () => {
  it('DecodeError carries the decode operation', () => {
    const error = new DecodeError('Unsupported audio format: txt');

    expect(error).toBeInstanceOf(AudioTrimmerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DecodeError');
    expect(error.operation).toBe('decode');
    expect(error.message).toBe('Unsupported audio format: txt');
  });

  it('ValidationError is tagged as an export failure', () => {
    const error = new ValidationError('End time must be greater than start time');

    expect(error.name).toBe('ValidationError');
    expect(error.operation).toBe('export');
  });

  it('EncodeError keeps the underlying cause', () => {
    const cause = new Error('disk full');
    const error = new EncodeError('Failed to write clip.mp3: disk full', { cause });

    expect(error.name).toBe('EncodeError');
    expect(error.operation).toBe('encode');
    expect(error.cause).toBe(cause);
  });

  it('preserves stack trace', () => {
    const error = new DecodeError('Test');

    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('DecodeError');
  });
});

describe('assertValidRange', () => {
  it('accepts a forward range', () => {
    expect(() => assertValidRange({ startMs: 1000, endMs: 2000 })).not.toThrow();
  });

  it('rejects an inverted range', () => {
    expect(() => assertValidRange({ startMs: 2000, endMs: 1000 })).toThrow(
      new ValidationError('End time must be greater than start time')
    );
  });

  it('rejects an empty range', () => {
    expect(() => assertValidRange({ startMs: 1500, endMs: 1500 })).toThrow(ValidationError);
  });
});

describe('assertBufferLoaded', () => {
  it('returns the buffer when present', () => {
    const buffer = createTestBuffer({ durationMs: 100 });

    expect(assertBufferLoaded(buffer)).toBe(buffer);
  });

  it('throws ValidationError when nothing is loaded', () => {
    expect(() => assertBufferLoaded(null)).toThrow('No audio file loaded');
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain failure')).toBe('plain failure');
    expect(describeError(42)).toBe('42');
  });
});
