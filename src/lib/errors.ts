import { AudioBuffer, SelectionRange } from '@/types/audio';

export type TrimmerOperation = 'decode' | 'export' | 'encode';

/**
 * Base class for every failure the trimmer surfaces to the user.
 * Includes the failing operation for error tracking and debugging.
 */
export class AudioTrimmerError extends Error {
  constructor(
    message: string,
    public readonly operation: TrimmerOperation,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AudioTrimmerError';
  }
}

/**
 * The input file could not be read or is not a supported audio format.
 */
export class DecodeError extends AudioTrimmerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'decode', options);
    this.name = 'DecodeError';
  }
}

/**
 * The export request was rejected before anything was written.
 */
export class ValidationError extends AudioTrimmerError {
  constructor(message: string) {
    super(message, 'export');
    this.name = 'ValidationError';
  }
}

/**
 * Writing the output failed. A partial file may remain on disk.
 */
export class EncodeError extends AudioTrimmerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'encode', options);
    this.name = 'EncodeError';
  }
}

/**
 * Assert that a buffer is loaded.
 * @throws ValidationError if nothing has been loaded yet
 */
export function assertBufferLoaded(buffer: AudioBuffer | null): AudioBuffer {
  if (!buffer) {
    throw new ValidationError('No audio file loaded');
  }
  return buffer;
}

/**
 * Assert that a range can be exported. This is the only place an inverted
 * or empty selection is rejected; interactive edits accept them.
 * @throws ValidationError if end does not exceed start
 */
export function assertValidRange(range: SelectionRange): void {
  if (range.startMs >= range.endMs) {
    throw new ValidationError('End time must be greater than start time');
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
