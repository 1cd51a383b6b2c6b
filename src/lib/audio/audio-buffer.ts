import { v4 as uuid } from 'uuid';
import { AudioBuffer, DecodedAudio } from '@/types/audio';
import { AudioCodec } from '@/lib/audio/codec';
import { getExtension, isInputFormat } from '@/lib/audio/file-formats';
import { DecodeError, describeError } from '@/lib/errors';
import { clampMs, computeDurationMs, msToFrame } from '@/lib/time-basis';

/**
 * Wrap decoded PCM in an immutable buffer. A file with no samples is a
 * valid zero-length buffer.
 * @throws DecodeError if the codec returned an unusable stream layout
 */
export function createAudioBuffer(decoded: DecodedAudio, sourcePath: string): AudioBuffer {
  const { samples, channels, sampleRate } = decoded;

  if (!Number.isInteger(channels) || channels <= 0) {
    throw new DecodeError(`Invalid channel count ${channels} in ${sourcePath}`);
  }
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new DecodeError(`Invalid sample rate ${sampleRate} in ${sourcePath}`);
  }

  return Object.freeze({
    id: uuid(),
    sourcePath,
    samples,
    channels,
    sampleRate,
    durationMs: computeDurationMs(samples.length, channels, sampleRate),
  });
}

/**
 * Decode a file from disk through the codec.
 * @throws DecodeError for unsupported extensions or unreadable input
 */
export async function loadAudioBuffer(filePath: string, codec: AudioCodec): Promise<AudioBuffer> {
  const ext = getExtension(filePath);
  if (!isInputFormat(ext)) {
    throw new DecodeError(`Unsupported audio format: ${ext === '' ? '(none)' : ext}`);
  }

  let decoded: DecodedAudio;
  try {
    decoded = await codec.decode(filePath);
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    throw new DecodeError(`Failed to decode ${filePath}: ${describeError(err)}`, { cause: err });
  }

  return createAudioBuffer(decoded, filePath);
}

/**
 * Interleaved samples between two millisecond offsets.
 * Both bounds are clamped to the buffer; an inverted or empty range
 * yields an empty array rather than an error.
 */
export function sliceAudioBuffer(buffer: AudioBuffer, startMs: number, endMs: number): Int16Array {
  const start = clampMs(startMs, buffer.durationMs);
  const end = clampMs(endMs, buffer.durationMs);
  if (start >= end) {
    return new Int16Array(0);
  }

  const startFrame = msToFrame(start, buffer.sampleRate);
  const endFrame = msToFrame(end, buffer.sampleRate);
  return buffer.samples.subarray(startFrame * buffer.channels, endFrame * buffer.channels);
}

/**
 * Average interleaved frames down to one channel.
 */
export function mixdownToMono(samples: ArrayLike<number>, channels: number): Float64Array {
  if (channels <= 1) {
    return Float64Array.from(samples);
  }

  const frames = Math.floor(samples.length / channels);
  const mono = new Float64Array(frames);
  for (let f = 0; f < frames; f++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) {
      sum += samples[f * channels + c];
    }
    mono[f] = sum / channels;
  }
  return mono;
}
