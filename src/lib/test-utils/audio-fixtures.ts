/**
 * Test doubles for the codec and renderer collaborators, plus buffer factories.
 */

import { AudioBuffer, DecodedAudio } from '@/types/audio';
import { AudioCodec, EncodeRequest } from '@/lib/audio/codec';
import { createAudioBuffer } from '@/lib/audio/audio-buffer';
import { RenderFrame, SelectionRenderer } from '@/lib/render/renderFrame';
import { Logger } from '@/lib/logger';

// ==================== Factory Functions ====================

export interface TestAudioOptions {
  durationMs: number;
  sampleRate?: number;
  channels?: number;
  /** Sample value for frame index `frame` and channel `channel`. Defaults to a ramp. */
  fill?: (frame: number, channel: number) => number;
}

/**
 * Create decoded PCM with sensible defaults: mono at 1 kHz, so one frame per ms.
 */
export function createDecodedAudio(options: TestAudioOptions): DecodedAudio {
  const sampleRate = options.sampleRate ?? 1000;
  const channels = options.channels ?? 1;
  const fill = options.fill ?? ((frame: number) => (frame % 200) - 100);
  const frames = Math.floor((options.durationMs * sampleRate) / 1000);

  const samples = new Int16Array(frames * channels);
  for (let f = 0; f < frames; f++) {
    for (let c = 0; c < channels; c++) {
      samples[f * channels + c] = fill(f, c);
    }
  }
  return { samples, channels, sampleRate };
}

export function createTestBuffer(options: TestAudioOptions, sourcePath = 'test.wav'): AudioBuffer {
  return createAudioBuffer(createDecodedAudio(options), sourcePath);
}

// ==================== Collaborator Fakes ====================

export interface FakeCodec extends AudioCodec {
  decode: jest.Mock<Promise<DecodedAudio>, [string]>;
  encode: jest.Mock<Promise<void>, [EncodeRequest]>;
}

/**
 * In-memory codec. `files` maps input paths to decoded audio; unknown paths
 * reject the way a missing file would. Encodes are only recorded.
 */
export function createFakeCodec(files: Record<string, DecodedAudio> = {}): FakeCodec {
  return {
    decode: jest.fn<Promise<DecodedAudio>, [string]>(async (filePath) => {
      const decoded = files[filePath];
      if (!decoded) {
        throw new Error(`ENOENT: no such file, open '${filePath}'`);
      }
      return decoded;
    }),
    encode: jest.fn<Promise<void>, [EncodeRequest]>(async () => undefined),
  };
}

export interface RecordingRenderer extends SelectionRenderer {
  frames: RenderFrame[];
  lastFrame: () => RenderFrame | undefined;
}

/**
 * Renderer that keeps every frame it was given. `onRender` runs inside the
 * render call, which lets tests simulate widgets echoing values back.
 */
export function createRecordingRenderer(onRender?: (frame: RenderFrame) => void): RecordingRenderer {
  const frames: RenderFrame[] = [];
  return {
    frames,
    render(frame) {
      frames.push(frame);
      onRender?.(frame);
    },
    lastFrame: () => frames[frames.length - 1],
  };
}

export function createSilentLogger(): Logger & { [K in keyof Logger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
