import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { execSync } from 'child_process';
import { PassThrough } from 'stream';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { DecodedAudio } from '@/types/audio';
import { AudioCodec, EncodeRequest } from '@/lib/audio/codec';
import { ENCODER_SETTINGS } from '@/lib/config';
import { DecodeError, EncodeError, describeError } from '@/lib/errors';
import { Logger, createLogger } from '@/lib/logger';

const BYTES_PER_SAMPLE = 2;

// Try to find ffmpeg in common locations
function findFfmpegPath(): string | null {
  const commonPaths = [
    '/usr/local/bin/ffmpeg',
    '/usr/bin/ffmpeg',
    '/opt/homebrew/bin/ffmpeg',
  ];

  for (const p of commonPaths) {
    if (fs.existsSync(p)) {
      return p;
    }
  }

  try {
    const result = execSync('which ffmpeg', { encoding: 'utf8' }).trim();
    if (result && fs.existsSync(result)) {
      return result;
    }
  } catch {
    // not on PATH either; fluent-ffmpeg falls back to its own lookup
  }

  return null;
}

let ffmpegConfigured = false;

function configureFfmpeg(logger: Logger): void {
  if (ffmpegConfigured) return;
  ffmpegConfigured = true;

  const ffmpegPath = findFfmpegPath();
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
    logger.debug('Using ffmpeg binary', { ffmpegPath });
  } else {
    logger.warn('ffmpeg not found in common locations, relying on PATH');
  }
}

const AudioStreamSchema = z.object({
  codec_type: z.literal('audio'),
  sample_rate: z.coerce.number().int().positive(),
  channels: z.number().int().positive(),
});

export type AudioStreamInfo = z.infer<typeof AudioStreamSchema>;

/**
 * Pick the first usable audio stream out of ffprobe's stream list.
 * @returns null when the file has no audio stream with a known layout
 */
export function parseAudioStream(streams: readonly unknown[]): AudioStreamInfo | null {
  for (const stream of streams) {
    const parsed = AudioStreamSchema.safeParse(stream);
    if (parsed.success) return parsed.data;
  }
  return null;
}

/**
 * Little-endian s16 bytes to samples. A trailing odd byte is dropped.
 */
export function pcmFromBytes(bytes: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(bytes.length / BYTES_PER_SAMPLE));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

export function pcmToBytes(samples: Int16Array): Buffer {
  const bytes = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    bytes.writeInt16LE(samples[i], i * BYTES_PER_SAMPLE);
  }
  return bytes;
}

function probeAudioStream(filePath: string): Promise<AudioStreamInfo> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: unknown, data) => {
      if (err) {
        reject(new DecodeError(`Could not read ${filePath}: ${describeError(err)}`, { cause: err }));
        return;
      }
      const stream = parseAudioStream(data.streams);
      if (!stream) {
        reject(new DecodeError(`No audio stream found in ${filePath}`));
        return;
      }
      resolve(stream);
    });
  });
}

function readPcm(filePath: string, stream: AudioStreamInfo): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const output = new PassThrough();
    output.on('data', (chunk: Buffer) => chunks.push(chunk));
    output.on('end', () => resolve(Buffer.concat(chunks)));

    ffmpeg(filePath)
      .noVideo()
      .audioCodec('pcm_s16le')
      .audioChannels(stream.channels)
      .audioFrequency(stream.sample_rate)
      .format('s16le')
      .on('error', (err: Error) => {
        reject(new DecodeError(`Failed to decode ${filePath}: ${err.message}`, { cause: err }));
      })
      .pipe(output, { end: true });
  });
}

async function removeTempFile(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (err) {
    logger.warn('Failed to remove temp file', { filePath, error: describeError(err) });
  }
}

/**
 * AudioCodec backed by the ffmpeg binary. Decodes to interleaved s16le PCM
 * at the source's own rate and channel count; encodes by writing raw PCM to
 * a temp file and transcoding it into the requested container.
 */
export function createFfmpegCodec(logger: Logger = createLogger('Codec')): AudioCodec {
  configureFfmpeg(logger);

  return {
    async decode(filePath: string): Promise<DecodedAudio> {
      const stream = await probeAudioStream(filePath);
      const bytes = await readPcm(filePath, stream);

      logger.debug('Decoded audio', {
        filePath,
        sampleRate: stream.sample_rate,
        channels: stream.channels,
        bytes: bytes.length,
      });

      return {
        samples: pcmFromBytes(bytes),
        channels: stream.channels,
        sampleRate: stream.sample_rate,
      };
    },

    async encode(request: EncodeRequest): Promise<void> {
      const { samples, channels, sampleRate, outputPath, format } = request;
      const settings = ENCODER_SETTINGS[format];
      const rawPath = path.join(os.tmpdir(), `waveslice_${uuid()}.pcm`);

      await fs.promises.writeFile(rawPath, pcmToBytes(samples));

      try {
        await new Promise<void>((resolve, reject) => {
          const command = ffmpeg(rawPath)
            .inputFormat('s16le')
            .inputOptions([`-ar ${sampleRate}`, `-ac ${channels}`])
            .audioCodec(settings.codec)
            .format(settings.container);

          if (settings.bitrate !== undefined) {
            command.audioBitrate(settings.bitrate);
          }

          command
            .on('end', () => resolve())
            .on('error', (err: Error) => {
              reject(new EncodeError(`Failed to write ${outputPath}: ${err.message}`, { cause: err }));
            })
            .save(outputPath);
        });
      } finally {
        await removeTempFile(rawPath, logger);
      }
    },
  };
}
