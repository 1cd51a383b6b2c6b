import { AudioBuffer, ExportResult, SelectionRange } from '@/types/audio';
import { AudioCodec } from '@/lib/audio/codec';
import { sliceAudioBuffer } from '@/lib/audio/audio-buffer';
import { getExtension, isOutputFormat, withDefaultExtension } from '@/lib/audio/file-formats';
import {
  EncodeError,
  ValidationError,
  assertBufferLoaded,
  assertValidRange,
  describeError,
} from '@/lib/errors';
import { Logger, createLogger } from '@/lib/logger';

export interface ExportParams {
  buffer: AudioBuffer | null;
  range: SelectionRange;
  outputPath: string;
  codec: AudioCodec;
  logger?: Logger;
}

/**
 * Write the selected range to a new file. The format comes from the output
 * path's extension (mp3 when there is none).
 *
 * @throws ValidationError before any write if nothing is loaded, the range
 *   is empty or inverted, or the extension is not an export format
 * @throws EncodeError if the codec fails while writing
 */
export async function exportSelection(params: ExportParams): Promise<ExportResult> {
  const { range, codec, logger = createLogger('Export') } = params;

  const buffer = assertBufferLoaded(params.buffer);
  assertValidRange(range);

  const outputPath = withDefaultExtension(params.outputPath);
  const format = getExtension(outputPath);
  if (!isOutputFormat(format)) {
    throw new ValidationError(`Unsupported export format: ${format}`);
  }

  const samples = sliceAudioBuffer(buffer, range.startMs, range.endMs);
  const frames = samples.length / buffer.channels;

  logger.info('Exporting selection', {
    outputPath,
    format,
    startMs: range.startMs,
    endMs: range.endMs,
  });

  try {
    await codec.encode({
      samples,
      channels: buffer.channels,
      sampleRate: buffer.sampleRate,
      outputPath,
      format,
    });
  } catch (err) {
    logger.error('Export failed', { outputPath, error: describeError(err) });
    if (err instanceof EncodeError) throw err;
    throw new EncodeError(`Failed to write ${outputPath}: ${describeError(err)}`, { cause: err });
  }

  return {
    outputPath,
    format,
    startMs: range.startMs,
    endMs: range.endMs,
    durationMs: Math.round((frames / buffer.sampleRate) * 1000),
    sampleCount: samples.length,
  };
}
