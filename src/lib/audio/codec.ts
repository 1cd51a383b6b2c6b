import { DecodedAudio, OutputFormat } from '@/types/audio';

export interface EncodeRequest {
  samples: Int16Array;
  channels: number;
  sampleRate: number;
  outputPath: string;
  format: OutputFormat;
}

/**
 * Decode/encode collaborator. The trimmer never touches codec internals;
 * it only hands paths and interleaved 16-bit PCM across this boundary.
 */
export interface AudioCodec {
  decode(filePath: string): Promise<DecodedAudio>;
  encode(request: EncodeRequest): Promise<void>;
}
