export type TimeUnit = 'seconds' | 'milliseconds';

export type InputFormat = 'mp3' | 'wav' | 'ogg' | 'flac';
export type OutputFormat = 'mp3' | 'wav' | 'ogg';

/**
 * Raw PCM as handed back by the codec, before it becomes an AudioBuffer.
 */
export interface DecodedAudio {
  samples: Int16Array; // Interleaved when channels > 1
  channels: number;
  sampleRate: number;
}

/**
 * A decoded file. Never mutated after load; a new load replaces it wholesale.
 */
export interface AudioBuffer {
  readonly id: string;
  readonly sourcePath: string;
  readonly samples: Int16Array;
  readonly channels: number;
  readonly sampleRate: number;
  readonly durationMs: number;
}

export interface SelectionRange {
  startMs: number;
  endMs: number;
}

export type DragState = 'idle' | 'draggingStart' | 'draggingEnd';

export type Boundary = 'start' | 'end';

export interface SliderConfig {
  min: number;
  max: number;
  step: number;
}

export interface AnalysisResult {
  amplitudes: number[];
  timeAxis: number[];
  spectrumMagnitudes: number[];
  spectrumFreqs: number[];
}

export type ChannelMode = 'interleaved' | 'mixdown';

export interface ExportResult {
  outputPath: string;
  format: OutputFormat;
  startMs: number;
  endMs: number;
  durationMs: number;
  sampleCount: number;
}
