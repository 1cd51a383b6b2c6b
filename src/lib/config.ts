import { InputFormat, OutputFormat, TimeUnit } from '@/types/audio';

/**
 * Static configuration for the trimmer. Nothing here is read from the
 * environment or persisted between sessions.
 */

export const SUPPORTED_INPUT_FORMATS: readonly InputFormat[] = ['mp3', 'wav', 'ogg', 'flac'];

export const SUPPORTED_OUTPUT_FORMATS: readonly OutputFormat[] = ['mp3', 'wav', 'ogg'];

// Appended when a save path comes in without an extension
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'mp3';

export const DEFAULT_TIME_UNIT: TimeUnit = 'seconds';

/**
 * Slider resolution per display unit (1 ms either way).
 */
export const UNIT_STEPS: Record<TimeUnit, number> = {
  seconds: 0.001,
  milliseconds: 1,
};

export const MS_PER_UNIT: Record<TimeUnit, number> = {
  seconds: 1000,
  milliseconds: 1,
};

export interface EncoderSettings {
  codec: string;
  container: string;
  bitrate?: number;
}

export const ENCODER_SETTINGS: Record<OutputFormat, EncoderSettings> = {
  mp3: { codec: 'libmp3lame', container: 'mp3', bitrate: 192 },
  wav: { codec: 'pcm_s16le', container: 'wav' },
  ogg: { codec: 'libvorbis', container: 'ogg' },
};
