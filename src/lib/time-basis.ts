/**
 * Conversions between display units, canonical milliseconds and sample frames.
 */

import { SliderConfig, TimeUnit } from '@/types/audio';
import { MS_PER_UNIT, UNIT_STEPS } from '@/lib/config';

/**
 * Absorbs binary representation error before flooring, so 1.001 s
 * (1000.9999999999999 after scaling) lands on 1001 ms.
 */
const FLOOR_EPSILON = 1e-6;

/**
 * Convert a display value to whole milliseconds (floored).
 */
export function toMs(value: number, unit: TimeUnit): number {
  return Math.floor(value * MS_PER_UNIT[unit] + FLOOR_EPSILON);
}

/**
 * Convert canonical milliseconds to the display unit.
 */
export function fromMs(ms: number, unit: TimeUnit): number {
  return ms / MS_PER_UNIT[unit];
}

export function getUnitStep(unit: TimeUnit): number {
  return UNIT_STEPS[unit];
}

/**
 * Slider bounds and resolution for a buffer of the given duration.
 */
export function getSliderConfig(durationMs: number, unit: TimeUnit): SliderConfig {
  return {
    min: 0,
    max: fromMs(durationMs, unit),
    step: getUnitStep(unit),
  };
}

/**
 * Floor and clamp a millisecond value into [0, durationMs].
 * Non-finite input clamps to 0.
 */
export function clampMs(ms: number, durationMs: number): number {
  if (!Number.isFinite(ms)) return 0;
  return Math.min(Math.max(Math.floor(ms), 0), Math.max(durationMs, 0));
}

export function msToFrame(ms: number, sampleRate: number): number {
  return Math.floor((ms * sampleRate) / 1000);
}

/**
 * Duration in whole milliseconds of an interleaved sample array.
 */
export function computeDurationMs(sampleCount: number, channels: number, sampleRate: number): number {
  if (channels <= 0 || sampleRate <= 0) return 0;
  return Math.floor((sampleCount / channels / sampleRate) * 1000);
}
