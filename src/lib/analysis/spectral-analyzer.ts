import { AnalysisResult } from '@/types/audio';
import { dft } from '@/lib/analysis/fft';

/**
 * Scale a slice into [-1, 1] by its peak absolute value.
 * An all-zero slice is returned as-is.
 */
export function normalizeAmplitudes(samples: ArrayLike<number>): number[] {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const abs = Math.abs(samples[i]);
    if (abs > peak) peak = abs;
  }

  const out = new Array<number>(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = peak === 0 ? samples[i] : samples[i] / peak;
  }
  return out;
}

/**
 * `count` evenly spaced points from start to end, both inclusive.
 */
export function linspace(start: number, end: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];

  const step = (end - start) / (count - 1);
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    out[i] = start + step * i;
  }
  out[count - 1] = end;
  return out;
}

/**
 * One-sided magnitude spectrum of a real signal: bins 0 .. floor(n/2) - 1,
 * bin k at k * sampleRate / n Hz.
 */
export function magnitudeSpectrum(
  signal: ArrayLike<number>,
  sampleRate: number
): { magnitudes: number[]; freqs: number[] } {
  const n = signal.length;
  const half = Math.floor(n / 2);
  if (half === 0) {
    return { magnitudes: [], freqs: [] };
  }

  const { real, imag } = dft(signal);
  const magnitudes = new Array<number>(half);
  const freqs = new Array<number>(half);
  for (let k = 0; k < half; k++) {
    magnitudes[k] = Math.hypot(real[k], imag[k]);
    freqs[k] = (k * sampleRate) / n;
  }
  return { magnitudes, freqs };
}

/**
 * Waveform and spectrum for the selected slice. `startDisplay` and
 * `endDisplay` are the selection bounds in the current display unit and
 * only shape the time axis.
 */
export function analyze(
  samples: ArrayLike<number>,
  sampleRate: number,
  startDisplay: number,
  endDisplay: number
): AnalysisResult {
  if (samples.length === 0) {
    return { amplitudes: [], timeAxis: [], spectrumMagnitudes: [], spectrumFreqs: [] };
  }

  const amplitudes = normalizeAmplitudes(samples);
  const timeAxis = linspace(startDisplay, endDisplay, amplitudes.length);
  const { magnitudes, freqs } = magnitudeSpectrum(amplitudes, sampleRate);

  return {
    amplitudes,
    timeAxis,
    spectrumMagnitudes: magnitudes,
    spectrumFreqs: freqs,
  };
}

/**
 * Frequency of the strongest non-DC bin, or null if the spectrum is flat zero
 * or has no bins above DC.
 */
export function findPeakFrequency(result: AnalysisResult): number | null {
  let peakIndex = -1;
  let peakMagnitude = 0;
  for (let k = 1; k < result.spectrumMagnitudes.length; k++) {
    if (result.spectrumMagnitudes[k] > peakMagnitude) {
      peakMagnitude = result.spectrumMagnitudes[k];
      peakIndex = k;
    }
  }
  return peakIndex === -1 ? null : result.spectrumFreqs[peakIndex];
}
