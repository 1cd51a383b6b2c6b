import { FFT, dft, isPowerOfTwo, nextPowerOfTwo } from './fft';

function naiveDft(signal: number[]): { real: number[]; imag: number[] } {
  const n = signal.length;
  const real: number[] = [];
  const imag: number[] = [];
  for (let k = 0; k < n; k++) {
    let re = 0;
    let im = 0;
    for (let j = 0; j < n; j++) {
      const angle = (-2 * Math.PI * j * k) / n;
      re += signal[j] * Math.cos(angle);
      im += signal[j] * Math.sin(angle);
    }
    real.push(re);
    imag.push(im);
  }
  return { real, imag };
}

function testSignal(n: number): number[] {
  return Array.from({ length: n }, (_, i) => Math.sin(i * 0.7) + 0.5 * Math.cos(i * 2.3) - 0.1 * i);
}

describe('power of two helpers', () => {
  it('detects powers of two', () => {
    expect(isPowerOfTwo(1)).toBe(true);
    expect(isPowerOfTwo(1024)).toBe(true);
    expect(isPowerOfTwo(0)).toBe(false);
    expect(isPowerOfTwo(6)).toBe(false);
    expect(isPowerOfTwo(2.5)).toBe(false);
  });

  it('rounds up to the next power of two', () => {
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(5)).toBe(8);
    expect(nextPowerOfTwo(8)).toBe(8);
    expect(nextPowerOfTwo(1025)).toBe(2048);
  });
});

describe('FFT', () => {
  it('refuses sizes that are not a power of two', () => {
    expect(() => new FFT(6)).toThrow(RangeError);
  });

  it('puts a constant signal entirely in the DC bin', () => {
    const real = new Float64Array(8).fill(1);
    const imag = new Float64Array(8);

    new FFT(8).forward(real, imag);

    expect(real[0]).toBeCloseTo(8, 10);
    for (let k = 1; k < 8; k++) {
      expect(Math.hypot(real[k], imag[k])).toBeCloseTo(0, 10);
    }
  });

  it('recovers the input after forward and scaled inverse', () => {
    const input = testSignal(16);
    const real = Float64Array.from(input);
    const imag = new Float64Array(16);
    const fft = new FFT(16);

    fft.forward(real, imag);
    fft.inverse(real, imag);

    for (let i = 0; i < 16; i++) {
      expect(real[i] / 16).toBeCloseTo(input[i], 10);
      expect(imag[i] / 16).toBeCloseTo(0, 10);
    }
  });
});

describe('dft', () => {
  it('finds a single cosine in bins 1 and n-1', () => {
    const signal = Array.from({ length: 8 }, (_, i) => Math.cos((2 * Math.PI * i) / 8));

    const { real, imag } = dft(signal);

    expect(Math.hypot(real[1], imag[1])).toBeCloseTo(4, 10);
    expect(Math.hypot(real[7], imag[7])).toBeCloseTo(4, 10);
    expect(Math.hypot(real[2], imag[2])).toBeCloseTo(0, 10);
  });

  it.each([3, 5, 6, 7, 12, 100, 257])('matches a direct DFT for length %i', (n) => {
    const signal = testSignal(n);
    const expected = naiveDft(signal);

    const { real, imag } = dft(signal);

    for (let k = 0; k < n; k++) {
      expect(real[k]).toBeCloseTo(expected.real[k], 6);
      expect(imag[k]).toBeCloseTo(expected.imag[k], 6);
    }
  });

  it('returns a single sample unchanged', () => {
    const { real, imag } = dft([0.25]);

    expect(Array.from(real)).toEqual([0.25]);
    expect(Array.from(imag)).toEqual([0]);
  });

  it('returns empty arrays for an empty signal', () => {
    const { real, imag } = dft([]);

    expect(real.length).toBe(0);
    expect(imag.length).toBe(0);
  });
});
