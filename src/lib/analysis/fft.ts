/**
 * In-place radix-2 FFT with precomputed twiddles, plus Bluestein's
 * chirp-z transform so lengths that are not a power of two still run in
 * O(n log n).
 */
export class FFT {
  private n: number;
  private levels: number;
  private cos: Float64Array;
  private sin: Float64Array;

  constructor(n: number) {
    if (!isPowerOfTwo(n)) {
      throw new RangeError(`FFT size must be a power of two, got ${n}`);
    }
    this.n = n;
    this.levels = Math.round(Math.log2(n));
    this.cos = new Float64Array(n / 2);
    this.sin = new Float64Array(n / 2);
    for (let i = 0; i < n / 2; i++) {
      this.cos[i] = Math.cos((2 * Math.PI * i) / n);
      this.sin[i] = Math.sin((2 * Math.PI * i) / n);
    }
  }

  forward(real: Float64Array, imag: Float64Array): void {
    this.transform(real, imag, -1);
  }

  /** Unscaled inverse; callers divide by n. */
  inverse(real: Float64Array, imag: Float64Array): void {
    this.transform(real, imag, 1);
  }

  private transform(real: Float64Array, imag: Float64Array, sign: 1 | -1): void {
    const n = this.n;

    // Bit-reversal permutation
    let j = 0;
    for (let i = 0; i < n - 1; i++) {
      if (i < j) {
        const tr = real[i];
        const ti = imag[i];
        real[i] = real[j];
        imag[i] = imag[j];
        real[j] = tr;
        imag[j] = ti;
      }
      let k = n >> 1;
      while (k <= j) {
        j -= k;
        k >>= 1;
      }
      j += k;
    }

    for (let s = 1; s <= this.levels; s++) {
      const m = 1 << s;
      const m2 = m >> 1;
      const stride = n / m;
      for (let k = 0; k < m2; k++) {
        const wr = this.cos[k * stride];
        const wi = sign * this.sin[k * stride];
        for (let i = k; i < n; i += m) {
          const p = i + m2;
          const tr = wr * real[p] - wi * imag[p];
          const ti = wr * imag[p] + wi * real[p];
          real[p] = real[i] - tr;
          imag[p] = imag[i] - ti;
          real[i] += tr;
          imag[i] += ti;
        }
      }
    }
  }
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

export function nextPowerOfTwo(n: number): number {
  let size = 1;
  while (size < n) size <<= 1;
  return size;
}

/**
 * Complex DFT of a real signal of any length.
 */
export function dft(signal: ArrayLike<number>): { real: Float64Array; imag: Float64Array } {
  const n = signal.length;
  const real = Float64Array.from(signal);
  const imag = new Float64Array(n);
  if (n <= 1) {
    return { real, imag };
  }

  if (isPowerOfTwo(n)) {
    new FFT(n).forward(real, imag);
    return { real, imag };
  }

  return bluestein(real, imag);
}

function bluestein(real: Float64Array, imag: Float64Array): { real: Float64Array; imag: Float64Array } {
  const n = real.length;
  const m = nextPowerOfTwo(2 * n - 1);
  const fft = new FFT(m);

  // Chirp w[k] = exp(-i*pi*k^2/n). k^2 mod 2n is tracked incrementally
  // ((k+1)^2 = k^2 + 2k + 1) so it never leaves the exact integer range.
  const chirpCos = new Float64Array(n);
  const chirpSin = new Float64Array(n);
  const period = 2 * n;
  let squareMod = 0;
  for (let k = 0; k < n; k++) {
    const angle = (Math.PI * squareMod) / n;
    chirpCos[k] = Math.cos(angle);
    chirpSin[k] = -Math.sin(angle);
    squareMod = (squareMod + 2 * k + 1) % period;
  }

  const aRe = new Float64Array(m);
  const aIm = new Float64Array(m);
  for (let k = 0; k < n; k++) {
    aRe[k] = real[k] * chirpCos[k] - imag[k] * chirpSin[k];
    aIm[k] = real[k] * chirpSin[k] + imag[k] * chirpCos[k];
  }

  const bRe = new Float64Array(m);
  const bIm = new Float64Array(m);
  bRe[0] = chirpCos[0];
  bIm[0] = -chirpSin[0];
  for (let k = 1; k < n; k++) {
    bRe[k] = bRe[m - k] = chirpCos[k];
    bIm[k] = bIm[m - k] = -chirpSin[k];
  }

  fft.forward(aRe, aIm);
  fft.forward(bRe, bIm);
  for (let i = 0; i < m; i++) {
    const re = aRe[i] * bRe[i] - aIm[i] * bIm[i];
    const im = aRe[i] * bIm[i] + aIm[i] * bRe[i];
    aRe[i] = re;
    aIm[i] = im;
  }
  fft.inverse(aRe, aIm);

  const outRe = new Float64Array(n);
  const outIm = new Float64Array(n);
  for (let k = 0; k < n; k++) {
    const re = aRe[k] / m;
    const im = aIm[k] / m;
    outRe[k] = re * chirpCos[k] - im * chirpSin[k];
    outIm[k] = re * chirpSin[k] + im * chirpCos[k];
  }
  return { real: outRe, imag: outIm };
}
