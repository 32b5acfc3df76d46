// Symmetric Hann window
export function hann(size: number): Float64Array {
  const win = new Float64Array(size);
  if (size === 1) {
    win[0] = 1;
    return win;
  }
  for (let i = 0; i < size; i++) {
    win[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (size - 1));
  }
  return win;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

// In-place iterative radix-2 Cooley-Tukey; length must be a power of two
export function fftRadix2(re: Float64Array, im: Float64Array): void {
  const n = re.length;

  // Bit-reversal permutation
  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }

  for (let len = 2; len <= n; len <<= 1) {
    const angle = (-2 * Math.PI) / len;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);
    const half = len >> 1;
    for (let start = 0; start < n; start += len) {
      let curRe = 1;
      let curIm = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const tRe = re[b] * curRe - im[b] * curIm;
        const tIm = re[b] * curIm + im[b] * curRe;
        re[b] = re[a] - tRe;
        im[b] = im[a] - tIm;
        re[a] += tRe;
        im[a] += tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }
}

/**
 * One-sided power spectrum |X[k]|² of a real frame, k = 0 … ⌊n/2⌋,
 * with the frequency of each spectral line.
 */
export function powerSpectrum(frame: Float64Array, sampleRate: number): { power: Float64Array; freqs: Float64Array } {
  const n = frame.length;
  const lines = Math.floor(n / 2) + 1;
  const power = new Float64Array(lines);
  const freqs = new Float64Array(lines);
  for (let k = 0; k < lines; k++) freqs[k] = (k * sampleRate) / n;

  if (isPowerOfTwo(n)) {
    const re = Float64Array.from(frame);
    const im = new Float64Array(n);
    fftRadix2(re, im);
    for (let k = 0; k < lines; k++) power[k] = re[k] * re[k] + im[k] * im[k];
    return { power, freqs };
  }

  // Direct DFT for odd window sizes
  for (let k = 0; k < lines; k++) {
    let sumRe = 0;
    let sumIm = 0;
    for (let t = 0; t < n; t++) {
      const angle = (-2 * Math.PI * k * t) / n;
      sumRe += frame[t] * Math.cos(angle);
      sumIm += frame[t] * Math.sin(angle);
    }
    power[k] = sumRe * sumRe + sumIm * sumIm;
  }
  return { power, freqs };
}
