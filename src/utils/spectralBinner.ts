/**
 * Reduces one audio buffer to N logarithmically spaced band intensities in [0, 1].
 *
 * Pipeline: pad/truncate → Hann window → power spectrum → log bands (RMS per band,
 * interpolated at the centre when a band holds no spectral line) → noise floor →
 * spectral tilt → baseline → peak normalisation → gamma.
 */
import { hann, powerSpectrum } from './fft';
import { mean, percentile, type Samples } from './audioUtils';

export const DEFAULT_FFT_SIZE = 4096;
export const DEFAULT_SAMPLE_RATE = 44100;

const F_LOW = 20;
const F_HIGH = 20000;
const NYQUIST_MARGIN = 0.999;

const NOISE_FLOOR_PERCENTILE = 20;
const NOISE_FLOOR_SCALE = 0.15;
const TILT_GAIN = 0.78; // 1.78x ≈ +5 dB at the top band
const TILT_EXPONENT = 1.15;
const BASELINE_RATIO = 0.01;
const GAMMA = 0.7;

export interface BinnerOptions {
  sampleRate?: number;
  fftSize?: number;
  flatten?: boolean; // skip tilt compensation
}

export interface LogBands {
  centers: number[];
  edges: number[]; // centers.length + 1 entries
}

const windowCache = new Map<number, Float64Array>();

function windowFor(size: number): Float64Array {
  let win = windowCache.get(size);
  if (!win) {
    win = hann(size);
    windowCache.set(size, win);
  }
  return win;
}

// First index whose value is >= target (values sorted ascending)
function lowerBound(values: Float64Array, target: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (values[mid] < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Band centres evenly spaced in log-frequency, edges at the geometric midpoints
 * between neighbours. The outer edges are extrapolated by mirroring the nearest
 * inner edge, then everything is clamped to [fLow, fHigh].
 */
export function logBands(count: number, fLow: number, fHigh: number): LogBands {
  const centers: number[] = [];
  const logLow = Math.log10(fLow);
  const logHigh = Math.log10(fHigh);
  for (let i = 0; i < count; i++) {
    const t = count > 1 ? i / (count - 1) : 0;
    centers.push(Math.pow(10, logLow + t * (logHigh - logLow)));
  }

  const edges = new Array<number>(count + 1).fill(0);
  for (let i = 1; i < count; i++) {
    edges[i] = Math.sqrt(centers[i - 1] * centers[i]);
  }
  edges[0] = edges[1] > 0 ? centers[0] * (centers[0] / edges[1]) : fLow;
  edges[count] = edges[count - 1] > 0
    ? centers[count - 1] * (centers[count - 1] / edges[count - 1])
    : fHigh;

  return {
    centers,
    edges: edges.map((e) => Math.min(fHigh, Math.max(fLow, e))),
  };
}

export function computeFrequencyBars(samples: Samples, barCount: number, options: BinnerOptions = {}): number[] {
  if (barCount <= 0) return [];

  const sampleRate = options.sampleRate && options.sampleRate > 0 ? options.sampleRate : DEFAULT_SAMPLE_RATE;
  const fftSize = options.fftSize && options.fftSize > 0 ? Math.floor(options.fftSize) : DEFAULT_FFT_SIZE;

  // 1-2. Zero-pad or truncate, then window
  const win = windowFor(fftSize);
  const frame = new Float64Array(fftSize);
  const used = Math.min(samples.length, fftSize);
  for (let i = 0; i < used; i++) frame[i] = samples[i] * win[i];

  // 3. Power spectrum
  const { power, freqs } = powerSpectrum(frame, sampleRate);

  // 4. Log-spaced bands
  const nyquist = sampleRate / 2;
  let fHigh = Math.min(F_HIGH, nyquist * NYQUIST_MARGIN);
  if (fHigh <= F_LOW) fHigh = nyquist * NYQUIST_MARGIN;
  const { centers, edges } = logBands(barCount, F_LOW, fHigh);

  // 5. RMS per band, or interpolated power at the band centre
  const bars = new Array<number>(barCount).fill(0);
  for (let i = 0; i < barCount; i++) {
    const start = lowerBound(freqs, edges[i]);
    const end = lowerBound(freqs, edges[i + 1]);
    if (end > start) {
      let sum = 0;
      for (let k = start; k < end; k++) sum += power[k];
      bars[i] = Math.sqrt(sum / (end - start));
      continue;
    }

    const center = centers[i];
    const idx = lowerBound(freqs, center);
    let value: number;
    if (idx <= 0) {
      value = power[0];
    } else if (idx >= freqs.length) {
      value = power[power.length - 1];
    } else {
      const f1 = freqs[idx - 1];
      const f2 = freqs[idx];
      const w = (center - f1) / Math.max(1e-9, f2 - f1);
      value = (1 - w) * power[idx - 1] + w * power[idx];
    }
    bars[i] = Math.sqrt(value);
  }

  if (bars.some((v) => v > 0)) {
    // 6. Noise floor
    const floor = percentile(bars, NOISE_FLOOR_PERCENTILE) * NOISE_FLOOR_SCALE;
    for (let i = 0; i < barCount; i++) bars[i] = Math.max(0, bars[i] - floor);

    // 7. Spectral tilt compensation
    if (!options.flatten) {
      for (let i = 0; i < barCount; i++) {
        const t = barCount > 1 ? i / (barCount - 1) : 0;
        bars[i] *= 1 + TILT_GAIN * Math.pow(t, TILT_EXPONENT);
      }
    }

    // 8. Baseline so quiet bands never drop out completely
    const baseline = mean(bars) * BASELINE_RATIO;
    if (baseline > 0) {
      for (let i = 0; i < barCount; i++) bars[i] += baseline;
    }
  }

  // 9-10. Normalise by the loudest band, then lift quiet bands
  let peak = 0;
  for (const v of bars) peak = Math.max(peak, v);
  if (peak > 0) {
    for (let i = 0; i < barCount; i++) {
      const v = bars[i] / peak;
      bars[i] = v > 0 ? Math.pow(v, GAMMA) : 0;
    }
  }

  return bars;
}
