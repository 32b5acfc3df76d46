import { MathUtils } from 'three';

export type Samples = ArrayLike<number>;

export function mean(values: Samples): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

// Linear-interpolated percentile, p in 0 → 100
export function percentile(values: Samples, p: number): number {
  if (values.length === 0) return 0;
  const sorted = Array.from(values).sort((a, b) => a - b);
  const rank = (MathUtils.clamp(p, 0, 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return MathUtils.lerp(sorted[lower], sorted[upper], rank - lower);
}

export function clamp01(value: number): number {
  return MathUtils.clamp(value, 0, 1);
}

// Gaussian bump centred on `center`, both in normalized band-index units
export function gaussianWeight(position: number, center: number, width: number): number {
  const d = (position - center) / width;
  return Math.exp(-0.5 * d * d);
}

// Relative position of `index` across `count` slots, 0 → 1
export function positionOf(index: number, count: number): number {
  return index / Math.max(1, count - 1);
}

// Pick every n-th sample so the result has exactly `count` entries (zero-padded)
export function resampleWaveform(samples: Samples, count: number): number[] {
  const out = new Array<number>(Math.max(0, count)).fill(0);
  if (samples.length === 0 || count <= 0) return out;
  if (samples.length > count) {
    const step = Math.floor(samples.length / count);
    for (let i = 0; i < count; i++) out[i] = samples[i * step];
  } else {
    for (let i = 0; i < samples.length; i++) out[i] = samples[i];
  }
  return out;
}

// Scale so the largest absolute value becomes 1 (no-op on silence)
export function normalizePeak(values: readonly number[]): number[] {
  let peak = 0;
  for (const v of values) peak = Math.max(peak, Math.abs(v));
  if (peak <= 0) return [...values];
  return values.map((v) => v / peak);
}
