import { describe, expect, it } from 'vitest';
import { hann, isPowerOfTwo, powerSpectrum } from './fft';

describe('hann', () => {
  it('is zero at both ends and one in the middle', () => {
    const win = hann(5);
    expect(win[0]).toBeCloseTo(0, 12);
    expect(win[2]).toBeCloseTo(1, 12);
    expect(win[4]).toBeCloseTo(0, 12);
  });

  it('is a single one for size 1', () => {
    expect(Array.from(hann(1))).toEqual([1]);
  });
});

describe('powerSpectrum', () => {
  it('puts a cosine on its own spectral line', () => {
    const n = 16;
    const frame = Float64Array.from({ length: n }, (_, t) => Math.cos((2 * Math.PI * 4 * t) / n));
    const { power, freqs } = powerSpectrum(frame, 1600);
    expect(power).toHaveLength(9);
    expect(freqs[4]).toBe(400);
    expect(power[4]).toBeCloseTo(64, 8);
    expect(power[3]).toBeCloseTo(0, 8);
    expect(power[0]).toBeCloseTo(0, 8);
  });

  it('handles sizes that are not powers of two', () => {
    const frame = Float64Array.from({ length: 12 }, (_, t) => Math.sin(t * 0.7) + 0.25 * Math.cos(t * 2.1));
    const padded = new Float64Array(16);
    const { power } = powerSpectrum(frame, 1200);
    expect(power).toHaveLength(7);
    // DC line equals the squared sum in both paths
    const sum = frame.reduce((a, b) => a + b, 0);
    expect(power[0]).toBeCloseTo(sum * sum, 8);
    padded.set(frame);
    expect(powerSpectrum(padded, 1600).power[0]).toBeCloseTo(sum * sum, 8);
  });

  it('detects powers of two', () => {
    expect([1, 2, 4096].map(isPowerOfTwo)).toEqual([true, true, true]);
    expect([0, 3, 1000].map(isPowerOfTwo)).toEqual([false, false, false]);
  });
});
