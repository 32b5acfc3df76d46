import { afterEach, describe, expect, it, vi } from 'vitest';
import { seededRandom } from '../test/helpers';
import type { AudioChunk } from '../types/audio';
import { computeFrequencyBars } from '../utils/spectralBinner';
import { DemoAudioSource } from './DemoAudioSource';

afterEach(() => {
  vi.useRealTimers();
});

describe('DemoAudioSource', () => {
  it('produces full chunks of bounded samples', () => {
    const source = new DemoAudioSource({ chunkSize: 1024, sampleRate: 22050, random: seededRandom(1) });
    const chunk = source.nextChunk();
    expect(chunk.samples).toHaveLength(1024);
    expect(chunk.sampleRate).toBe(22050);
    for (const v of chunk.samples) {
      expect(Math.abs(v)).toBeLessThanOrEqual(1);
    }
  });

  it('is deterministic for a seeded random source', () => {
    const a = new DemoAudioSource({ random: seededRandom(5) });
    const b = new DemoAudioSource({ random: seededRandom(5) });
    expect(a.nextChunk().samples).toEqual(b.nextChunk().samples);
  });

  it('advances time between chunks', () => {
    const source = new DemoAudioSource({ random: seededRandom(2) });
    expect(source.nextChunk().samples).not.toEqual(source.nextChunk().samples);
  });

  it('carries audible content through the binner', () => {
    const source = new DemoAudioSource({ random: seededRandom(3) });
    const bars = computeFrequencyBars(source.nextChunk().samples, 32);
    expect(Math.max(...bars)).toBe(1);
  });

  it('emits a chunk per interval until stopped', () => {
    vi.useFakeTimers();
    const source = new DemoAudioSource({ chunkSize: 441, sampleRate: 44100, random: seededRandom(4) });
    const received: AudioChunk[] = [];
    source.start({ onChunk: (chunk) => received.push(chunk) });
    expect(source.isRunning).toBe(true);
    vi.advanceTimersByTime(35);
    expect(received).toHaveLength(3);
    source.stop();
    vi.advanceTimersByTime(100);
    expect(received).toHaveLength(3);
    expect(source.isRunning).toBe(false);
  });
});
