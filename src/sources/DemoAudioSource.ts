import type { AudioChunk, AudioSource, AudioSourceHandlers } from '../types/audio';
import { DEFAULT_AUDIO_CONFIG } from '../types/config';

// A minor, C major, G major, F major; roots drop an octave for the bass voice
const CHORDS: readonly (readonly number[])[] = [
  [220.0, 261.63, 329.63],
  [261.63, 329.63, 392.0],
  [196.0, 246.94, 293.66],
  [174.61, 220.0, 261.63],
];

const BEATS_PER_CHORD = 8;

export interface DemoSourceOptions {
  sampleRate?: number;
  chunkSize?: number;
  bpm?: number;
  random?: () => number;
}

/**
 * Synthetic music without any capture device: a slowly swelling chord
 * progression, a kick on every beat and noisy hats on the off-beats.
 */
export class DemoAudioSource implements AudioSource {
  public readonly type = 'demo' as const;
  private readonly sampleRate: number;
  private readonly chunkSize: number;
  private readonly beatSeconds: number;
  private readonly random: () => number;
  private sampleIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: DemoSourceOptions = {}) {
    this.sampleRate = options.sampleRate ?? DEFAULT_AUDIO_CONFIG.sampleRate;
    this.chunkSize = options.chunkSize ?? DEFAULT_AUDIO_CONFIG.chunkSize;
    this.beatSeconds = 60 / (options.bpm ?? 120);
    this.random = options.random ?? Math.random;
  }

  public get isRunning(): boolean {
    return this.timer !== null;
  }

  // Next block of samples; time advances by exactly one chunk
  public nextChunk(): AudioChunk {
    const samples = new Float32Array(this.chunkSize);
    for (let i = 0; i < this.chunkSize; i++) {
      samples[i] = this.sampleAt((this.sampleIndex + i) / this.sampleRate);
    }
    this.sampleIndex += this.chunkSize;
    return { samples, sampleRate: this.sampleRate };
  }

  private sampleAt(t: number): number {
    const beat = t / this.beatSeconds;
    const beatPhase = beat - Math.floor(beat);
    const chord = CHORDS[Math.floor(beat / BEATS_PER_CHORD) % CHORDS.length];

    // Pad: chord tones with a slow swell
    const swell = 0.6 + 0.4 * Math.sin(2 * Math.PI * 0.125 * t);
    let pad = 0;
    for (const freq of chord) pad += Math.sin(2 * Math.PI * freq * t);
    pad *= (0.12 * swell) / chord.length;

    const bass = 0.18 * Math.sin(2 * Math.PI * (chord[0] / 4) * t);

    // Kick: pitch-dropping sine with a fast decay
    const kickTime = beatPhase * this.beatSeconds;
    const kickFreq = 50 + 90 * Math.exp(-kickTime * 30);
    const kick = 0.55 * Math.exp(-kickTime * 12) * Math.sin(2 * Math.PI * kickFreq * kickTime);

    // Hats: short noise bursts on the off-beat
    const hatTime = ((beatPhase + 0.5) % 1) * this.beatSeconds;
    const hat = 0.08 * Math.exp(-hatTime * 60) * (this.random() * 2 - 1);

    return Math.max(-1, Math.min(1, pad + bass + kick + hat));
  }

  public start({ onChunk }: AudioSourceHandlers): void {
    if (this.timer) return;
    const intervalMs = (this.chunkSize / this.sampleRate) * 1000;
    this.timer = setInterval(() => onChunk(this.nextChunk()), intervalMs);
  }

  public stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}
