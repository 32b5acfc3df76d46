// One capture cycle of mono samples in [-1, 1]
export interface AudioChunk {
  samples: Float32Array | readonly number[];
  sampleRate: number;
}

export interface GridSize {
  height: number;
  width: number;
}

export interface Particle {
  id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  age: number; // frames elapsed
  maxAge: number;
  burst: number; // 0 → 1, strength of the transient that spawned it
}

export type AudioSourceType = 'demo' | 'stdin';

export interface AudioSourceHandlers {
  onChunk: (chunk: AudioChunk) => void;
  onEnd?: () => void;
  onError?: (error: Error) => void;
}

// Anything that produces chunks on its own schedule
export interface AudioSource {
  readonly type: AudioSourceType;
  start: (handlers: AudioSourceHandlers) => void;
  stop: () => void;
}
