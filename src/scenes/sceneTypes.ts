import type { CharGrid } from '../components/CharGrid';
import type { AudioChunk } from '../types/audio';
import type { ModeName, VisualizerSettings } from '../types/config';
import type { ColorFn } from '../utils/colorSchemes';
import type { TemporalSmoother } from '../utils/TemporalSmoother';

// Independent smoothing channels shared by every mode
export interface Smoothers {
  bars: TemporalSmoother;
  waveform: TemporalSmoother;
}

// Everything a mode needs to draw one frame
export interface SceneFrame {
  chunk: AudioChunk | null; // null renders an idle frame
  grid: CharGrid;
  settings: VisualizerSettings;
  eqStrength: number;
  fftSize: number;
  color: ColorFn;
  smoothers: Smoothers;
  frameIndex: number;
}

export interface SceneContext {
  random: () => number;
}

// The complete definition for a mode
export interface SceneDefinition<S> {
  id: ModeName;
  name: string;
  createState: (context: SceneContext) => S;
  render: (frame: SceneFrame, state: S) => void;
}
