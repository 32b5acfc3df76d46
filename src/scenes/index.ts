import { MODE_NAMES, type ModeName } from '../types/config';
import { barsScene, type BarsState } from './Bars';
import { circularWaveScene, type CircularWaveState } from './CircularWave';
import { levelsScene, type LevelsState } from './Levels';
import { mirrorCircularScene, type MirrorCircularState } from './MirrorCircular';
import { radialBurstScene, type RadialBurstState } from './RadialBurst';
import type { SceneContext, SceneDefinition, SceneFrame } from './sceneTypes';
import { spectrumScene, type SpectrumState } from './Spectrum';
import { waveformScene, type WaveformState } from './Waveform';

export interface SceneStateMap {
  bars: BarsState;
  spectrum: SpectrumState;
  waveform: WaveformState;
  mirror_circular: MirrorCircularState;
  circular_wave: CircularWaveState;
  levels: LevelsState;
  radial_burst: RadialBurstState;
}

// Tagged union of every mode's state, discriminated by `kind`
export type SceneState = SceneStateMap[ModeName];

export type SceneRegistry = { [K in ModeName]: SceneDefinition<SceneStateMap[K]> };

export const scenes: SceneRegistry = {
  bars: barsScene,
  spectrum: spectrumScene,
  waveform: waveformScene,
  mirror_circular: mirrorCircularScene,
  circular_wave: circularWaveScene,
  levels: levelsScene,
  radial_burst: radialBurstScene,
};

export const sceneList = MODE_NAMES.map((id) => ({ id, name: scenes[id].name }));

export interface MountedScene {
  readonly mode: ModeName;
  readonly state: SceneState;
  render: (frame: SceneFrame) => void;
}

// Fresh state from the mode's own constructor; nothing carries over between modes
export function mountScene<K extends ModeName>(mode: K, context: SceneContext): MountedScene {
  const scene: SceneDefinition<SceneStateMap[K]> = scenes[mode];
  const state = scene.createState(context);
  return {
    mode,
    state,
    render: (frame) => scene.render(frame, state),
  };
}
