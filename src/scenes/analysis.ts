import { applyAdaptiveEq, type EqState } from '../utils/adaptiveEq';
import { clamp01, normalizePeak, resampleWaveform } from '../utils/audioUtils';
import { computeFrequencyBars } from '../utils/spectralBinner';
import type { SceneFrame } from './sceneTypes';

// Binner → adaptive EQ → bar smoothing, for `count` bands
export function analyzeBands(frame: SceneFrame, count: number, eq: EqState): number[] {
  const raw = computeFrequencyBars(frame.chunk?.samples ?? [], count, {
    sampleRate: frame.chunk?.sampleRate,
    fftSize: frame.fftSize,
    flatten: frame.settings.flatten,
  });
  const equalized = applyAdaptiveEq(raw, eq, frame.eqStrength);
  return frame.smoothers.bars.apply(equalized).map(clamp01);
}

// Decimated waveform on the heavier smoothing channel, scaled to a peak of 1
export function analyzeWaveform(frame: SceneFrame, count: number): number[] {
  const points = resampleWaveform(frame.chunk?.samples ?? [], count);
  return normalizePeak(frame.smoothers.waveform.apply(points));
}
