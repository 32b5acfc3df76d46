import { EQ_MODES, EQ_STRENGTH, cycle, type EqMode } from '../types/config';

const MEAN_RETENTION = 0.995;
const EPSILON = 1e-6;

// Long-run per-band mean, owned by the active visual mode
export interface EqState {
  runningMean: number[] | null;
}

export function createEqState(): EqState {
  return { runningMean: null };
}

// Drop history so the next frame recalibrates from scratch
export function resetEqState(state: EqState): void {
  state.runningMean = null;
}

/**
 * Counteracts persistent spectral imbalance by blending each band with its value
 * relative to a slow running mean. Strength 0 returns the input untouched.
 */
export function applyAdaptiveEq(values: readonly number[], state: EqState, strength: number): number[] {
  if (strength <= 0 || values.length === 0) return [...values];

  const previous = state.runningMean;
  const runningMean = previous === null || previous.length !== values.length
    ? [...values]
    : previous.map((m, i) => MEAN_RETENTION * m + (1 - MEAN_RETENTION) * values[i]);
  state.runningMean = runningMean;

  const adjusted = values.map((v, i) => v / (runningMean[i] + EPSILON));
  let peak = 0;
  for (const v of adjusted) peak = Math.max(peak, v);
  if (peak > 0) {
    for (let i = 0; i < adjusted.length; i++) adjusted[i] /= peak;
  }

  return values.map((v, i) => (1 - strength) * v + strength * adjusted[i]);
}

export function eqStrength(mode: EqMode): number {
  return EQ_STRENGTH[mode];
}

export function cycleEqMode(mode: EqMode): EqMode {
  return cycle(EQ_MODES, mode);
}

// Legacy configs stored a raw strength plus an enabled flag
export function eqModeFromStrength(enabled: boolean, strength: number): EqMode {
  if (!enabled) return 'off';
  return strength >= 0.6 ? 'strong' : 'medium';
}
