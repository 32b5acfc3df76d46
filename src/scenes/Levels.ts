import { createEqState, type EqState } from '../utils/adaptiveEq';
import { positionOf } from '../utils/audioUtils';
import { PeakTracker } from '../utils/PeakTracker';
import { analyzeBands } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface LevelsState {
  kind: 'levels';
  eq: EqState;
  peaks: PeakTracker;
}

export const LEVEL_BANDS = 20;
const BANDS_PER_ROW = 4;

// VU-meter rows with peak hold, four meters per row
export const levelsScene: SceneDefinition<LevelsState> = {
  id: 'levels',
  name: 'Levels',
  createState: () => ({ kind: 'levels', eq: createEqState(), peaks: new PeakTracker() }),
  render: (frame, state) => {
    const { grid, settings, color } = frame;
    const levels = analyzeBands(frame, LEVEL_BANDS, state.eq);
    const peaks = state.peaks.update(levels);

    const rows = Math.min(Math.ceil(LEVEL_BANDS / BANDS_PER_ROW), Math.floor(grid.height / 2));
    const meterWidth = Math.floor(grid.width / BANDS_PER_ROW) - 2;
    if (meterWidth <= 0) return;

    const fill = settings.ascii ? '#' : '█';
    const empty = settings.ascii ? '.' : '░';
    const marker = settings.ascii ? '|' : '▏';

    levels.forEach((level, idx) => {
      const row = Math.floor(idx / BANDS_PER_ROW);
      if (row >= rows) return;
      const colStart = (idx % BANDS_PER_ROW) * (meterWidth + 2);
      const filled = Math.floor(level * meterWidth);
      const tint = color(level, positionOf(idx, LEVEL_BANDS));

      for (let x = 0; x < meterWidth; x++) {
        if (x < filled) grid.put(row * 2, colStart + x, fill, tint);
        else grid.put(row * 2, colStart + x, empty, 'white', true);
      }

      const peakAt = Math.min(meterWidth - 1, Math.floor(peaks[idx] * meterWidth));
      if (peaks[idx] > 0 && peakAt >= filled) {
        grid.put(row * 2, colStart + peakAt, marker, color(peaks[idx], positionOf(idx, LEVEL_BANDS)));
      }
    });
  },
};
