import { createEqState, type EqState } from '../utils/adaptiveEq';
import { positionOf } from '../utils/audioUtils';
import { PeakTracker } from '../utils/PeakTracker';
import { analyzeBands } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface SpectrumState {
  kind: 'spectrum';
  eq: EqState;
  peaks: PeakTracker;
}

// Spectrum analyzer: bars plus falling peak markers
export const spectrumScene: SceneDefinition<SpectrumState> = {
  id: 'spectrum',
  name: 'Spectrum',
  createState: () => ({ kind: 'spectrum', eq: createEqState(), peaks: new PeakTracker() }),
  render: (frame, state) => {
    const { grid, settings, color } = frame;
    const height = grid.height;
    const levels = analyzeBands(frame, grid.width, state.eq);
    const peaks = state.peaks.update(levels);
    const barGlyph = settings.ascii ? '|' : '▆';
    const peakGlyph = settings.ascii ? '-' : '▬';

    levels.forEach((level, col) => {
      const position = positionOf(col, grid.width);
      const barHeight = grid.drawVerticalBar(col, level, height, () => color(level, position), {
        glyphs: [barGlyph],
      });

      const peakHeight = Math.floor(peaks[col] * height);
      const peakRow = height - peakHeight;
      if (peakHeight > barHeight && peakRow >= 0 && peakRow < height) {
        grid.put(peakRow, col, peakGlyph, color(peaks[col], position));
      }
    });
  },
};
