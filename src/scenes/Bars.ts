import { createEqState, type EqState } from '../utils/adaptiveEq';
import { positionOf } from '../utils/audioUtils';
import { analyzeBands } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface BarsState {
  kind: 'bars';
  eq: EqState;
}

// Classic frequency bars, one band per column
export const barsScene: SceneDefinition<BarsState> = {
  id: 'bars',
  name: 'Bars',
  createState: () => ({ kind: 'bars', eq: createEqState() }),
  render: (frame, state) => {
    const { grid, settings, color } = frame;
    const levels = analyzeBands(frame, grid.width, state.eq);

    levels.forEach((level, col) => {
      const position = positionOf(col, grid.width);
      grid.drawVerticalBar(
        col,
        level,
        grid.height,
        // ASCII glyphs carry no shading, so vary the colour up the bar instead
        (relative) => color(settings.ascii ? Math.min(1, level * 0.5 + relative * 0.5) : level, position),
        { ascii: settings.ascii }
      );
    });
  },
};
