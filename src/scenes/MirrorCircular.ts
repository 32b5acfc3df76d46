import { createEqState, type EqState } from '../utils/adaptiveEq';
import { positionOf } from '../utils/audioUtils';
import { analyzeBands } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface MirrorCircularState {
  kind: 'mirror_circular';
  eq: EqState;
}

// Low frequencies meet in the middle column; bars grow up and down from the centre row
export const mirrorCircularScene: SceneDefinition<MirrorCircularState> = {
  id: 'mirror_circular',
  name: 'Mirror',
  createState: () => ({ kind: 'mirror_circular', eq: createEqState() }),
  render: (frame, state) => {
    const { grid, settings, color } = frame;
    const bandCount = Math.max(1, Math.floor(grid.width / 2));
    const levels = analyzeBands(frame, bandCount, state.eq);
    const center = Math.floor(grid.height / 2);
    const glyph = settings.ascii ? '#' : '█';

    levels.forEach((level, i) => {
      const barHeight = Math.floor(level * center);
      const tint = color(level, positionOf(i, bandCount));
      for (const col of [bandCount - i - 1, bandCount + i]) {
        for (let offset = 0; offset < barHeight; offset++) {
          grid.put(center - offset, col, glyph, tint);
          grid.put(center + offset, col, glyph, tint);
        }
      }
    });
  },
};
