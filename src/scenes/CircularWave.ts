import { analyzeWaveform } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface CircularWaveState {
  kind: 'circular_wave';
}

export const CIRCLE_POINTS = 120;

// Circle whose radius follows the waveform
export const circularWaveScene: SceneDefinition<CircularWaveState> = {
  id: 'circular_wave',
  name: 'Circle',
  createState: () => ({ kind: 'circular_wave' }),
  render: (frame) => {
    const { grid, settings, color } = frame;
    const wave = analyzeWaveform(frame, CIRCLE_POINTS);
    const centerY = Math.floor(grid.height / 2);
    const centerX = Math.floor(grid.width / 2);
    const baseRadius = Math.min(Math.floor(grid.height / 2) - 2, Math.floor(grid.width / 4));
    if (baseRadius <= 0) return;
    const glyph = settings.ascii ? 'o' : '●';

    wave.forEach((value, i) => {
      const angle = (i / CIRCLE_POINTS) * 2 * Math.PI;
      const waveOffset = value * baseRadius * 0.4;
      const radius = baseRadius + waveOffset;
      const x = Math.trunc(centerX + radius * Math.cos(angle));
      const y = Math.trunc(centerY + radius * Math.sin(angle) * 0.5); // cells are tall
      const position = i / (CIRCLE_POINTS - 1);
      grid.put(y, x, glyph, color(Math.abs(waveOffset / baseRadius), position));
    });
  },
};
