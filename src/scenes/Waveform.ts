import { positionOf } from '../utils/audioUtils';
import { analyzeWaveform } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface WaveformState {
  kind: 'waveform';
}

// Oscilloscope line, consecutive points joined by vertical runs
export const waveformScene: SceneDefinition<WaveformState> = {
  id: 'waveform',
  name: 'Waveform',
  createState: () => ({ kind: 'waveform' }),
  render: (frame) => {
    const { grid, settings, color } = frame;
    const { height, width } = grid;
    if (height <= 0 || width <= 0) return;

    const wave = analyzeWaveform(frame, width);
    const middle = Math.floor(height / 2);
    const lineGlyph = settings.ascii ? '|' : '│';
    let prevRow: number | null = null;

    for (let col = 0; col < wave.length; col++) {
      const value = wave[col];
      const offset = Math.trunc(value * (middle - 1));
      const row = Math.max(0, Math.min(height - 1, middle - offset));
      const tint = color(Math.abs(value), positionOf(col, width));
      const from = prevRow === null ? row : Math.min(prevRow, row);
      const to = prevRow === null ? row : Math.max(prevRow, row);
      for (let r = from; r <= to; r++) grid.put(r, col, lineGlyph, tint);
      prevRow = row;
    }

    // Dim centre line behind the trace
    const axisGlyph = settings.ascii ? '-' : '─';
    for (let col = 0; col < width; col++) grid.overlay(middle, col, axisGlyph, 'white', true);
  },
};
