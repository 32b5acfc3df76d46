import { describe, expect, it } from 'vitest';
import { noise, seededRandom, sine } from '../test/helpers';
import type { AudioChunk } from '../types/audio';
import { DEFAULT_SETTINGS, MODE_NAMES, type VisualizerSettings } from '../types/config';
import { scenes, sceneList, type SceneState } from './index';
import { VisualizationRenderer } from './VisualizationRenderer';

const RATE = 44100;
const tone: AudioChunk = { samples: sine(440, RATE, 2048), sampleRate: RATE };
const SIZE = { height: 24, width: 80 };

const blankRows = (height: number, width: number) => new Array<string>(height).fill(' '.repeat(width));

function runningMeanOf(state: SceneState): number[] | null | undefined {
  return 'eq' in state ? state.eq.runningMean : undefined;
}

function settings(patch: Partial<VisualizerSettings>): VisualizerSettings {
  return { ...DEFAULT_SETTINGS, ...patch };
}

describe('scene registry', () => {
  it('has one scene per mode, keyed by its own id', () => {
    for (const mode of MODE_NAMES) expect(scenes[mode].id).toBe(mode);
    expect(sceneList.map((s) => s.id)).toEqual([...MODE_NAMES]);
  });

  it('builds state tagged with the mode name', () => {
    for (const mode of MODE_NAMES) {
      expect(scenes[mode].createState({ random: seededRandom(1) }).kind).toBe(mode);
    }
  });
});

describe('VisualizationRenderer', () => {
  it.each(MODE_NAMES)('renders idle and live frames in %s mode', (mode) => {
    const renderer = new VisualizationRenderer({ settings: { mode }, random: seededRandom(2) });
    expect(() => renderer.renderFrame(null, SIZE)).not.toThrow();
    expect(() => renderer.renderFrame(tone, SIZE)).not.toThrow();
    expect(renderer.grid.height).toBe(24);
    expect(renderer.grid.width).toBe(80);
  });

  it.each(MODE_NAMES)('survives tiny and empty grids in %s mode', (mode) => {
    const renderer = new VisualizationRenderer({ settings: { mode }, random: seededRandom(3) });
    expect(() => renderer.renderFrame(tone, { height: 1, width: 1 })).not.toThrow();
    expect(() => renderer.renderFrame(tone, { height: 0, width: 0 })).not.toThrow();
    expect(() => renderer.renderFrame(tone, { height: 3, width: 200 })).not.toThrow();
  });

  it('draws nothing for silence in bars mode', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars' } });
    renderer.renderFrame(null, SIZE);
    expect(renderer.grid.rows()).toEqual(blankRows(24, 80));
  });

  it('draws bars from the bottom row up for a tone', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars' } });
    renderer.renderFrame(tone, SIZE);
    const rows = renderer.grid.rows();
    expect(rows[23].trim().length).toBeGreaterThan(0);
    expect(rows[23]).toContain('█');
  });

  it('keeps the trace on the middle row for a silent waveform', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'waveform' } });
    renderer.renderFrame(null, { height: 10, width: 8 });
    expect(renderer.grid.rows()[5]).toBe('│'.repeat(8));
  });

  it('adapts to a resize between frames', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'spectrum' } });
    renderer.renderFrame(tone, { height: 20, width: 64 });
    renderer.renderFrame(tone, { height: 20, width: 128 });
    expect(renderer.grid.width).toBe(128);
    expect(runningMeanOf(renderer.sceneState)).toHaveLength(128);
  });

  it('mounts fresh state on a mode change', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars' } });
    renderer.renderFrame(tone, SIZE);
    renderer.applySettings(settings({ mode: 'levels' }));
    expect(renderer.sceneState.kind).toBe('levels');
    expect(runningMeanOf(renderer.sceneState)).toBeNull();
  });

  it('clears EQ history when the EQ mode changes', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars', eqMode: 'medium' } });
    renderer.renderFrame(tone, SIZE);
    expect(runningMeanOf(renderer.sceneState)).toHaveLength(80);
    renderer.applySettings(settings({ mode: 'bars', eqMode: 'strong' }));
    expect(runningMeanOf(renderer.sceneState)).toBeNull();
  });

  it('keeps EQ history on unrelated changes', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars' } });
    renderer.renderFrame(tone, SIZE);
    renderer.applySettings(settings({ mode: 'bars', colorScheme: 'fire' }));
    expect(runningMeanOf(renderer.sceneState)).toHaveLength(80);
  });

  it('draws the background only into empty cells', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'bars', background: 'dots' } });
    renderer.renderFrame(tone, SIZE);
    const rows = renderer.grid.rows();
    expect(rows[0][0]).toBe('·');
    expect(rows[23][0]).not.toBe('·');
  });

  it('feeds particles in radial burst mode', () => {
    const renderer = new VisualizationRenderer({ settings: { mode: 'radial_burst' }, random: seededRandom(4) });
    const hiss: AudioChunk = { samples: noise(2048, seededRandom(5)), sampleRate: RATE };
    for (let i = 0; i < 5; i++) renderer.renderFrame(hiss, SIZE);
    const state = renderer.sceneState;
    expect(state.kind).toBe('radial_burst');
    if (state.kind === 'radial_burst') expect(state.particles.particles.length).toBeGreaterThan(0);
  });

  it('counts frames', () => {
    const renderer = new VisualizationRenderer();
    renderer.renderFrame(null, SIZE);
    renderer.renderFrame(null, SIZE);
    expect(renderer.frameCount).toBe(2);
  });
});
