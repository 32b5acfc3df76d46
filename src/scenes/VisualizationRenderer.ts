import { BackgroundLayer } from '../components/backgrounds';
import { CharGrid } from '../components/CharGrid';
import type { AudioChunk, GridSize } from '../types/audio';
import { DEFAULT_AUDIO_CONFIG, DEFAULT_SETTINGS, type VisualizerSettings } from '../types/config';
import { eqStrength, resetEqState } from '../utils/adaptiveEq';
import { colorFnFor } from '../utils/colorSchemes';
import { TemporalSmoother } from '../utils/TemporalSmoother';
import { mountScene, type MountedScene, type SceneState } from './index';
import type { SceneContext, Smoothers } from './sceneTypes';

export const BAR_SMOOTHING = 0.6;
export const WAVEFORM_SMOOTHING = 0.85;

export interface RendererOptions {
  settings?: Partial<VisualizerSettings>;
  fftSize?: number;
  random?: () => number;
}

// Clears EQ history on any mode state that carries one
export function resetSceneEq(state: SceneState): void {
  if ('eq' in state) resetEqState(state.eq);
}

/**
 * Owns the grid and the active mode. Each call to `renderFrame` draws one
 * complete frame for the given display size; presenting it is left to the caller.
 */
export class VisualizationRenderer {
  public readonly grid = new CharGrid(0, 0);
  private readonly context: SceneContext;
  private readonly smoothers: Smoothers = {
    bars: new TemporalSmoother(BAR_SMOOTHING),
    waveform: new TemporalSmoother(WAVEFORM_SMOOTHING),
  };
  private readonly background: BackgroundLayer;
  private readonly fftSize: number;
  private settings: VisualizerSettings;
  private scene: MountedScene;
  private frameIndex = 0;

  constructor(options: RendererOptions = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.fftSize = options.fftSize ?? DEFAULT_AUDIO_CONFIG.fftSize;
    this.context = { random: options.random ?? Math.random };
    this.background = new BackgroundLayer(this.context.random);
    this.scene = mountScene(this.settings.mode, this.context);
  }

  public get currentSettings(): VisualizerSettings {
    return this.settings;
  }

  public get sceneState(): SceneState {
    return this.scene.state;
  }

  public get frameCount(): number {
    return this.frameIndex;
  }

  public applySettings(next: VisualizerSettings): void {
    const previous = this.settings;
    this.settings = { ...next };

    if (next.mode !== previous.mode) {
      // Fresh mode state; smoothing history belongs to the old mode's band count
      this.scene = mountScene(next.mode, this.context);
      this.smoothers.bars.reset();
      this.smoothers.waveform.reset();
    } else if (next.eqMode !== previous.eqMode) {
      resetSceneEq(this.scene.state);
    }
    if (next.background !== previous.background) this.background.reset();
  }

  // Draws one frame; a null chunk gives an idle frame from an all-zero input
  public renderFrame(chunk: AudioChunk | null, size: GridSize): CharGrid {
    this.grid.resize(size.height, size.width);
    this.grid.clear();

    const color = colorFnFor(this.settings.colorScheme);
    this.scene.render({
      chunk,
      grid: this.grid,
      settings: this.settings,
      eqStrength: eqStrength(this.settings.eqMode),
      fftSize: this.fftSize,
      color,
      smoothers: this.smoothers,
      frameIndex: this.frameIndex,
    });
    this.background.draw(this.grid, this.settings.background, { ascii: this.settings.ascii, color });

    this.frameIndex++;
    return this.grid;
  }
}
