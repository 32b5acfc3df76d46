import type { CharGrid } from './components/CharGrid';
import { TerminalRenderer, type Writable } from './components/TerminalRenderer';
import { VisualizationRenderer } from './scenes/VisualizationRenderer';
import type { AudioStore } from './stores/audioStore';
import type { ConfigStore } from './stores/configStore';
import type { AudioChunk, GridSize } from './types/audio';
import type { VisualizerSettings } from './types/config';

const BANNER_MS = 2500;

export interface FrameLoopOptions {
  frame: () => void;
  fps: () => number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const noop = () => undefined;
const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Single-threaded render loop. Each iteration draws one frame, then waits out
 * the rest of the 1000/fps budget. `running` is checked once per frame.
 */
export class FrameLoop {
  private running = false;
  private loop: Promise<void> | null = null;
  private frames = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: FrameLoopOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public get frameCount(): number {
    return this.frames;
  }

  // Resolves when the loop exits; rejects if a frame throws
  public start(): Promise<void> {
    if (this.loop) return this.loop;
    this.running = true;
    this.loop = this.run().finally(() => {
      this.running = false;
      this.loop = null;
    });
    return this.loop;
  }

  // Resolves once the loop has exited; a failed frame is reported through start()
  public async stop(): Promise<void> {
    this.running = false;
    if (this.loop) await this.loop.then(noop, noop);
  }

  private async run(): Promise<void> {
    while (this.running) {
      const started = this.now();
      this.options.frame();
      this.frames++;
      const budget = 1000 / Math.max(1, this.options.fps());
      await this.sleep(Math.max(0, budget - (this.now() - started)));
    }
  }
}

// Short header shown after a setting changes
export function statusText(settings: VisualizerSettings): string {
  const flags: string[] = [];
  if (settings.eqMode === 'medium') flags.push('EQ~');
  if (settings.eqMode === 'strong') flags.push('EQ+');
  if (settings.ascii) flags.push('ASCII');
  if (settings.background !== 'none') flags.push(`BG:${settings.background.toUpperCase()}`);
  const flagText = flags.length > 0 ? ` [${flags.join(' ')}]` : '';
  return `Mode: ${settings.mode.toUpperCase()}${flagText}  Color: ${settings.colorScheme.toUpperCase()}`;
}

export function drawBanner(grid: CharGrid, text: string): void {
  if (grid.height === 0) return;
  const glyphs = [...` ${text} `];
  const start = Math.max(0, Math.floor((grid.width - glyphs.length) / 2));
  glyphs.forEach((glyph, i) => grid.put(0, start + i, glyph, 'cyan'));
}

export interface VisualizerAppOptions {
  config: ConfigStore;
  audio: AudioStore;
  output: Writable;
  size: () => GridSize;
  fftSize?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires the stores to the renderer and the terminal. Settings flow in through
 * a store subscription; audio is pulled once per frame.
 */
export class VisualizerApp {
  public readonly renderer: VisualizationRenderer;
  public readonly terminal = new TerminalRenderer();
  public readonly loop: FrameLoop;
  private readonly now: () => number;
  private lastChunk: AudioChunk | null = null;
  private bannerUntil = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly options: VisualizerAppOptions) {
    this.now = options.now ?? Date.now;
    this.renderer = new VisualizationRenderer({
      settings: options.config.getState().settings,
      fftSize: options.fftSize,
    });
    this.loop = new FrameLoop({
      frame: () => this.frame(),
      fps: () => options.config.getState().settings.fps,
      now: this.now,
      sleep: options.sleep,
    });
  }

  public frame(): CharGrid {
    const audio = this.options.audio.getState();
    // Between chunks the last one is held; once the source stops, frames go idle
    const latest = audio.takeLatest();
    if (latest) this.lastChunk = latest;
    if (audio.status !== 'running') this.lastChunk = latest;

    const grid = this.renderer.renderFrame(this.lastChunk, this.options.size());
    if (this.now() < this.bannerUntil) drawBanner(grid, statusText(this.renderer.currentSettings));
    this.terminal.present(grid, this.options.output);
    return grid;
  }

  public showBanner(): void {
    this.bannerUntil = this.now() + BANNER_MS;
  }

  public run(): Promise<void> {
    this.unsubscribe = this.options.config.subscribe((state) => {
      this.renderer.applySettings(state.settings);
      this.showBanner();
    });
    this.terminal.enter(this.options.output);
    this.showBanner();
    return this.loop.start().finally(() => this.teardown());
  }

  public stop(): Promise<void> {
    return this.loop.stop();
  }

  private teardown(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.terminal.restore(this.options.output);
  }
}
