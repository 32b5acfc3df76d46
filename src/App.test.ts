import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FrameLoop, VisualizerApp, drawBanner, statusText } from './App';
import { CharGrid } from './components/CharGrid';
import { RESET } from './components/TerminalRenderer';
import { createAudioStore } from './stores/audioStore';
import { createConfigStore } from './stores/configStore';
import { JsonFileStorage } from './stores/fileStorage';
import { sine } from './test/helpers';
import { DEFAULT_SETTINGS } from './types/config';

class Sink {
  public chunks: string[] = [];
  write(chunk: string) {
    this.chunks.push(chunk);
    return true;
  }
}

describe('FrameLoop', () => {
  it('runs frames until stopped and then resolves', async () => {
    let loop: FrameLoop | null = null;
    let frames = 0;
    loop = new FrameLoop({
      frame: () => {
        frames++;
        if (frames === 3) void loop?.stop();
      },
      fps: () => 30,
      sleep: async () => undefined,
    });
    await loop.start();
    expect(frames).toBe(3);
    expect(loop.frameCount).toBe(3);
    expect(loop.isRunning).toBe(false);
  });

  it('sleeps for what is left of the frame budget', async () => {
    const sleeps: number[] = [];
    let clock = 0;
    const loop = new FrameLoop({
      frame: () => {
        clock += 15;
      },
      fps: () => 20,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 2) void loop.stop();
      },
    });
    await loop.start();
    expect(sleeps).toEqual([35, 35]);
  });

  it('does not sleep when a frame overruns its budget', async () => {
    const sleeps: number[] = [];
    let clock = 0;
    const loop = new FrameLoop({
      frame: () => {
        clock += 80;
      },
      fps: () => 30,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        void loop.stop();
      },
    });
    await loop.start();
    expect(sleeps).toEqual([0]);
  });

  it('rejects from start when a frame throws, while stop still resolves', async () => {
    const loop = new FrameLoop({
      frame: () => {
        throw new Error('frame failed');
      },
      fps: () => 30,
      sleep: async () => undefined,
    });
    const started = loop.start();
    await expect(loop.stop()).resolves.toBeUndefined();
    await expect(started).rejects.toThrow('frame failed');
  });
});

describe('statusText', () => {
  it('summarises the active settings', () => {
    expect(statusText(DEFAULT_SETTINGS)).toBe('Mode: BARS [EQ~]  Color: MULTICOLOR');
    expect(statusText({ ...DEFAULT_SETTINGS, eqMode: 'off', mode: 'levels', colorScheme: 'ocean' })).toBe(
      'Mode: LEVELS  Color: OCEAN'
    );
    expect(statusText({ ...DEFAULT_SETTINGS, eqMode: 'strong', ascii: true, background: 'stars' })).toBe(
      'Mode: BARS [EQ+ ASCII BG:STARS]  Color: MULTICOLOR'
    );
  });
});

describe('drawBanner', () => {
  it('centres the text on the top row', () => {
    const grid = new CharGrid(2, 9);
    drawBanner(grid, 'abc');
    expect(grid.rows()).toEqual(['   abc   ', '         ']);
  });
});

describe('VisualizerApp', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tty-spectra-app-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function setup() {
    const config = createConfigStore({ storage: new JsonFileStorage(join(dir, 'config.json'), { autoSave: false }) });
    const audio = createAudioStore();
    const output = new Sink();
    let clock = 0;
    const app = new VisualizerApp({
      config,
      audio,
      output,
      size: () => ({ height: 12, width: 40 }),
      now: () => clock,
      sleep: async () => undefined,
    });
    return { app, audio, config, output, tick: (ms: number) => (clock += ms) };
  }

  it('shows the status banner for a short while after a change', () => {
    const { app, tick } = setup();
    app.showBanner();
    expect(app.frame().rows()[0]).toContain('Mode: BARS [EQ~]  Color: MULTICOLOR');
    tick(3000);
    expect(app.frame().rows()[0]).not.toContain('Mode:');
  });

  it('renders the newest chunk the audio store holds', () => {
    const { app, audio } = setup();
    audio.getState().setStatus('running');
    audio.getState().pushChunk({ samples: sine(440, 44100, 2048), sampleRate: 44100 });
    expect(app.frame().rows()[11].trim().length).toBeGreaterThan(0);
    expect(audio.getState().takeLatest()).toBeNull();
  });

  it('follows the config store while running and restores the terminal on exit', async () => {
    const { app, config, output } = setup();
    const running = app.run();
    config.getState().nextMode();
    expect(app.renderer.currentSettings.mode).toBe('spectrum');

    await app.stop();
    await running;
    expect(output.chunks[0]).toContain('\x1b[?1049h');
    expect(output.chunks[output.chunks.length - 1]).toBe(RESET + '\x1b[?25h\x1b[?1049l');
  });
});
