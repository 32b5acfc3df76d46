import * as readline from 'node:readline';
import { VisualizerApp } from './App';
import { USAGE, parseCliArgs, type CliOptions } from './cli';
import { DemoAudioSource } from './sources/DemoAudioSource';
import { PcmStreamSource } from './sources/PcmStreamSource';
import { createAudioStore } from './stores/audioStore';
import { createConfigStore, type ConfigStore } from './stores/configStore';
import { JsonFileStorage } from './stores/fileStorage';
import type { AudioSource } from './types/audio';

function terminalSize() {
  const [width, height] = process.stdout.getWindowSize?.() ?? [80, 24];
  return { height, width };
}

function readOptions(): CliOptions | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    process.exitCode = 2;
    return null;
  }
}

function bindKeys(config: ConfigStore, quit: () => void) {
  readline.emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);

  const onKey = (_: string | undefined, key: readline.Key | undefined) => {
    if (!key) return;
    if ((key.ctrl && key.name === 'c') || key.name === 'q') return quit();

    const actions = config.getState();
    switch (key.name) {
      case 'space':
        actions.nextMode();
        break;
      case 'return':
      case 'enter':
        actions.nextColorScheme();
        break;
      case 'w':
        actions.nextEqMode();
        break;
      case 'b':
        actions.toggleAscii();
        break;
      case 'g':
        actions.nextBackground();
        break;
      case 's':
        actions.save();
        break;
    }
  };

  process.stdin.on('keypress', onKey);
  return () => {
    process.stdin.off('keypress', onKey);
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
  };
}

async function main() {
  const options = readOptions();
  if (!options) return;
  if (options.help) {
    console.log(USAGE);
    return;
  }
  for (const warning of options.warnings) console.warn(`⚠️ Ignoring ${warning}`);
  if (options.source === 'stdin' && process.stdin.isTTY) {
    console.error('❌ --source stdin expects PCM piped in, e.g. `parec --format=s16le --channels=1 | tty-spectra --source stdin`');
    process.exitCode = 2;
    return;
  }

  // Changes are written only on [S]
  const storage = new JsonFileStorage(undefined, { autoSave: false });
  const config = createConfigStore({ storage });
  config.getState().updateSettings(options.settings);

  const audio = createAudioStore();
  audio.getState().setSource(options.source);

  const source: AudioSource =
    options.source === 'stdin'
      ? new PcmStreamSource(process.stdin, { sampleRate: options.sampleRate })
      : new DemoAudioSource();

  console.log(`🎵 Starting with ${options.source} source, config at ${storage.path}`);

  const app = new VisualizerApp({ config, audio, output: process.stdout, size: terminalSize });

  let quitting = false;
  const quit = () => {
    if (quitting) return;
    quitting = true;
    source.stop();
    void app.stop();
  };

  // Keys come from the TTY; with PCM on stdin there is no keyboard, only signals
  const unbindKeys = options.source === 'demo' ? bindKeys(config, quit) : () => {};
  const onResize = () => app.terminal.invalidate();
  process.stdout.on('resize', onResize);
  process.once('SIGINT', quit);
  process.once('SIGTERM', quit);

  source.start({
    onChunk: (chunk) => audio.getState().pushChunk(chunk),
    onEnd: () => {
      audio.getState().setStatus('ended');
      quit();
    },
    onError: (error) => {
      audio.getState().setStatus('error', error.message);
      console.error('❌ Audio source failed:', error);
      quit();
    },
  });
  audio.getState().setStatus('running');

  try {
    await app.run();
  } finally {
    source.stop();
    unbindKeys();
    process.stdout.off('resize', onResize);
    process.stdin.pause();
  }

  const { droppedChunks, error } = audio.getState();
  if (droppedChunks > 0) console.log(`🎵 Dropped ${droppedChunks} stale audio chunks`);
  if (error) process.exitCode = 1;
}

main().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exitCode = 1;
});
