import { parseArgs } from 'node:util';
import type { AudioSourceType } from './types/audio';
import {
  BACKGROUND_NAMES,
  COLOR_SCHEMES,
  DEFAULT_AUDIO_CONFIG,
  EQ_MODES,
  MODE_NAMES,
  isBackgroundName,
  isColorSchemeName,
  isEqMode,
  isModeName,
  type VisualizerSettings,
} from './types/config';

export interface CliOptions {
  settings: Partial<VisualizerSettings>;
  source: AudioSourceType;
  sampleRate: number;
  help: boolean;
  warnings: string[];
}

export const USAGE = `Usage: tty-spectra [options]

  --mode <name>        ${MODE_NAMES.join(', ')}
  --scheme <name>      ${COLOR_SCHEMES.join(', ')}
  --eq <mode>          ${EQ_MODES.join(', ')}
  --ascii              simplified glyphs
  --background <name>  ${BACKGROUND_NAMES.join(', ')}
  --fps <n>            frames per second (1-120)
  --flatten            skip spectral tilt compensation
  --source <name>      demo (default) or stdin (s16le mono PCM)
  --rate <hz>          sample rate of the stdin stream
  -h, --help           show this help

Keys: [SPACE] mode  [ENTER] color  [W] EQ  [B] ASCII  [G] background  [S] save  [Q] quit`;

function positiveInt(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : null;
}

// Unknown values are reported and skipped; the saved config fills the gap
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      mode: { type: 'string' },
      scheme: { type: 'string' },
      eq: { type: 'string' },
      ascii: { type: 'boolean' },
      background: { type: 'string' },
      fps: { type: 'string' },
      flatten: { type: 'boolean' },
      source: { type: 'string' },
      rate: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  const settings: Partial<VisualizerSettings> = {};
  const warnings: string[] = [];

  if (values.mode !== undefined) {
    if (isModeName(values.mode)) settings.mode = values.mode;
    else warnings.push(`unknown mode "${values.mode}"`);
  }
  if (values.scheme !== undefined) {
    if (isColorSchemeName(values.scheme)) settings.colorScheme = values.scheme;
    else warnings.push(`unknown color scheme "${values.scheme}"`);
  }
  if (values.eq !== undefined) {
    if (isEqMode(values.eq)) settings.eqMode = values.eq;
    else warnings.push(`unknown EQ mode "${values.eq}"`);
  }
  if (values.background !== undefined) {
    if (isBackgroundName(values.background)) settings.background = values.background;
    else warnings.push(`unknown background "${values.background}"`);
  }
  if (values.fps !== undefined) {
    const fps = positiveInt(values.fps);
    if (fps !== null && fps <= 120) settings.fps = fps;
    else warnings.push(`invalid fps "${values.fps}"`);
  }
  if (values.ascii) settings.ascii = true;
  if (values.flatten) settings.flatten = true;

  let source: AudioSourceType = 'demo';
  if (values.source === 'stdin' || values.source === 'demo') source = values.source;
  else if (values.source !== undefined) warnings.push(`unknown source "${values.source}"`);

  const rate = positiveInt(values.rate);
  if (values.rate !== undefined && rate === null) warnings.push(`invalid rate "${values.rate}"`);

  return {
    settings,
    source,
    sampleRate: rate ?? DEFAULT_AUDIO_CONFIG.sampleRate,
    help: values.help ?? false,
    warnings,
  };
}
