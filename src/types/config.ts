export const MODE_NAMES = [
  "bars",
  "spectrum",
  "waveform",
  "mirror_circular",
  "circular_wave",
  "levels",
  "radial_burst",
] as const;

export const COLOR_SCHEMES = [
  "multicolor",
  "blue",
  "green",
  "red",
  "rainbow",
  "fire",
  "prism",
  "heat",
  "ocean",
] as const;

export const EQ_MODES = ["off", "medium", "strong"] as const;

export const BACKGROUND_NAMES = ["none", "dots", "grid", "gradient", "stars", "palm"] as const;

export type ModeName = (typeof MODE_NAMES)[number];
export type ColorSchemeName = (typeof COLOR_SCHEMES)[number];
export type EqMode = (typeof EQ_MODES)[number];
export type BackgroundName = (typeof BACKGROUND_NAMES)[number];

// Terminal colour slots a scheme can pick from
export type ColorId = "blue" | "cyan" | "green" | "yellow" | "red" | "magenta" | "white";

export const EQ_STRENGTH: Record<EqMode, number> = {
  off: 0,
  medium: 0.4,
  strong: 0.65,
};

// Visualizer settings, persisted between runs
export interface VisualizerSettings {
  mode: ModeName;
  colorScheme: ColorSchemeName;
  eqMode: EqMode;
  ascii: boolean; // simplified glyphs instead of block characters
  background: BackgroundName;
  fps: number;
  flatten: boolean; // skip spectral tilt compensation
}

export const DEFAULT_SETTINGS: VisualizerSettings = {
  mode: "bars",
  colorScheme: "multicolor",
  eqMode: "medium",
  ascii: false,
  background: "none",
  fps: 30,
  flatten: false,
};

export interface AudioConfig {
  fftSize: number;
  sampleRate: number;
  chunkSize: number;
  queueCapacity: number;
}

export const DEFAULT_AUDIO_CONFIG: AudioConfig = {
  fftSize: 4096,
  sampleRate: 44100,
  chunkSize: 2048,
  queueCapacity: 8,
};

export function isModeName(value: string): value is ModeName {
  return MODE_NAMES.some((name) => name === value);
}

export function isColorSchemeName(value: string): value is ColorSchemeName {
  return COLOR_SCHEMES.some((name) => name === value);
}

export function isEqMode(value: string): value is EqMode {
  return EQ_MODES.some((name) => name === value);
}

export function isBackgroundName(value: string): value is BackgroundName {
  return BACKGROUND_NAMES.some((name) => name === value);
}

// Step to the next entry of a fixed list, wrapping around
export function cycle<T>(list: readonly T[], current: T): T {
  const index = list.indexOf(current);
  return list[(index + 1) % list.length];
}
