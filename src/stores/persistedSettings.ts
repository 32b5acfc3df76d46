import { z } from 'zod';
import {
  BACKGROUND_NAMES,
  COLOR_SCHEMES,
  DEFAULT_SETTINGS,
  EQ_MODES,
  MODE_NAMES,
  isModeName,
  type EqMode,
  type ModeName,
  type VisualizerSettings,
} from '../types/config';
import { eqModeFromStrength } from '../utils/adaptiveEq';
import { schemeAt } from '../utils/colorSchemes';

export const SETTINGS_VERSION = 1;

// Each field falls back on its own, so one bad value never discards the rest
export const settingsSchema = z.object({
  mode: z.enum(MODE_NAMES).optional().catch(undefined),
  colorScheme: z.enum(COLOR_SCHEMES).optional().catch(undefined),
  eqMode: z.enum(EQ_MODES).optional().catch(undefined),
  ascii: z.boolean().optional().catch(undefined),
  background: z.enum(BACKGROUND_NAMES).optional().catch(undefined),
  fps: z.number().int().min(1).max(120).optional().catch(undefined),
  flatten: z.boolean().optional().catch(undefined),
});

// Envelope written by zustand's persist middleware
export const persistedConfigSchema = z.object({
  state: z.object({ settings: settingsSchema }),
  version: z.number().optional(),
});

// Flat index-based record from older releases
export const legacyConfigSchema = z.object({
  current_mode: z.number().int().optional().catch(undefined),
  mode_name: z.string().optional().catch(undefined),
  current_color_scheme: z.number().int().optional().catch(undefined),
  adaptive_eq: z.boolean().optional().catch(undefined),
  adaptive_eq_mode: z.number().int().optional().catch(undefined),
  adaptive_eq_strength: z.number().optional().catch(undefined),
  simple_ascii: z.boolean().optional().catch(undefined),
});

export type LegacyConfig = z.infer<typeof legacyConfigSchema>;

const LEGACY_KEYS = Object.keys(legacyConfigSchema.shape);

function clampIndex(index: number, length: number): number {
  return Math.max(0, Math.min(Math.trunc(index), length - 1));
}

// Index 1 used to be a removed mode; everything after it shifted down by one
export function migrateLegacyModeIndex(index: number): ModeName {
  const shifted = index === 1 ? 0 : index > 1 ? index - 1 : index;
  return MODE_NAMES[clampIndex(shifted, MODE_NAMES.length)];
}

function legacyEqMode(legacy: LegacyConfig): EqMode {
  if (legacy.adaptive_eq_mode !== undefined) return EQ_MODES[clampIndex(legacy.adaptive_eq_mode, EQ_MODES.length)];
  if (legacy.adaptive_eq === undefined) return DEFAULT_SETTINGS.eqMode;
  return eqModeFromStrength(legacy.adaptive_eq, legacy.adaptive_eq_strength ?? 0);
}

export function fromLegacyConfig(legacy: LegacyConfig): VisualizerSettings {
  const mode =
    legacy.mode_name !== undefined && isModeName(legacy.mode_name)
      ? legacy.mode_name
      : migrateLegacyModeIndex(legacy.current_mode ?? 0);

  return {
    ...DEFAULT_SETTINGS,
    mode,
    colorScheme: legacy.current_color_scheme !== undefined ? schemeAt(legacy.current_color_scheme) : DEFAULT_SETTINGS.colorScheme,
    eqMode: legacyEqMode(legacy),
    ascii: legacy.simple_ascii ?? DEFAULT_SETTINGS.ascii,
  };
}

function withDefaults(partial: z.infer<typeof settingsSchema>): VisualizerSettings {
  return {
    mode: partial.mode ?? DEFAULT_SETTINGS.mode,
    colorScheme: partial.colorScheme ?? DEFAULT_SETTINGS.colorScheme,
    eqMode: partial.eqMode ?? DEFAULT_SETTINGS.eqMode,
    ascii: partial.ascii ?? DEFAULT_SETTINGS.ascii,
    background: partial.background ?? DEFAULT_SETTINGS.background,
    fps: partial.fps ?? DEFAULT_SETTINGS.fps,
    flatten: partial.flatten ?? DEFAULT_SETTINGS.flatten,
  };
}

/**
 * Reads whatever was found on disk: the current persist envelope, a bare
 * settings object, or a legacy record. Returns null when nothing usable is there.
 */
export function resolvePersistedSettings(raw: unknown): VisualizerSettings | null {
  const envelope = persistedConfigSchema.safeParse(raw);
  if (envelope.success) return withDefaults(envelope.data.state.settings);

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;

  if (LEGACY_KEYS.some((key) => key in raw)) {
    const legacy = legacyConfigSchema.safeParse(raw);
    if (legacy.success) return fromLegacyConfig(legacy.data);
  }

  const bare = settingsSchema.safeParse(raw);
  return bare.success ? withDefaults(bare.data) : null;
}
