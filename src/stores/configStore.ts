import { persist } from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';
import {
  BACKGROUND_NAMES,
  COLOR_SCHEMES,
  DEFAULT_SETTINGS,
  MODE_NAMES,
  cycle,
  type BackgroundName,
  type ColorSchemeName,
  type EqMode,
  type ModeName,
  type VisualizerSettings,
} from '../types/config';
import { cycleEqMode } from '../utils/adaptiveEq';
import { JsonFileStorage } from './fileStorage';
import { SETTINGS_VERSION } from './persistedSettings';

export const CONFIG_STORE_NAME = 'tty-spectra-settings';

export interface ConfigState {
  settings: VisualizerSettings;

  // Methods
  updateSettings: (settings: Partial<VisualizerSettings>) => void;
  setMode: (mode: ModeName) => void;
  nextMode: () => void;
  setColorScheme: (scheme: ColorSchemeName) => void;
  nextColorScheme: () => void;
  setEqMode: (eqMode: EqMode) => void;
  nextEqMode: () => void;
  toggleAscii: () => void;
  setBackground: (background: BackgroundName) => void;
  nextBackground: () => void;
  save: () => boolean;
}

export interface ConfigStoreOptions {
  storage?: JsonFileStorage;
  initial?: Partial<VisualizerSettings>;
}

export function createConfigStore({ storage = new JsonFileStorage(), initial = {} }: ConfigStoreOptions = {}) {
  return createStore<ConfigState>()(
    persist(
      (set, get) => {
        const patch = (settings: Partial<VisualizerSettings>) =>
          set((state) => ({ settings: { ...state.settings, ...settings } }));

        return {
          settings: { ...DEFAULT_SETTINGS, ...initial },

          updateSettings: patch,
          setMode: (mode) => patch({ mode }),
          nextMode: () => patch({ mode: cycle(MODE_NAMES, get().settings.mode) }),
          setColorScheme: (colorScheme) => patch({ colorScheme }),
          nextColorScheme: () => patch({ colorScheme: cycle(COLOR_SCHEMES, get().settings.colorScheme) }),
          setEqMode: (eqMode) => patch({ eqMode }),
          nextEqMode: () => patch({ eqMode: cycleEqMode(get().settings.eqMode) }),
          toggleAscii: () => patch({ ascii: !get().settings.ascii }),
          setBackground: (background) => patch({ background }),
          nextBackground: () => patch({ background: cycle(BACKGROUND_NAMES, get().settings.background) }),

          save: () => {
            storage.setItem(CONFIG_STORE_NAME, { state: { settings: get().settings }, version: SETTINGS_VERSION });
            return storage.flush();
          },
        };
      },
      {
        name: CONFIG_STORE_NAME,
        version: SETTINGS_VERSION,
        storage,
        partialize: (state) => ({ settings: state.settings }),
      }
    )
  );
}

export type ConfigStore = ReturnType<typeof createConfigStore>;
