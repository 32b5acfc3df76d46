import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type { PersistStorage, StorageValue } from 'zustand/middleware';
import type { VisualizerSettings } from '../types/config';
import { SETTINGS_VERSION, resolvePersistedSettings } from './persistedSettings';

export interface PersistedConfig {
  settings: VisualizerSettings;
}

export function defaultConfigPath(): string {
  return join(homedir(), '.config', 'tty-spectra', 'config.json');
}

export interface FileStorageOptions {
  // When false, writes are held until `flush()`
  autoSave?: boolean;
}

/**
 * JSON file backend for zustand's persist middleware. Reads go through the
 * settings schema, so legacy and partially broken files still load.
 */
export class JsonFileStorage implements PersistStorage<PersistedConfig> {
  private pending: StorageValue<PersistedConfig> | null = null;
  private readonly autoSave: boolean;

  constructor(
    public readonly path: string = defaultConfigPath(),
    options: FileStorageOptions = {}
  ) {
    this.autoSave = options.autoSave ?? true;
  }

  public getItem(_name: string): StorageValue<PersistedConfig> | null {
    if (!existsSync(this.path)) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf8'));
    } catch (error) {
      console.warn(`⚠️ Ignoring unreadable config at ${this.path}:`, error);
      return null;
    }
    const settings = resolvePersistedSettings(raw);
    if (!settings) {
      console.warn(`⚠️ Config at ${this.path} has no usable settings, using defaults`);
      return null;
    }
    return { state: { settings }, version: SETTINGS_VERSION };
  }

  public setItem(_name: string, value: StorageValue<PersistedConfig>): void {
    this.pending = value;
    if (this.autoSave) this.flush();
  }

  public removeItem(_name: string): void {
    this.pending = null;
  }

  public get hasPendingChanges(): boolean {
    return this.pending !== null;
  }

  // Writes the latest state to disk; returns false when the write failed
  public flush(): boolean {
    if (!this.pending) return true;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(this.pending, null, 2) + '\n');
      this.pending = null;
      return true;
    } catch (error) {
      console.error(`❌ Could not save config to ${this.path}:`, error);
      return false;
    }
  }
}
