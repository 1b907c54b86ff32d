import * as fs from 'fs';
import path from 'path';
import { SettingsSchema } from '../../config/schemas/viewer.js';
import { defaultSettings } from '../../config/defaults/viewer.js';
import type { Settings } from '../../config/types/viewer.js';
import { APP_VERSION, ensureAppDataDir } from '../../config/paths.js';
import { logger } from './logger.js';

export const SETTINGS_FILE_NAME = 'settings.json';

function freshDefaults(): Settings {
  return { ...defaultSettings, quick_swap_streams: [...defaultSettings.quick_swap_streams] };
}

/**
 * Flat key-value settings persisted as JSON. Reads and writes are synchronous
 * so a mutation is on disk when the call returns.
 */
export class SettingsStore {
  private settings: Settings;

  constructor(readonly filePath: string = path.join(ensureAppDataDir(), SETTINGS_FILE_NAME)) {
    this.settings = this.load();
  }

  private load(): Settings {
    if (!fs.existsSync(this.filePath)) {
      logger.debug(`No settings at ${this.filePath}, using defaults`, 'SettingsStore');
      return freshDefaults();
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('settings root is not an object');
      }
      return SettingsSchema.parse(raw);
    } catch (error) {
      logger.error('Error loading settings', 'SettingsStore', error);
      this.backupCorrupted();
      return freshDefaults();
    }
  }

  private backupCorrupted(): void {
    const backup = `${this.filePath}.backup`;
    try {
      fs.renameSync(this.filePath, backup);
      logger.warn(`Moved unreadable settings to ${backup}`, 'SettingsStore');
    } catch (error) {
      logger.error('Could not backup corrupted settings', 'SettingsStore', error);
    }
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.settings[key];
  }

  /** Update one key and save immediately */
  set<K extends keyof Settings>(key: K, value: Settings[K]): boolean {
    this.settings[key] = value;
    return this.save();
  }

  save(): boolean {
    this.settings.app_version = APP_VERSION;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.settings, null, 2), 'utf-8');
      return true;
    } catch (error) {
      logger.error(`Error saving settings to ${this.filePath}`, 'SettingsStore', error);
      return false;
    }
  }

  resetToDefaults(): boolean {
    this.settings = freshDefaults();
    return this.save();
  }

  snapshot(): Readonly<Settings> {
    return { ...this.settings, quick_swap_streams: [...this.settings.quick_swap_streams] };
  }
}
