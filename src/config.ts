import 'dotenv/config';
import { homedir } from 'os';
import { join } from 'path';
import { SettingsSchema, type Settings } from './schemas/settings';
import { readJSON, writeJSONAtomic } from './util/fileCache';
import { describeError, logger } from './util/logger';

export const CFG = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
  HOME_DIR: process.env.SESSION_GUIDE_HOME || join(homedir(), '.session-guide'),

  // Env overrides for the settings file (useful in CI or for a one-off run)
  DECISION_MODEL: process.env.DECISION_MODEL || undefined,
  SUGGESTION_MODEL: process.env.SUGGESTION_MODEL || undefined
};

export const SETTINGS_FILE = 'settings.json';
export const COOLDOWN_FILE = 'cooldown.json';
export const LOG_FILE = 'guide.log';

export function settingsPath(homeDir: string = CFG.HOME_DIR): string {
  return join(homeDir, SETTINGS_FILE);
}

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the flat settings file. A missing or unreadable file, or any field
 * that is absent or has the wrong type, falls back to the default for that field.
 */
export function loadSettings(path: string = settingsPath()): Settings {
  let raw: unknown = {};
  try {
    raw = readJSON(path);
  } catch (error) {
    if (!isMissingFile(error)) {
      logger.warn('Config', `Failed to read ${path}, using defaults: ${describeError(error)}`);
    }
  }

  const settings = SettingsSchema.parse(isRecord(raw) ? raw : {});
  return {
    ...settings,
    decisionModel: CFG.DECISION_MODEL ?? settings.decisionModel,
    suggestionModel: CFG.SUGGESTION_MODEL ?? settings.suggestionModel
  };
}

export function saveSettings(settings: Settings, path: string = settingsPath()): void {
  writeJSONAtomic(path, settings);
}

export function updateSettings(patch: Partial<Settings>, path: string = settingsPath()): Settings {
  const next = SettingsSchema.parse({ ...readStoredSettings(path), ...patch });
  saveSettings(next, path);
  return next;
}

// The stored file without env overrides, so `config` never persists an env value.
function readStoredSettings(path: string): Settings {
  try {
    const raw: unknown = readJSON(path);
    return SettingsSchema.parse(isRecord(raw) ? raw : {});
  } catch {
    return DEFAULT_SETTINGS;
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
