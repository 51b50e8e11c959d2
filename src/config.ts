/**
 * Settings file for the CLI
 *
 * ~/.term-raycaster/settings.json holds user overrides. Entries that fail
 * validation are dropped with a warning; an unreadable file is ignored.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { homedir } from 'os';
import {
  checkSetting,
  degreesToRadians,
  isSettingKey,
  radiansToDegrees,
  type RaycasterSettings,
} from './raycaster/settings';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SETTINGS_DIR = resolve(homedir(), '.term-raycaster');
export const SETTINGS_FILE = resolve(SETTINGS_DIR, 'settings.json');

export interface LoadedSettings {
  settings: Partial<RaycasterSettings>;
  warnings: string[];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate a parsed settings object. The file stores the field of view as
 * `fovDegrees`; everything else uses the setting's own name.
 */
export function parseSettings(raw: unknown): LoadedSettings {
  const settings: Partial<RaycasterSettings> = {};
  const warnings: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { settings, warnings: ['settings file must contain a JSON object'] };
  }

  for (const [name, value] of Object.entries(raw)) {
    const key = name === 'fovDegrees' ? 'fov' : name;
    if (!isSettingKey(key) || name === 'fov') {
      warnings.push(`unknown setting "${name}"`);
      continue;
    }
    const resolved = key === 'fov' && typeof value === 'number' ? degreesToRadians(value) : value;
    const error = checkSetting(key, resolved);
    if (error) {
      warnings.push(error);
      continue;
    }
    if (typeof resolved === 'number') settings[key] = resolved;
  }

  return { settings, warnings };
}

/**
 * Inverse of parseSettings: the JSON object written to disk.
 */
export function serializeSettings(settings: Partial<RaycasterSettings>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(settings)) {
    if (typeof value !== 'number') continue;
    if (key === 'fov') out.fovDegrees = Math.round(radiansToDegrees(value) * 100) / 100;
    else out[key] = value;
  }
  return out;
}

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

export function readSettingsFile(path: string = SETTINGS_FILE): LoadedSettings {
  if (!existsSync(path)) return { settings: {}, warnings: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { settings: {}, warnings: [`ignoring ${path}: ${reason}`] };
  }
  return parseSettings(raw);
}

export function writeSettingsFile(settings: Partial<RaycasterSettings>, path: string = SETTINGS_FILE): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(serializeSettings(settings), null, 2) + '\n');
}
