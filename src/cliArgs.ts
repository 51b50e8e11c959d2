/**
 * Command-line flags
 */

import { checkSetting, degreesToRadians, type RaycasterSettings } from './raycaster/settings';

export interface CliOptions {
  command: 'run' | 'configure' | 'help';
  mapFile?: string;
  textureFile?: string;
  settings: Partial<RaycasterSettings>;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

const VALUE_FLAGS = new Set(['--map', '--texture', '--hold', '--fov']);

export function parseCliArgs(args: readonly string[]): ParseResult {
  const options: CliOptions = { command: 'run', settings: {} };

  if (args.includes('--help') || args.includes('-h')) {
    return { ok: true, options: { ...options, command: 'help' } };
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (i === 0 && arg === 'configure') {
      options.command = 'configure';
      continue;
    }

    if (!VALUE_FLAGS.has(arg)) {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return { ok: false, error: `Missing value for ${arg}` };
    }
    i++;

    switch (arg) {
      case '--map':
        options.mapFile = value;
        break;
      case '--texture':
        options.textureFile = value;
        break;
      case '--hold': {
        const ms = Number(value);
        const error = checkSetting('holdWindowMs', ms);
        if (error) return { ok: false, error: `--hold: ${error}` };
        options.settings.holdWindowMs = ms;
        break;
      }
      case '--fov': {
        const fov = degreesToRadians(Number(value));
        const error = checkSetting('fov', fov);
        if (error) return { ok: false, error: `--fov: ${error}` };
        options.settings.fov = fov;
        break;
      }
    }
  }

  return { ok: true, options };
}
