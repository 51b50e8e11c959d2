import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseSettings, readSettingsFile, serializeSettings, writeSettingsFile } from './config';
import { degreesToRadians } from './raycaster/settings';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'term-raycaster-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('parseSettings', () => {
  it('keeps valid entries and converts the field of view', () => {
    const { settings, warnings } = parseSettings({ holdWindowMs: 200, fovDegrees: 90 });
    expect(settings).toEqual({ holdWindowMs: 200, fov: degreesToRadians(90) });
    expect(warnings).toEqual([]);
  });

  it('drops unknown and invalid entries with a warning each', () => {
    const { settings, warnings } = parseSettings({ moveStep: 0.1, bogus: 1, fov: 1, tiltLimit: -1 });
    expect(settings).toEqual({ moveStep: 0.1 });
    expect(warnings).toEqual([
      'unknown setting "bogus"',
      'unknown setting "fov"',
      'tiltLimit must be a non-negative integer',
    ]);
  });

  it('rejects anything but an object', () => {
    expect(parseSettings([1, 2]).warnings).toEqual(['settings file must contain a JSON object']);
    expect(parseSettings(null).warnings).toEqual(['settings file must contain a JSON object']);
  });
});

describe('serializeSettings', () => {
  it('stores the field of view in degrees', () => {
    expect(serializeSettings({ fov: Math.PI / 2, moveStep: 0.1 })).toEqual({ fovDegrees: 90, moveStep: 0.1 });
  });
});

describe('settings file', () => {
  it('is empty when the file does not exist', () => {
    expect(readSettingsFile(join(dir, 'missing.json'))).toEqual({ settings: {}, warnings: [] });
  });

  it('ignores a corrupt file', () => {
    const path = join(dir, 'settings.json');
    writeFileSync(path, '{ not json');
    const { settings, warnings } = readSettingsFile(path);
    expect(settings).toEqual({});
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`ignoring ${path}: `)).toBe(true);
  });

  it('writes settings that read back the same', () => {
    const path = join(dir, 'nested', 'settings.json');
    writeSettingsFile({ tiltLimit: 6, fov: Math.PI / 2 }, path);

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ tiltLimit: 6, fovDegrees: 90 });

    const { settings, warnings } = readSettingsFile(path);
    expect(warnings).toEqual([]);
    expect(settings.tiltLimit).toBe(6);
    expect(settings.fov).toBeCloseTo(Math.PI / 2, 12);
  });
});
