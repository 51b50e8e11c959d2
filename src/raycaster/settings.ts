/**
 * Raycaster settings
 *
 * Resolved once at startup and frozen; nothing changes them while the
 * loop runs.
 */

export interface RaycasterSettings {
  holdWindowMs: number;    // how long a key counts as held after its last repeat
  moveStep: number;        // map-units per tick
  rotationStep: number;    // radians per tick
  tiltStep: number;        // rows per tick
  tiltLimit: number;       // rows
  fov: number;             // radians
  tickIntervalMs: number;
}

export const DEFAULT_SETTINGS: Readonly<RaycasterSettings> = Object.freeze({
  holdWindowMs: 320,
  moveStep: 0.06,
  rotationStep: 0.04,
  tiltStep: 1,
  tiltLimit: 10,
  fov: Math.PI / 3,        // 60 degree field of view
  tickIntervalMs: 10,
});

export function resolveSettings(...layers: Array<Partial<RaycasterSettings>>): Readonly<RaycasterSettings> {
  let merged: RaycasterSettings = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    merged = { ...merged, ...layer };
  }
  return Object.freeze(merged);
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radiansToDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

type NumericCheck = (value: number) => boolean;

const positive: NumericCheck = v => v > 0;
const nonNegativeInt: NumericCheck = v => Number.isInteger(v) && v >= 0;
const positiveInt: NumericCheck = v => Number.isInteger(v) && v > 0;

const CHECKS: Record<keyof RaycasterSettings, { check: NumericCheck; hint: string }> = {
  holdWindowMs: { check: positive, hint: 'a positive number of milliseconds' },
  moveStep: { check: positive, hint: 'a positive number' },
  rotationStep: { check: positive, hint: 'a positive number of radians' },
  tiltStep: { check: positiveInt, hint: 'a positive integer' },
  tiltLimit: { check: nonNegativeInt, hint: 'a non-negative integer' },
  fov: { check: v => v > 0 && v < Math.PI, hint: 'between 0 and 180 degrees' },
  tickIntervalMs: { check: positive, hint: 'a positive number of milliseconds' },
};

/**
 * Validate one setting; returns an error message or null.
 */
export function checkSetting(key: keyof RaycasterSettings, value: unknown): string | null {
  const { check, hint } = CHECKS[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
    return `${key} must be ${hint}`;
  }
  return null;
}

export function isSettingKey(key: string): key is keyof RaycasterSettings {
  return Object.hasOwn(CHECKS, key);
}
