/**
 * Texture bank
 *
 * Wall texture plus ceiling/floor shading ramps.
 * Ramps run dark/far -> bright/near.
 */

export interface Texture {
  readonly rows: readonly string[];
  readonly width: number;
  readonly height: number;
}

export interface TextureBank {
  wall: Texture;
  ceiling: string;
  floor: string;
}

const DEFAULT_WALL = [
  '@@###%%%***',
  '@###%%%***+',
  '##%%**++---',
  '#%%**++---.',
  '%%%**+---..',
  '%%**+--....',
  '%**+--.....',
  '**+--......',
];

const DEFAULT_RAMP = '.-+*%#@';

// Color escapes written by image-to-ASCII converters
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function createTexture(rows: readonly string[]): Texture {
  if (rows.length === 0 || rows[0].length === 0) {
    throw new Error('Texture is empty');
  }
  const width = rows[0].length;
  rows.forEach((row, i) => {
    if (row.length !== width) {
      throw new Error(`Texture row ${i + 1} has ${row.length} characters, expected ${width}`);
    }
  });
  return Object.freeze({ rows: Object.freeze([...rows]), width, height: rows.length });
}

/**
 * Parse a texture file, dropping color escapes and trailing blank lines.
 */
export function parseTexture(lines: readonly string[]): Texture {
  const rows = lines.map(line => line.replace(/\r$/, '').replace(ANSI_PATTERN, ''));
  while (rows.length > 0 && rows[rows.length - 1].trim() === '') rows.pop();
  return createTexture(rows);
}

export function createTextureBank(overrides: Partial<TextureBank> = {}): TextureBank {
  const bank: TextureBank = {
    wall: overrides.wall ?? createTexture(DEFAULT_WALL),
    ceiling: overrides.ceiling ?? DEFAULT_RAMP,
    floor: overrides.floor ?? DEFAULT_RAMP,
  };
  if (bank.ceiling.length === 0 || bank.floor.length === 0) {
    throw new Error('Shading ramps must not be empty');
  }
  return bank;
}

export function sampleTexture(texture: Texture, tx: number, ty: number): string {
  return texture.rows[ty][tx];
}
