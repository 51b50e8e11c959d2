/**
 * Scene renderer
 *
 * One ray per screen column; ceiling, wall slice and floor for that column
 * are drawn from the single cast. The last column is never written.
 */

import { castRay } from './castRay';
import type { MapGrid } from './grid';
import type { ColorBand } from './palette';
import type { PlayerState } from './player';
import { sampleTexture, type TextureBank } from './textures';

export interface DrawTarget {
  draw(row: number, col: number, char: string, band: ColorBand): void;
}

export interface ViewSize {
  rows: number;
  cols: number;
}

// Keeps a zero-distance hit from dividing by zero
const DISTANCE_EPSILON = 1e-6;

// ============================================================================
// INDEX MAPPINGS
// ============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Texture column from the fractional part of the hit coordinate along the face.
 * Truncation keeps negative coordinates pinned to column 0.
 */
export function textureColumn(hitCoord: number, textureWidth: number): number {
  const frac = hitCoord - Math.trunc(hitCoord);
  return clamp(Math.trunc(frac * textureWidth), 0, textureWidth - 1);
}

/**
 * Texture row for a screen row inside the slice [start, end).
 */
export function textureRow(row: number, start: number, end: number, textureHeight: number): number {
  const rel = (row - start) / Math.max(1, end - start);
  return Math.min(textureHeight - 1, Math.trunc(rel * textureHeight));
}

/**
 * Ramp index for a ceiling/floor row `dy` rows away from the tilted horizon.
 * Rows on the far side of the horizon get the darkest character.
 */
export function rampLevel(dy: number, viewHeight: number, rampLength: number): number {
  if (dy <= 0) return 0;
  return Math.min(Math.trunc(viewHeight / (dy + 1) / 2), rampLength - 1);
}

export function wallBand(textureRowIndex: number, textureHeight: number): ColorBand {
  if (textureRowIndex < textureHeight * 0.33) return 'wallTop';
  if (textureRowIndex < textureHeight * 0.66) return 'wallMiddle';
  return 'wallBottom';
}

export interface WallSlice {
  start: number;
  end: number;
}

export function wallSlice(distance: number, viewHeight: number, tilt: number): WallSlice {
  const horizon = Math.floor(viewHeight / 2);
  const wallHeight = Math.floor(viewHeight / (distance + DISTANCE_EPSILON));
  const half = Math.floor(wallHeight / 2);
  return {
    start: clamp(horizon - half - tilt, 0, viewHeight),
    end: clamp(horizon + half - tilt, 0, viewHeight),
  };
}

// ============================================================================
// RENDERING
// ============================================================================

export function renderScene(
  target: DrawTarget,
  size: ViewSize,
  player: PlayerState,
  grid: MapGrid,
  textures: TextureBank,
  fov: number,
): void {
  const { rows: h, cols: w } = size;
  const maxCol = Math.max(0, w - 1);
  const horizon = Math.floor(h / 2);
  const tilt = player.tilt;
  const wall = textures.wall;

  for (let col = 0; col < maxCol; col++) {
    const rayAngle = player.angle - fov / 2 + (col / w) * fov;
    const hit = castRay(player.x, player.y, rayAngle, grid);

    const { start, end } = wallSlice(hit.distance, h, tilt);
    const tx = textureColumn(hit.verticalFace ? hit.hitY : hit.hitX, wall.width);

    // Ceiling
    for (let row = 0; row < start; row++) {
      const lvl = rampLevel(horizon - row + tilt, h, textures.ceiling.length);
      target.draw(row, col, textures.ceiling[lvl], 'ceiling');
    }

    // Wall
    for (let row = start; row < end; row++) {
      const ty = textureRow(row, start, end, wall.height);
      target.draw(row, col, sampleTexture(wall, tx, ty), wallBand(ty, wall.height));
    }

    // Floor
    for (let row = end; row < h; row++) {
      const lvl = rampLevel(row - horizon + tilt, h, textures.floor.length);
      target.draw(row, col, textures.floor[lvl], 'floor');
    }
  }
}
