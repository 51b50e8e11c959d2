/**
 * Ray marcher
 *
 * Fixed-step march rather than DDA: step length and step count together
 * set both precision and the render range, so they move together.
 */

import { cellAt, type MapGrid } from './grid';

export interface RayHit {
  distance: number;
  hitX: number;
  hitY: number;
  verticalFace: boolean;
}

export const RAY_STEP_LENGTH = 0.03;
export const MAX_RAY_STEPS = 400;
export const FALLBACK_DISTANCE = 15.0;

export function castRay(originX: number, originY: number, angle: number, grid: MapGrid): RayHit {
  const sinA = Math.sin(angle);
  const cosA = Math.cos(angle);

  for (let d = 1; d < MAX_RAY_STEPS; d++) {
    const x = originX + cosA * d * RAY_STEP_LENGTH;
    const y = originY + sinA * d * RAY_STEP_LENGTH;
    const distance = d * RAY_STEP_LENGTH;

    const cell = cellAt(grid, x, y);
    if (cell === undefined) {
      // Escaped the map
      return { distance, hitX: x, hitY: y, verticalFace: false };
    }
    if (cell === 'wall') {
      // Approximates the struck face from the ray's dominant axis
      return { distance, hitX: x, hitY: y, verticalFace: Math.abs(cosA) > Math.abs(sinA) };
    }
  }

  return { distance: FALLBACK_DISTANCE, hitX: originX, hitY: originY, verticalFace: false };
}
