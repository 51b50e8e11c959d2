/**
 * Motion controller
 *
 * Applies one tick of held keys to the player: rotation, then tilt, then
 * movement along the updated facing. A blocked move is rejected outright;
 * there is no sliding along walls.
 */

import { isFloor, type MapGrid } from './grid';
import type { HeldKeys } from './input';
import type { PlayerState } from './player';
import type { RaycasterSettings } from './settings';

type MotionSettings = Pick<RaycasterSettings, 'moveStep' | 'rotationStep' | 'tiltStep' | 'tiltLimit'>;

/**
 * Returns true if the angle, tilt or position changed.
 */
export function updateMotion(
  held: HeldKeys,
  player: PlayerState,
  grid: MapGrid,
  settings: MotionSettings,
): boolean {
  const before = { angle: player.angle, tilt: player.tilt, x: player.x, y: player.y };

  // Rotation
  if (held.turnLeft) player.angle -= settings.rotationStep;
  if (held.turnRight) player.angle += settings.rotationStep;

  // Tilt
  if (held.lookUp) player.tilt = Math.max(-settings.tiltLimit, player.tilt - settings.tiltStep);
  if (held.lookDown) player.tilt = Math.min(settings.tiltLimit, player.tilt + settings.tiltStep);

  // Movement, normalized so diagonals are not faster
  const cos = Math.cos(player.angle);
  const sin = Math.sin(player.angle);
  let moveX = 0;
  let moveY = 0;

  if (held.forward) { moveX += cos; moveY += sin; }
  if (held.back) { moveX -= cos; moveY -= sin; }
  if (held.strafeLeft) { moveX += sin; moveY -= cos; }
  if (held.strafeRight) { moveX -= sin; moveY += cos; }

  if (moveX !== 0 || moveY !== 0) {
    const length = Math.hypot(moveX, moveY);
    const nx = player.x + (moveX / length) * settings.moveStep;
    const ny = player.y + (moveY / length) * settings.moveStep;

    if (isFloor(grid, nx, ny)) {
      player.x = nx;
      player.y = ny;
    }
  }

  return player.angle !== before.angle
    || player.tilt !== before.tilt
    || player.x !== before.x
    || player.y !== before.y;
}
