import type { StartPose } from './grid';

export interface PlayerState {
  x: number;
  y: number;
  angle: number;  // radians, unbounded
  tilt: number;   // rows, within [-tiltLimit, tiltLimit]
}

export function createPlayerState(start: StartPose): PlayerState {
  return { x: start.x, y: start.y, angle: start.angle, tilt: 0 };
}
