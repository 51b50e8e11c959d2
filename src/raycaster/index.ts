/**
 * Terminal Raycaster
 *
 * First-person ASCII view of a tile map. WASD moves and strafes,
 * arrow keys turn and look up/down, Q quits.
 */

import { createDefaultLevel, type Level } from './grid';
import { createFrameLoop, createSimulationContext, type FrameLoop } from './frameLoop';
import { resolveSettings, type RaycasterSettings } from './settings';
import { acquireSurface, type RaycasterTerminal } from './surface';
import { createTextureBank, type TextureBank } from './textures';

export interface RaycasterController {
  stop: () => void;
  isRunning: boolean;
}

export interface RaycasterOptions {
  level?: Level;
  textures?: TextureBank;
  settings?: Partial<RaycasterSettings>;
  /** Clock in milliseconds, for tests and replays */
  now?: () => number;
  /** Called once after the surface has been released */
  onExit?: (error?: Error) => void;
}

/**
 * Take over `terminal` and run the raycaster until Q is pressed or stop() is called.
 * Throws before anything is drawn if the terminal cannot provide a surface.
 */
export function runRaycaster(terminal: RaycasterTerminal, options: RaycasterOptions = {}): RaycasterController {
  const level = options.level ?? createDefaultLevel();
  const textures = options.textures ?? createTextureBank();
  const settings = resolveSettings(options.settings ?? {});

  const surface = acquireSurface(terminal);
  const context = createSimulationContext(level, textures, settings);

  let running = true;
  const loop: FrameLoop = createFrameLoop(surface, context, {
    now: options.now,
    onExit: (error) => {
      running = false;
      surface.release();
      options.onExit?.(error);
    },
  });

  const controller: RaycasterController = {
    stop: () => {
      if (!running) return;
      loop.stop();
    },
    get isRunning() { return running; },
  };

  loop.start();
  return controller;
}

export { createDefaultLevel, parseGrid, parseLevel, cellAt, isFloor } from './grid';
export type { Cell, MapGrid, Level, StartPose } from './grid';
export { createTexture, createTextureBank, parseTexture, sampleTexture } from './textures';
export type { Texture, TextureBank } from './textures';
export { castRay, RAY_STEP_LENGTH, MAX_RAY_STEPS, FALLBACK_DISTANCE } from './castRay';
export type { RayHit } from './castRay';
export { renderScene, textureColumn, textureRow, rampLevel, wallBand, wallSlice } from './renderer';
export type { DrawTarget, ViewSize, WallSlice } from './renderer';
export {
  createInputState,
  mapRawKey,
  recordKey,
  isHeld,
  heldKeys,
  pendingEvents,
  drainInput,
  LOGICAL_KEYS,
} from './input';
export type { LogicalKey, HeldKeys, InputState, InputSource } from './input';
export { createPlayerState } from './player';
export type { PlayerState } from './player';
export { updateMotion } from './motion';
export { createFrameLoop, createSimulationContext } from './frameLoop';
export type { FrameLoop, FrameLoopOptions, LoopState, SimulationContext, TickOutcome } from './frameLoop';
export { TerminalSurface, acquireSurface } from './surface';
export type { RaycasterTerminal, ScreenSurface, Disposable, TerminalKeyEvent } from './surface';
export { BAND_COLORS } from './palette';
export type { ColorBand } from './palette';
export {
  DEFAULT_SETTINGS,
  resolveSettings,
  checkSetting,
  isSettingKey,
  degreesToRadians,
  radiansToDegrees,
} from './settings';
export type { RaycasterSettings } from './settings';
export { enterAlternateBuffer, exitAlternateBuffer, isInAlternateBuffer, isTerminalValid } from './terminalBuffer';
