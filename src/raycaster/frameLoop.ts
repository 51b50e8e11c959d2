/**
 * Frame loop
 *
 * One tick: drain input -> held state -> motion -> redraw if anything
 * changed -> sleep. The next tick is scheduled with setTimeout after
 * every tick, redraw or not.
 */

import type { Level, MapGrid } from './grid';
import { createInputState, drainInput, heldKeys, type InputState } from './input';
import { updateMotion } from './motion';
import { createPlayerState, type PlayerState } from './player';
import { renderScene, type ViewSize } from './renderer';
import type { RaycasterSettings } from './settings';
import type { ScreenSurface } from './surface';
import type { TextureBank } from './textures';

/**
 * Everything one running view owns. Created per run, never shared.
 */
export interface SimulationContext {
  player: PlayerState;
  input: InputState;
  grid: MapGrid;
  textures: TextureBank;
  settings: Readonly<RaycasterSettings>;
}

export type LoopState = 'idle' | 'active' | 'stopped';
export type TickOutcome = 'continue' | 'quit' | 'fatal' | 'stopped';

export interface FrameLoopOptions {
  /** Clock in milliseconds */
  now?: () => number;
  /** Called once when the loop ends; `error` is set when it ended on a fatal condition */
  onExit?: (error?: Error) => void;
}

export interface FrameLoop {
  readonly state: LoopState;
  /** Frames committed so far */
  readonly frames: number;
  start: () => void;
  tick: (now: number) => TickOutcome;
  stop: () => void;
}

export function createSimulationContext(
  level: Level,
  textures: TextureBank,
  settings: Readonly<RaycasterSettings>,
): SimulationContext {
  return {
    player: createPlayerState(level.start),
    input: createInputState(settings.holdWindowMs),
    grid: level.grid,
    textures,
    settings,
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isEmpty(size: ViewSize): boolean {
  return size.rows <= 0 || size.cols <= 0;
}

export function createFrameLoop(
  surface: ScreenSurface,
  context: SimulationContext,
  options: FrameLoopOptions = {},
): FrameLoop {
  const now = options.now ?? (() => performance.now());

  let state: LoopState = 'idle';
  let started = false;
  let frames = 0;
  let lastSize: ViewSize | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;

  function finish(error?: Error) {
    if (state === 'stopped') return;
    state = 'stopped';
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
    options.onExit?.(error);
  }

  function renderFrame(size: ViewSize) {
    surface.clear();
    renderScene(surface, size, context.player, context.grid, context.textures, context.settings.fov);
    surface.commit();
    lastSize = size;
    frames++;
  }

  function sizeChanged(size: ViewSize): boolean {
    return !lastSize || lastSize.rows !== size.rows || lastSize.cols !== size.cols;
  }

  function tick(time: number): TickOutcome {
    if (state === 'stopped') return 'stopped';
    state = 'active';

    // All of this tick's events land before held state is computed
    drainInput(surface, context.input, time);
    const held = heldKeys(context.input, time);

    if (held.quit) {
      finish();
      return 'quit';
    }

    const changed = updateMotion(held, context.player, context.grid, context.settings);

    const size = surface.size();
    if (isEmpty(size)) {
      finish(new Error(`Screen surface has no drawable area (${size.cols}x${size.rows})`));
      return 'fatal';
    }

    if (changed || sizeChanged(size)) {
      renderFrame(size);
    }

    state = 'idle';
    return 'continue';
  }

  function run() {
    timer = null;
    let outcome: TickOutcome;
    try {
      outcome = tick(now());
    } catch (err) {
      // Already stopped: the throw came from onExit itself
      if (state === 'stopped') throw err;
      finish(toError(err));
      return;
    }
    if (outcome === 'continue') schedule();
  }

  function schedule() {
    timer = setTimeout(run, context.settings.tickIntervalMs);
  }

  return {
    get state() { return state; },
    get frames() { return frames; },
    start: () => {
      if (started || state === 'stopped') return;
      started = true;

      const size = surface.size();
      if (isEmpty(size)) {
        finish(new Error(`Screen surface has no drawable area (${size.cols}x${size.rows})`));
        return;
      }
      try {
        renderFrame(size);
      } catch (err) {
        finish(toError(err));
        return;
      }
      schedule();
    },
    tick,
    stop: () => finish(),
  };
}
