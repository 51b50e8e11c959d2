/**
 * Input debouncer
 *
 * Terminals deliver key repeats but no key-up, so a key counts as held
 * while its last repeat is within the hold window. Timestamps are only
 * ever refreshed, never removed.
 */

export type LogicalKey =
  | 'forward'
  | 'back'
  | 'strafeLeft'
  | 'strafeRight'
  | 'turnLeft'
  | 'turnRight'
  | 'lookUp'
  | 'lookDown'
  | 'quit';

export const LOGICAL_KEYS: readonly LogicalKey[] = [
  'forward', 'back', 'strafeLeft', 'strafeRight',
  'turnLeft', 'turnRight', 'lookUp', 'lookDown', 'quit',
];

export type HeldKeys = Record<LogicalKey, boolean>;

const KEY_BINDINGS: Record<string, LogicalKey> = {
  w: 'forward',
  s: 'back',
  a: 'strafeLeft',
  d: 'strafeRight',
  q: 'quit',
  ArrowLeft: 'turnLeft',
  ArrowRight: 'turnRight',
  ArrowUp: 'lookUp',
  ArrowDown: 'lookDown',
};

export interface InputState {
  readonly holdWindowMs: number;
  readonly lastSeen: Map<LogicalKey, number>;
}

export interface InputSource {
  pollInput(): string | null;
}

export function createInputState(holdWindowMs: number): InputState {
  return { holdWindowMs, lastSeen: new Map() };
}

/**
 * Map a raw key identifier (DOM KeyboardEvent.key style) to a logical key
 */
export function mapRawKey(raw: string): LogicalKey | null {
  return Object.hasOwn(KEY_BINDINGS, raw) ? KEY_BINDINGS[raw] : null;
}

export function recordKey(state: InputState, key: LogicalKey, now: number): void {
  state.lastSeen.set(key, now);
}

export function isHeld(state: InputState, key: LogicalKey, now: number): boolean {
  const seen = state.lastSeen.get(key);
  if (seen === undefined) return false;
  return now - seen <= state.holdWindowMs;
}

export function heldKeys(state: InputState, now: number): HeldKeys {
  const held = (key: LogicalKey) => isHeld(state, key, now);
  return {
    forward: held('forward'),
    back: held('back'),
    strafeLeft: held('strafeLeft'),
    strafeRight: held('strafeRight'),
    turnLeft: held('turnLeft'),
    turnRight: held('turnRight'),
    lookUp: held('lookUp'),
    lookDown: held('lookDown'),
    quit: held('quit'),
  };
}

/**
 * Events available right now; ends at the first empty poll.
 */
export function* pendingEvents(source: InputSource): Generator<string, void, undefined> {
  let raw = source.pollInput();
  while (raw !== null) {
    yield raw;
    raw = source.pollInput();
  }
}

/**
 * Fold every pending event into the debounce state, stamped with the tick time.
 * Returns the number of raw events consumed.
 */
export function drainInput(source: InputSource, state: InputState, now: number): number {
  let count = 0;
  for (const raw of pendingEvents(source)) {
    count++;
    const key = mapRawKey(raw);
    if (key) recordKey(state, key, now);
  }
  return count;
}
