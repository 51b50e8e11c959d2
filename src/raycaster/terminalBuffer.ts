/**
 * Alternate buffer management
 *
 * Tracks which terminals are in the alternate screen buffer, keyed by
 * terminal, with the owner that switched them. A terminal has at most one
 * owner; acquireSurface refuses a terminal that already has one.
 */

import type { RaycasterTerminal } from './surface';

const bufferOwners = new WeakMap<RaycasterTerminal, string>();

/**
 * Check if a terminal is valid and can accept writes
 */
export function isTerminalValid(terminal: RaycasterTerminal | null | undefined): terminal is RaycasterTerminal {
  if (!terminal) return false;
  // A disposed xterm.js terminal reports a null element
  try {
    return terminal.element !== null;
  } catch {
    return false;
  }
}

/**
 * Enter the alternate screen buffer, hide the cursor and clear.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer or terminal invalid
 */
export function enterAlternateBuffer(terminal: RaycasterTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot enter: terminal invalid (reason: ${reason})`);
    return false;
  }

  const owner = bufferOwners.get(terminal);
  if (owner !== undefined) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${owner}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  bufferOwners.set(terminal, reason);
  return true;
}

/**
 * Leave the alternate screen buffer and show the cursor again.
 *
 * @returns true if buffer was exited, false if not in buffer or terminal invalid
 */
export function exitAlternateBuffer(terminal: RaycasterTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot exit: terminal invalid (reason: ${reason})`);
    return false;
  }

  if (!bufferOwners.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[0m');     // Reset colors
  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  bufferOwners.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: RaycasterTerminal): boolean {
  return bufferOwners.has(terminal);
}
