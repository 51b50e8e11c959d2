/**
 * Node terminal adapter
 *
 * Maps stdin/stdout to the xterm.js-style terminal interface the
 * raycaster draws on, so the same code runs in a browser terminal and
 * in any terminal emulator.
 */

import type { Readable, Writable } from 'stream';
import type { Disposable, RaycasterTerminal, TerminalKeyEvent } from './raycaster/surface';

const ARROWS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
};

function isFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

/**
 * Split a raw stdin chunk into one sequence per key.
 * Key repeat often delivers several keys in one chunk ("www",
 * "\x1b[A\x1b[A"); each becomes its own event.
 */
export function splitSequences(data: string): string[] {
  const sequences: string[] = [];
  let i = 0;
  while (i < data.length) {
    if (data[i] === '\x1b') {
      const next = data[i + 1];
      if ((next === '[' || next === 'O') && i + 2 < data.length) {
        if (ARROWS[data[i + 2]]) {
          sequences.push(data.slice(i, i + 3));
          i += 3;
          continue;
        }
        // Other CSI sequences (function keys, mouse): up to the final byte
        if (next === '[') {
          let end = i + 2;
          while (end < data.length && !isFinalByte(data.charCodeAt(end))) end++;
          sequences.push(data.slice(i, end + 1));
          i = end + 1;
          continue;
        }
      }
    }
    sequences.push(data[i]);
    i++;
  }
  return sequences;
}

/**
 * DOM KeyboardEvent.key name for one key sequence
 */
export function keyName(sequence: string): string {
  if (sequence.length === 3 && (sequence.startsWith('\x1b[') || sequence.startsWith('\x1bO'))) {
    const arrow = ARROWS[sequence[2]];
    if (arrow) return arrow;
  }
  if (sequence === '\x1b') return 'Escape';
  if (sequence === '\r' || sequence === '\n') return 'Enter';
  if (sequence === '\x7f' || sequence === '\b') return 'Backspace';
  if (sequence === '\t') return 'Tab';
  return sequence;
}

/**
 * Split a raw stdin chunk into key names.
 */
export function parseKeys(data: string): string[] {
  return splitSequences(data).map(keyName);
}

export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalOutput = Writable & {
  columns?: number;
  rows?: number;
};

export interface NodeTerminal extends RaycasterTerminal {
  /** Restore the terminal: cooked mode, main buffer, visible cursor */
  cleanup: () => void;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(
  input: TerminalInput = process.stdin,
  output: TerminalOutput = process.stdout,
): NodeTerminal {
  const keyListeners: Array<(event: TerminalKeyEvent) => void> = [];
  let cleanedUp = false;

  if (input.isTTY) {
    input.setRawMode?.(true);
  }
  input.resume();
  input.setEncoding('utf8');

  input.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    for (const sequence of splitSequences(data)) {
      const event: TerminalKeyEvent = { key: sequence, domEvent: { key: keyName(sequence) } };
      for (const listener of [...keyListeners]) {
        listener(event);
      }
    }
  });

  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    if (input.isTTY) {
      input.setRawMode?.(false);
    }
    input.pause();
    output.write('\x1b[?1049l');
    output.write('\x1b[?25h');
    output.write('\x1b[0m');
  }

  return {
    write: (data: string) => {
      output.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return output.columns || 80; },
    get rows() { return output.rows || 24; },
    element: {}, // Truthy for isTerminalValid check
    onKey: (callback): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    cleanup,
  };
}
