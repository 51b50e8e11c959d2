/**
 * Screen surface
 *
 * Terminal-backed frame buffer. Draws land in memory; commit() writes the
 * whole frame in a single terminal write so a half-drawn frame is never
 * shown. The last column is reserved: writing there makes terminals wrap.
 */

import { BAND_COLORS, RESET, type ColorBand } from './palette';
import type { DrawTarget, ViewSize } from './renderer';
import type { InputSource } from './input';
import { enterAlternateBuffer, exitAlternateBuffer, isTerminalValid } from './terminalBuffer';

export interface Disposable {
  dispose: () => void;
}

/**
 * xterm.js key event: `key` is the byte sequence the terminal would send,
 * `domEvent.key` the KeyboardEvent.key name ("ArrowUp", "w").
 */
export interface TerminalKeyEvent {
  key: string;
  domEvent: { key: string };
}

/**
 * The part of an xterm.js Terminal the raycaster needs.
 * An @xterm/xterm Terminal satisfies it, as does the Node adapter.
 */
export interface RaycasterTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  readonly element?: object | null;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}

export interface ScreenSurface extends DrawTarget, InputSource {
  size(): ViewSize;
  clear(): void;
  commit(): void;
}

interface CellState {
  char: string;
  band: ColorBand | null;
}

const BLANK: CellState = { char: ' ', band: null };

export class TerminalSurface implements ScreenSurface {
  private readonly terminal: RaycasterTerminal;
  private readonly keyQueue: string[] = [];
  private readonly keyListener: Disposable;
  private cells: CellState[][] = [];
  private bufferRows = 0;
  private bufferCols = 0;
  private committedSize: ViewSize | null = null;
  private released = false;

  constructor(terminal: RaycasterTerminal) {
    this.terminal = terminal;
    this.keyListener = terminal.onKey(({ domEvent }) => {
      this.keyQueue.push(domEvent.key);
    });
    this.clear();
  }

  size(): ViewSize {
    return { rows: Math.max(0, this.terminal.rows), cols: Math.max(0, this.terminal.cols) };
  }

  draw(row: number, col: number, char: string, band: ColorBand): void {
    if (row < 0 || row >= this.bufferRows || col < 0 || col >= this.bufferCols - 1) return;
    this.cells[row][col] = { char, band };
  }

  /**
   * Blank the frame buffer, resizing it to the terminal's current size.
   */
  clear(): void {
    const { rows, cols } = this.size();
    this.bufferRows = rows;
    this.bufferCols = cols;
    this.cells = Array.from({ length: rows }, () => Array.from({ length: cols }, () => BLANK));
  }

  commit(): void {
    if (this.released) return;

    const resized = !this.committedSize
      || this.committedSize.rows !== this.bufferRows
      || this.committedSize.cols !== this.bufferCols;

    let output = resized ? '\x1b[2J\x1b[H' : '\x1b[H';
    for (let row = 0; row < this.bufferRows; row++) {
      output += `\x1b[${row + 1};1H${renderRow(this.cells[row], this.bufferCols - 1)}`;
    }

    this.terminal.write(output);
    this.committedSize = { rows: this.bufferRows, cols: this.bufferCols };
  }

  pollInput(): string | null {
    return this.keyQueue.shift() ?? null;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.keyListener.dispose();
    this.keyQueue.length = 0;
    exitAlternateBuffer(this.terminal, 'raycaster stopped');
  }
}

/**
 * Emit one row, switching color only where the band changes.
 */
function renderRow(cells: CellState[], width: number): string {
  let line = '';
  let current: ColorBand | null = null;
  for (let col = 0; col < width; col++) {
    const cell = cells[col];
    if (cell.band !== current) {
      line += cell.band ? BAND_COLORS[cell.band] : RESET;
      current = cell.band;
    }
    line += cell.char;
  }
  return current ? line + RESET : line;
}

/**
 * Take over the terminal for rendering. Throws if the terminal is unusable
 * or another surface still holds it.
 */
export function acquireSurface(terminal: RaycasterTerminal): TerminalSurface {
  if (!isTerminalValid(terminal)) {
    throw new Error('Cannot acquire screen surface: terminal is not available');
  }
  const { cols, rows } = terminal;
  if (cols <= 0 || rows <= 0) {
    throw new Error(`Cannot acquire screen surface: terminal size is ${cols}x${rows}`);
  }
  if (!enterAlternateBuffer(terminal, 'raycaster started')) {
    throw new Error('Cannot acquire screen surface: terminal already in use');
  }
  return new TerminalSurface(terminal);
}
