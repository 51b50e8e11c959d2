import type { Disposable, RaycasterTerminal, TerminalKeyEvent } from './surface';

/**
 * In-memory terminal for tests: records writes, lets tests type keys.
 */
export class FakeTerminal implements RaycasterTerminal {
  cols: number;
  rows: number;
  element: object | null = {};
  writes: string[] = [];
  private listeners: Array<(event: TerminalKeyEvent) => void> = [];

  constructor(cols = 80, rows = 24) {
    this.cols = cols;
    this.rows = rows;
  }

  write(data: string): void {
    this.writes.push(data);
  }

  onKey(listener: (event: TerminalKeyEvent) => void): Disposable {
    this.listeners.push(listener);
    return {
      dispose: () => {
        this.listeners = this.listeners.filter(l => l !== listener);
      },
    };
  }

  /** Type keys by KeyboardEvent.key name */
  press(...keys: string[]): void {
    for (const key of keys) this.emit({ key, domEvent: { key } });
  }

  emit(event: TerminalKeyEvent): void {
    for (const listener of [...this.listeners]) listener(event);
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}
