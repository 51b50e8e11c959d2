import { describe, it, expect, expectTypeOf, vi, afterEach } from 'vitest';
import type { Terminal } from '@xterm/xterm';
import { acquireSurface, TerminalSurface, type RaycasterTerminal } from './surface';
import { createInputState, drainInput, heldKeys } from './input';
import { isInAlternateBuffer } from './terminalBuffer';
import { FakeTerminal } from './testTerminal';

describe('RaycasterTerminal', () => {
  it('is satisfied by an xterm.js Terminal', () => {
    expectTypeOf<Terminal>().toMatchTypeOf<RaycasterTerminal>();
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('acquireSurface', () => {
  it('enters the alternate buffer', () => {
    const terminal = new FakeTerminal();
    acquireSurface(terminal);
    expect(terminal.writes).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);
    expect(isInAlternateBuffer(terminal)).toBe(true);
  });

  it('fails on a disposed terminal', () => {
    const terminal = new FakeTerminal();
    terminal.element = null;
    expect(() => acquireSurface(terminal)).toThrow('Cannot acquire screen surface: terminal is not available');
    expect(terminal.writes).toHaveLength(0);
  });

  it('refuses a terminal another surface still holds', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = new FakeTerminal();
    const first = acquireSurface(terminal);

    expect(() => acquireSurface(terminal)).toThrow('Cannot acquire screen surface: terminal already in use');
    expect(terminal.listenerCount).toBe(1);

    first.release();
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(terminal.listenerCount).toBe(0);

    acquireSurface(terminal);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(terminal.listenerCount).toBe(1);
  });

  it('fails on a terminal with no area', () => {
    const terminal = new FakeTerminal(0, 24);
    expect(() => acquireSurface(terminal)).toThrow('Cannot acquire screen surface: terminal size is 0x24');
  });
});

describe('TerminalSurface', () => {
  it('writes the whole frame in one write', () => {
    const terminal = new FakeTerminal(4, 2);
    const surface = new TerminalSurface(terminal);
    surface.draw(0, 0, 'a', 'ceiling');
    surface.commit();
    expect(terminal.writes).toEqual([
      '\x1b[2J\x1b[H\x1b[1;1H\x1b[36ma\x1b[0m  \x1b[2;1H   ',
    ]);
  });

  it('switches color only between bands and resets at the row end', () => {
    const terminal = new FakeTerminal(4, 1);
    const surface = new TerminalSurface(terminal);
    surface.draw(0, 0, '#', 'wallTop');
    surface.draw(0, 1, '%', 'wallTop');
    surface.draw(0, 2, '.', 'floor');
    surface.commit();
    expect(terminal.writes[0]).toBe('\x1b[2J\x1b[H\x1b[1;1H\x1b[33m#%\x1b[32m.\x1b[0m');
  });

  it('ignores the last column and out-of-bounds cells', () => {
    const terminal = new FakeTerminal(3, 1);
    const surface = new TerminalSurface(terminal);
    surface.draw(0, 2, 'x', 'floor');
    surface.draw(1, 0, 'x', 'floor');
    surface.draw(0, -1, 'x', 'floor');
    surface.commit();
    expect(terminal.writes[0]).toBe('\x1b[2J\x1b[H\x1b[1;1H  ');
  });

  it('only clears the screen again after a resize', () => {
    const terminal = new FakeTerminal(3, 1);
    const surface = new TerminalSurface(terminal);
    surface.commit();
    surface.clear();
    surface.commit();
    expect(terminal.writes[1]).toBe('\x1b[H\x1b[1;1H  ');

    terminal.cols = 2;
    surface.clear();
    surface.commit();
    expect(terminal.writes[2]).toBe('\x1b[2J\x1b[H\x1b[1;1H ');
  });

  it('clear blanks the frame buffer', () => {
    const terminal = new FakeTerminal(3, 1);
    const surface = new TerminalSurface(terminal);
    surface.draw(0, 0, 'x', 'floor');
    surface.clear();
    surface.commit();
    expect(terminal.writes[0]).toBe('\x1b[2J\x1b[H\x1b[1;1H  ');
  });

  it('queues key events in arrival order', () => {
    const terminal = new FakeTerminal();
    const surface = new TerminalSurface(terminal);
    terminal.press('w', 'ArrowLeft');
    expect(surface.pollInput()).toBe('w');
    expect(surface.pollInput()).toBe('ArrowLeft');
    expect(surface.pollInput()).toBeNull();
  });

  it('queues the key name of xterm.js key events', () => {
    const terminal = new FakeTerminal();
    const surface = new TerminalSurface(terminal);
    terminal.emit({ key: '\x1b[A', domEvent: { key: 'ArrowUp' } });
    terminal.emit({ key: '\x1bOD', domEvent: { key: 'ArrowLeft' } });

    const input = createInputState(320);
    expect(drainInput(surface, input, 1000)).toBe(2);
    const held = heldKeys(input, 1000);
    expect(held.lookUp).toBe(true);
    expect(held.turnLeft).toBe(true);
    expect(held.turnRight).toBe(false);
  });

  it('reports the terminal size', () => {
    const terminal = new FakeTerminal(100, 30);
    expect(new TerminalSurface(terminal).size()).toEqual({ rows: 30, cols: 100 });
  });

  it('release restores the terminal and stops listening', () => {
    const terminal = new FakeTerminal(3, 1);
    const surface = acquireSurface(terminal);
    surface.release();
    expect(terminal.writes.slice(-3)).toEqual(['\x1b[0m', '\x1b[?1049l', '\x1b[?25h']);
    expect(terminal.listenerCount).toBe(0);
    expect(isInAlternateBuffer(terminal)).toBe(false);

    const count = terminal.writes.length;
    surface.commit();
    surface.release();
    expect(terminal.writes).toHaveLength(count);
  });
});
