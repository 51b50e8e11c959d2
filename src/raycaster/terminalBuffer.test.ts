import { describe, it, expect, vi, afterEach } from 'vitest';
import { FakeTerminal } from './testTerminal';
import { enterAlternateBuffer, exitAlternateBuffer, isInAlternateBuffer, isTerminalValid } from './terminalBuffer';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('alternate buffer', () => {
  it('enters once and exits once', () => {
    const terminal = new FakeTerminal();

    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(terminal.writes).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);
    expect(isInAlternateBuffer(terminal)).toBe(true);

    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(terminal.writes.slice(3)).toEqual(['\x1b[0m', '\x1b[?1049l', '\x1b[?25h']);
    expect(isInAlternateBuffer(terminal)).toBe(false);
  });

  it('warns instead of entering twice', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = new FakeTerminal();
    enterAlternateBuffer(terminal, 'first');

    expect(enterAlternateBuffer(terminal, 'second')).toBe(false);
    expect(terminal.writes).toHaveLength(3);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Already in buffer (entered by: first), requested by: second');
  });

  it('warns when exiting a buffer it never entered', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = new FakeTerminal();

    expect(exitAlternateBuffer(terminal, 'stray')).toBe(false);
    expect(terminal.writes).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Not in alternate buffer, exit requested by: stray');
  });

  it('treats a disposed terminal as invalid', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = new FakeTerminal();
    terminal.element = null;

    expect(isTerminalValid(terminal)).toBe(false);
    expect(isTerminalValid(undefined)).toBe(false);
    expect(enterAlternateBuffer(terminal, 'disposed')).toBe(false);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Cannot enter: terminal invalid (reason: disposed)');
  });
});
