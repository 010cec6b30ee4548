import { describe, it, expect, expectTypeOf, vi, afterEach } from 'vitest';
import type { Terminal } from '@xterm/xterm';
import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
  getVerticalAnchor,
  isInAlternateBuffer,
  isTerminalValid,
  setTheme,
  type GameTerminal,
} from './utils';

function fakeTerminal(element: unknown = {}): GameTerminal & { output: string[] } {
  const output: string[] = [];
  return {
    output,
    cols: 80,
    rows: 24,
    element,
    write: (data: string) => { output.push(data); },
    onKey: () => ({ dispose: () => {} }),
    onResize: () => ({ dispose: () => {} }),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GameTerminal', () => {
  it('is satisfied by an xterm.js Terminal', () => {
    expectTypeOf<Terminal>().toMatchTypeOf<GameTerminal>();
  });
});

describe('alternate buffer', () => {
  it('enters once and exits once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = fakeTerminal();

    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(terminal.output.slice(0, 2)).toEqual(['\x1b[?1049h', '\x1b[?25l']);

    expect(enterAlternateBuffer(terminal, 'again')).toBe(false);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Already in buffer (entered by: test), requested by: again');

    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(exitAlternateBuffer(terminal, 'test')).toBe(false);
    expect(warn).toHaveBeenLastCalledWith('[AlternateBuffer] Not in alternate buffer, exit requested by: test');
  });

  it('refuses a disposed terminal', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = fakeTerminal(null);
    expect(isTerminalValid(terminal)).toBe(false);
    expect(enterAlternateBuffer(terminal, 'test')).toBe(false);
    expect(terminal.output).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Cannot enter: terminal invalid (reason: test)');
  });
});

describe('getVerticalAnchor', () => {
  it('centers content between header and footer', () => {
    expect(getVerticalAnchor(30, 20, { headerRows: 3, footerRows: 2, minTop: 4 })).toBe(6);
    expect(getVerticalAnchor(24, 10)).toBe(8);
  });

  it('never goes above minTop', () => {
    expect(getVerticalAnchor(22, 20, { headerRows: 1, footerRows: 2, minTop: 2 })).toBe(2);
  });
});

describe('theme', () => {
  it('follows setTheme', () => {
    setTheme('amber');
    expect(getCurrentThemeColor()).toBe('\x1b[93m');
    setTheme('cyan');
    expect(getCurrentThemeColor()).toBe('\x1b[96m');
  });
});
