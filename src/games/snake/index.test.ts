import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GAME_EVENTS } from '../gameTransitions';
import type { GameKeyEvent, GameTerminal } from '../utils';
import { directionForKey, runSnakeGame } from './index';
import type { SessionSnapshot } from './types';

function keyEvent(key: string): GameKeyEvent {
  return { key, domEvent: { key, preventDefault: () => {}, stopPropagation: () => {} } };
}

function fakeTerminal() {
  const output: string[] = [];
  const keyListeners: ((event: GameKeyEvent) => void)[] = [];
  const terminal: GameTerminal = {
    cols: 80,
    rows: 40,
    write: (data: string) => { output.push(data); },
    onKey: (listener) => {
      keyListeners.push(listener);
      return { dispose: () => { keyListeners.splice(keyListeners.indexOf(listener), 1); } };
    },
    onResize: () => ({ dispose: () => {} }),
  };
  const press = (key: string) => {
    for (const listener of [...keyListeners]) listener(keyEvent(key));
  };
  return { terminal, output, press, keyListeners };
}

describe('directionForKey', () => {
  it('maps arrows and WASD', () => {
    expect(directionForKey('ArrowUp')).toBe('up');
    expect(directionForKey('s')).toBe('down');
    expect(directionForKey('A')).toBe('left');
    expect(directionForKey('ArrowRight')).toBe('right');
    expect(directionForKey('x')).toBeNull();
  });
});

describe('runSnakeGame', () => {
  let host: EventTarget;

  beforeEach(() => {
    vi.useFakeTimers();
    host = new EventTarget();
    vi.stubGlobal('window', host);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it('opens on the mode select screen', () => {
    const { terminal, output } = fakeTerminal();
    const game = runSnakeGame(terminal);
    vi.advanceTimersByTime(50);
    expect(output).toContain('\x1b[?1049h');
    expect(output.some(o => o.includes('SELECT MODE'))).toBe(true);
    game.stop();
    expect(output).toContain('\x1b[?1049l');
  });

  it('plays a session until the wall and reports the end', () => {
    const { terminal, output, press } = fakeTerminal();
    let clock = 0;
    const ended: SessionSnapshot[] = [];
    const hostEnds: Event[] = [];
    host.addEventListener(GAME_EVENTS.SESSION_END, e => hostEnds.push(e));

    const game = runSnakeGame(terminal, {
      mode: 'classic',
      difficulty: 'medium',
      skipModeSelect: true,
      now: () => clock,
      onSessionEnd: snap => ended.push(snap),
    });
    vi.advanceTimersByTime(25);

    // First key starts the session and turns up; the head starts on row 9
    press('ArrowUp');
    for (let tick = 1; tick <= 10; tick++) {
      clock = tick * 100;
      vi.advanceTimersByTime(5);
    }

    expect(ended).toHaveLength(1);
    expect(ended[0].outcome).toEqual({ kind: 'gameOver', reason: 'wall' });
    expect(ended[0].ticks).toBe(10);
    expect(hostEnds).toHaveLength(1);
    expect(output).toContain('\x07');

    vi.advanceTimersByTime(25);
    expect(output.some(o => o.includes('══ GAME OVER ══'))).toBe(true);

    const quits: Event[] = [];
    host.addEventListener(GAME_EVENTS.QUIT, e => quits.push(e));
    press('q');
    expect(quits).toHaveLength(1);
    expect(game.isRunning).toBe(false);
    game.stop();
  });

  it('pauses with escape', () => {
    const { terminal, press } = fakeTerminal();
    let clock = 0;
    const ended: SessionSnapshot[] = [];
    const game = runSnakeGame(terminal, {
      skipModeSelect: true,
      now: () => clock,
      onSessionEnd: snap => ended.push(snap),
    });
    vi.advanceTimersByTime(25);
    press('ArrowUp');
    press('Escape');

    for (let tick = 1; tick <= 20; tick++) {
      clock = tick * 100;
      vi.advanceTimersByTime(5);
    }
    expect(ended).toHaveLength(0);
    game.stop();
  });
});
