/**
 * Session controller — schedules engine ticks from a monotonic clock.
 *
 * The host calls advance(now) as often as it likes; at most one step runs
 * per call, and only once the current tick interval has elapsed.
 */

import { createSession, queueDirection, snapshot, step } from './engine';
import type { SessionOptions } from './engine';
import type { Direction, ModeConfig, SessionSnapshot, SessionState, TickResult } from './types';

export interface SessionControllerOptions extends SessionOptions {
  config: ModeConfig;
  /** Clock reading the first tick is measured from */
  startAt: number;
  /** Existing session to drive instead of creating one */
  state?: SessionState;
  onTick?: (result: TickResult, snap: SessionSnapshot) => void;
  onEnd?: (snap: SessionSnapshot) => void;
}

export interface SessionController {
  /** Run one step if due. Returns the result, or null when nothing ran. */
  advance(nowMs: number): TickResult | null;
  queueDirection(direction: Direction): void;
  pause(): void;
  resume(nowMs: number): void;
  restart(nowMs: number): void;
  isPaused(): boolean;
  isOver(): boolean;
  snapshot(): SessionSnapshot;
  readonly state: SessionState;
}

export function createSessionController(options: SessionControllerOptions): SessionController {
  const { config, onTick, onEnd } = options;
  const sessionOptions: SessionOptions = { random: options.random, startLength: options.startLength };

  let state = options.state ?? createSession(config, sessionOptions);
  let lastTickAt = options.startAt;
  let paused = false;
  let ended = false;

  function endIfOver(): void {
    if (ended || state.status === 'running') return;
    ended = true;
    onEnd?.(snapshot(state));
  }

  // A session can be born over (no room for the first food)
  endIfOver();

  return {
    get state() {
      return state;
    },

    advance(nowMs: number): TickResult | null {
      if (paused || state.status !== 'running') return null;
      if (nowMs - lastTickAt < state.tickIntervalMs) return null;

      lastTickAt = nowMs;
      const result = step(state);
      onTick?.(result, snapshot(state));
      endIfOver();
      return result;
    },

    queueDirection(direction: Direction): void {
      if (paused) return;
      queueDirection(state, direction);
    },

    pause(): void {
      paused = true;
    },

    resume(nowMs: number): void {
      if (!paused) return;
      paused = false;
      lastTickAt = nowMs;
    },

    restart(nowMs: number): void {
      state = createSession(config, sessionOptions);
      lastTickAt = nowMs;
      paused = false;
      ended = false;
      endIfOver();
    },

    isPaused: () => paused,
    isOver: () => state.status !== 'running',
    snapshot: () => snapshot(state),
  };
}
