/**
 * Snake Arcade
 *
 * Terminal front end for the rule engine: mode select, game screen,
 * pause menu, effects and the terminal bell. Game rules live in
 * engine.ts; this file only maps keys to directions and engine events
 * to eye candy.
 */

import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameKeyEvent,
  type GameTerminal,
} from '../utils';
import { dispatchGameQuit, dispatchSessionEnd } from '../gameTransitions';
import { PAUSE_MENU_ITEMS, checkShortcut, navigateMenu, type PauseAction } from '../shared/menu';
import {
  PARTICLE_CHARS,
  addScorePopup,
  clearEffects,
  createEffects,
  spawnFirework,
  spawnParticles,
  triggerFlash,
  triggerShake,
  updateEffects,
} from '../shared/effects';
import { DIFFICULTY_ORDER, MODE_ORDER, resolveModeConfig } from './modes';
import { createSessionController, type SessionController } from './session';
import { POWER_UP_EFFECTS } from './powerups';
import { PORTAL_COLOR, POWER_UP_COLORS, computeLayout, renderGame, renderModeSelect, renderTooSmall, type Overlay } from './render';
import type { Difficulty, Direction, GameEvent, GameMode, ModeConfig, SessionSnapshot } from './types';

export interface SnakeController {
  stop: () => void;
  isRunning: boolean;
}

export interface SnakeGameOptions {
  mode?: GameMode;
  difficulty?: Difficulty;
  /** Best score so far; the host owns persistence */
  highScore?: number;
  /** Ring the terminal bell on eat and when a session ends */
  sound?: boolean;
  /** Start straight into `mode`/`difficulty` instead of the select screen */
  skipModeSelect?: boolean;
  /** Monotonic clock in ms */
  now?: () => number;
  onSessionEnd?: (snap: SessionSnapshot) => void;
}

const RENDER_INTERVAL_MS = 25;
const PUMP_INTERVAL_MS = 5;
const BELL = '\x07';

/**
 * DOM key name to snake direction: arrows and WASD.
 */
export function directionForKey(key: string): Direction | null {
  switch (key) {
    case 'ArrowUp': case 'w': case 'W': return 'up';
    case 'ArrowDown': case 's': case 'S': return 'down';
    case 'ArrowLeft': case 'a': case 'A': return 'left';
    case 'ArrowRight': case 'd': case 'D': return 'right';
    default: return null;
  }
}

export function runSnakeGame(terminal: GameTerminal, options: SnakeGameOptions = {}): SnakeController {
  const now = options.now ?? (() => performance.now());
  const sound = options.sound ?? true;

  let running = true;
  let screen: 'modeSelect' | 'playing' = options.skipModeSelect ? 'playing' : 'modeSelect';
  let modeIndex = Math.max(0, MODE_ORDER.indexOf(options.mode ?? 'classic'));
  let difficultyIndex = Math.max(0, DIFFICULTY_ORDER.indexOf(options.difficulty ?? 'medium'));
  let highScore = options.highScore ?? 0;

  let config: ModeConfig | null = null;
  let session: SessionController | null = null;
  let started = false;
  let finished = false;
  let newHighScore = false;
  let pauseSelection = 0;
  let frame = 0;

  const effects = createEffects();

  const timers: ReturnType<typeof setInterval>[] = [];
  const disposables: { dispose(): void }[] = [];

  function beep(): void {
    if (sound) terminal.write(BELL);
  }

  // ==========================================================================
  // Engine events -> effects
  // ==========================================================================

  function handleEvents(events: GameEvent[], snap: SessionSnapshot): void {
    const head = snap.body[0];
    for (const event of events) {
      switch (event.type) {
        case 'ate': {
          const { x, y } = event.food.position;
          const bonus = event.food.kind === 'bonus';
          addScorePopup(effects.popups, x, y, bonus ? `+${event.points}!` : `+${event.points}`);
          spawnParticles(effects.particles, x, y, bonus ? 10 : 6, '\x1b[1;33m', PARTICLE_CHARS.success);
          triggerFlash(effects.eatFlash, 8);
          triggerShake(effects.shake, bonus ? 6 : 4, 1);
          beep();
          break;
        }
        case 'powerUp':
          addScorePopup(effects.popups, head.x, head.y, POWER_UP_EFFECTS[event.powerUp].label, POWER_UP_COLORS[event.powerUp]);
          spawnParticles(effects.particles, head.x, head.y, 10, POWER_UP_COLORS[event.powerUp], PARTICLE_CHARS.power);
          triggerShake(effects.shake, 8, 2);
          break;
        case 'powerUpExpired':
          addScorePopup(effects.popups, head.x, head.y, 'FADED', '\x1b[2m');
          break;
        case 'bounced':
          triggerShake(effects.shake, 3, 1);
          break;
        case 'teleported':
          spawnParticles(effects.particles, event.from.x, event.from.y, 6, PORTAL_COLOR, PARTICLE_CHARS.power);
          spawnParticles(effects.particles, event.to.x, event.to.y, 6, PORTAL_COLOR, PARTICLE_CHARS.power);
          break;
        case 'wrapped':
          break;
      }
    }
  }

  function handleEnd(snap: SessionSnapshot): void {
    finished = true;
    const head = snap.body[0];
    if (snap.outcome.kind === 'gameOver') {
      triggerShake(effects.shake, 20, 3);
      triggerFlash(effects.deathFlash, 30);
      spawnParticles(effects.particles, head.x, head.y, 12, '\x1b[1;31m', PARTICLE_CHARS.death);
    } else {
      spawnFirework(effects.particles, head.x, head.y);
    }
    beep();

    newHighScore = snap.score > highScore;
    if (newHighScore) highScore = snap.score;

    dispatchSessionEnd(terminal, snap);
    options.onSessionEnd?.(snap);
  }

  // ==========================================================================
  // Screens
  // ==========================================================================

  function startSession(): void {
    config = resolveModeConfig(MODE_ORDER[modeIndex], DIFFICULTY_ORDER[difficultyIndex]);
    clearEffects(effects);
    started = false;
    finished = false;
    newHighScore = false;
    screen = 'playing';
    session = createSessionController({
      config,
      startAt: now(),
      onTick: (result, snap) => handleEvents(result.events, snap),
      onEnd: handleEnd,
    });
    // Frozen until the first key press
    session.pause();
  }

  function restartSession(): void {
    if (!session) return;
    clearEffects(effects);
    finished = false;
    newHighScore = false;
    started = true;
    pauseSelection = 0;
    session.restart(now());
  }

  function openModeSelect(): void {
    session = null;
    config = null;
    clearEffects(effects);
    screen = 'modeSelect';
  }

  function quit(): void {
    haltLoops();
    dispatchGameQuit(terminal);
  }

  function render(): void {
    frame = (frame + 1) % 600;
    updateEffects(effects);

    if (screen === 'modeSelect' || !session || !config) {
      terminal.write(renderModeSelect({
        cols: terminal.cols,
        rows: terminal.rows,
        modeIndex,
        difficultyIndex,
        highScore,
      }));
      return;
    }

    const layout = computeLayout(terminal.cols, terminal.rows, config.grid);
    if (!layout) {
      terminal.write(renderTooSmall(terminal.cols, terminal.rows, config.grid));
      return;
    }

    let overlay: Overlay = { kind: 'none' };
    if (finished) overlay = { kind: 'finished', newHighScore };
    else if (!started) overlay = { kind: 'ready' };
    else if (session.isPaused()) overlay = { kind: 'paused', selection: pauseSelection };

    terminal.write(renderGame(session.snapshot(), { layout, frame, highScore, effects, overlay }));
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  function runPauseAction(action: PauseAction): void {
    if (!session) return;
    switch (action) {
      case 'resume':
        session.resume(now());
        break;
      case 'restart':
        restartSession();
        break;
      case 'modeSelect':
        openModeSelect();
        break;
      case 'quit':
        quit();
        break;
    }
  }

  function handleModeSelectKey(event: GameKeyEvent): void {
    const key = event.domEvent.key;
    if (key.toLowerCase() === 'q') {
      quit();
      return;
    }
    if (key === 'ArrowLeft' || key === 'a') {
      difficultyIndex = (difficultyIndex - 1 + DIFFICULTY_ORDER.length) % DIFFICULTY_ORDER.length;
      return;
    }
    if (key === 'ArrowRight' || key === 'd') {
      difficultyIndex = (difficultyIndex + 1) % DIFFICULTY_ORDER.length;
      return;
    }
    const { newSelection, confirmed } = navigateMenu(modeIndex, MODE_ORDER.length, event.domEvent);
    modeIndex = newSelection;
    if (confirmed) startSession();
  }

  function handleGameKey(event: GameKeyEvent, active: SessionController): void {
    const key = event.domEvent.key;
    const lower = key.toLowerCase();

    if (finished) {
      if (lower === 'r') restartSession();
      else if (lower === 'm') openModeSelect();
      else if (lower === 'q') quit();
      return;
    }

    if (!started) {
      if (lower === 'q') {
        quit();
        return;
      }
      if (key === 'Escape') return;
      started = true;
      active.resume(now());
      const direction = directionForKey(key);
      if (direction) active.queueDirection(direction);
      return;
    }

    if (key === 'Escape') {
      if (active.isPaused()) {
        active.resume(now());
      } else {
        active.pause();
        pauseSelection = 0;
      }
      return;
    }

    if (active.isPaused()) {
      const { newSelection, confirmed } = navigateMenu(pauseSelection, PAUSE_MENU_ITEMS.length, event.domEvent);
      if (newSelection !== pauseSelection) {
        pauseSelection = newSelection;
        return;
      }
      if (confirmed) {
        runPauseAction(PAUSE_MENU_ITEMS[pauseSelection].action);
        return;
      }
      const shortcut = checkShortcut(PAUSE_MENU_ITEMS, lower);
      if (shortcut !== -1) runPauseAction(PAUSE_MENU_ITEMS[shortcut].action);
      return;
    }

    const direction = directionForKey(key);
    if (direction) active.queueDirection(direction);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  function haltLoops(): void {
    running = false;
    for (const timer of timers) clearInterval(timer);
    timers.length = 0;
  }

  const controller: SnakeController = {
    stop: () => {
      haltLoops();
      for (const d of disposables) d.dispose();
      disposables.length = 0;
      if (isInAlternateBuffer(terminal)) exitAlternateBuffer(terminal, 'snake stop');
    },
    get isRunning() { return running; }
  };

  setTimeout(() => {
    if (!running) return;

    enterAlternateBuffer(terminal, 'snake');
    if (screen === 'playing') startSession();

    timers.push(setInterval(render, RENDER_INTERVAL_MS));
    timers.push(setInterval(() => {
      if (screen === 'playing' && session && started) session.advance(now());
    }, PUMP_INTERVAL_MS));

    disposables.push(terminal.onKey((event) => {
      if (!running) return;
      event.domEvent.preventDefault();
      event.domEvent.stopPropagation();

      if (screen === 'playing' && session) {
        handleGameKey(event, session);
      } else {
        handleModeSelectKey(event);
      }
    }));

    disposables.push(terminal.onResize(() => {
      if (running) render();
    }));
  }, 25);

  return controller;
}
