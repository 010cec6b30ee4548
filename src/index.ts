/**
 * snake-arcade
 *
 * Snake for xterm.js and the CLI: five modes, four difficulties,
 * six power-ups.
 *
 * Library usage (xterm.js):
 *   import { runSnakeGame, setTheme } from 'snake-arcade';
 *   setTheme('green');
 *   const controller = runSnakeGame(terminal, { mode: 'zen' });
 *
 * Headless usage (rule engine only):
 *   import { resolveModeConfig, createSession, step } from 'snake-arcade';
 *   const state = createSession(resolveModeConfig('classic', 'medium'));
 *   const { outcome, events } = step(state);
 *
 * CLI usage:
 *   npx snake-arcade --mode time-trial
 */

export * from './games';

// Rule engine
export { createSession, queueDirection, step, snapshot, syncGrid, START_LENGTH, type SessionOptions } from './games/snake/engine';
export { createSessionController, type SessionController, type SessionControllerOptions } from './games/snake/session';
export {
  resolveModeConfig,
  parseGameMode,
  parseDifficulty,
  ConfigError,
  MODES,
  DIFFICULTIES,
  MODE_ORDER,
  DIFFICULTY_ORDER,
  DEFAULT_GRID,
  type ModeInfo,
  type DifficultyInfo,
} from './games/snake/modes';
export { POWER_UP_EFFECTS, POWER_UP_TYPES, type PowerUpEffect } from './games/snake/powerups';
export { getMazeIds, loadMaze, type MazeLayout } from './games/snake/spawner';
export type * from './games/snake/types';

// Themes
export { themes, getThemeNames, isValidThemeName, DEFAULT_THEME, type ThemeColors } from './themes';
