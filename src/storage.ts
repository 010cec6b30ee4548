/**
 * Local persistence for the CLI: high score and user preferences.
 *
 * Both live as small JSON files under ~/.snake-arcade (or
 * $SNAKE_ARCADE_HOME). Unreadable files count as absent; failed writes
 * are logged and never interrupt play.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { isDifficulty, isGameMode } from './games/snake/modes';
import type { Difficulty, GameMode } from './games/snake/types';
import { DEFAULT_THEME, isValidThemeName, type ThemeName } from './themes';

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

const HIGH_SCORE_FILE = 'highscore.json';
const PREFERENCES_FILE = 'config.json';

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SNAKE_ARCADE_HOME;
  if (override) return resolve(override);
  return resolve(homedir(), '.snake-arcade');
}

function readJson(file: string, tag: string): unknown {
  if (!existsSync(file)) return null;
  try {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    return parsed;
  } catch (err) {
    console.warn(`[${tag}] Ignoring unreadable ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

function writeJson(dir: string, name: string, data: unknown, tag: string): boolean {
  try {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(resolve(dir, name), JSON.stringify(data, null, 2) + '\n');
    return true;
  } catch (err) {
    console.warn(`[${tag}] Could not write ${name}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// High score
// ---------------------------------------------------------------------------

export function loadHighScore(dir: string = getDataDir()): number {
  const data = readJson(resolve(dir, HIGH_SCORE_FILE), 'HighScore');
  if (data === null) return 0;
  if (isRecord(data) && typeof data.highScore === 'number'
    && Number.isInteger(data.highScore) && data.highScore >= 0) {
    return data.highScore;
  }
  console.warn(`[HighScore] Ignoring malformed ${HIGH_SCORE_FILE}`);
  return 0;
}

export function saveHighScore(score: number, dir: string = getDataDir()): boolean {
  return writeJson(dir, HIGH_SCORE_FILE, { highScore: score }, 'HighScore');
}

/**
 * Persist `score` only if it beats the stored one.
 */
export function recordScore(score: number, dir: string = getDataDir()): { highScore: number; isNew: boolean } {
  const previous = loadHighScore(dir);
  if (score <= previous) return { highScore: previous, isNew: false };
  saveHighScore(score, dir);
  return { highScore: score, isNew: true };
}

// ---------------------------------------------------------------------------
// Preferences
// ---------------------------------------------------------------------------

export interface Preferences {
  theme: ThemeName;
  mode: GameMode;
  difficulty: Difficulty;
  sound: boolean;
}

export const DEFAULT_PREFERENCES: Preferences = {
  theme: DEFAULT_THEME,
  mode: 'classic',
  difficulty: 'medium',
  sound: true,
};

/**
 * Read preferences, keeping every valid field and defaulting the rest.
 */
export function loadPreferences(dir: string = getDataDir()): Preferences {
  const data = readJson(resolve(dir, PREFERENCES_FILE), 'Config');
  if (data === null) return { ...DEFAULT_PREFERENCES };
  if (!isRecord(data)) {
    console.warn(`[Config] Ignoring malformed ${PREFERENCES_FILE}`);
    return { ...DEFAULT_PREFERENCES };
  }

  const prefs: Preferences = { ...DEFAULT_PREFERENCES };
  const invalid: string[] = [];

  if (data.theme !== undefined) {
    if (typeof data.theme === 'string' && isValidThemeName(data.theme)) prefs.theme = data.theme;
    else invalid.push('theme');
  }
  if (data.mode !== undefined) {
    if (typeof data.mode === 'string' && isGameMode(data.mode)) prefs.mode = data.mode;
    else invalid.push('mode');
  }
  if (data.difficulty !== undefined) {
    if (typeof data.difficulty === 'string' && isDifficulty(data.difficulty)) prefs.difficulty = data.difficulty;
    else invalid.push('difficulty');
  }
  if (data.sound !== undefined) {
    if (typeof data.sound === 'boolean') prefs.sound = data.sound;
    else invalid.push('sound');
  }

  if (invalid.length > 0) {
    console.warn(`[Config] Ignoring invalid ${invalid.join(', ')} in ${PREFERENCES_FILE}`);
  }
  return prefs;
}

export function savePreferences(prefs: Preferences, dir: string = getDataDir()): boolean {
  return writeJson(dir, PREFERENCES_FILE, prefs, 'Config');
}
