/**
 * Game modes and difficulty levels
 *
 * A (mode, difficulty) pair resolves to one ModeConfig record. The engine
 * reads only the record; no mode gets its own code path beyond the time
 * limit and maze exit checks.
 */

import { loadMaze } from './spawner';
import type { Difficulty, GameMode, GridSize, ModeConfig } from './types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_GRID: GridSize = { width: 32, height: 18 };

// ============================================================================
// Tables
// ============================================================================

export interface ModeInfo {
  name: string;
  description: string;
  timeLimitMs: number | null;
  deathOnCollision: boolean;
  hasObstacles: boolean;
  hasMaze: boolean;
}

export const MODES: Record<GameMode, ModeInfo> = {
  classic: {
    name: 'Classic',
    description: "Eat, grow, don't hit the walls or yourself",
    timeLimitMs: null,
    deathOnCollision: true,
    hasObstacles: false,
    hasMaze: false,
  },
  timeTrial: {
    name: 'Time Trial',
    description: 'Score as much as you can in 60 seconds',
    timeLimitMs: 60_000,
    deathOnCollision: true,
    hasObstacles: false,
    hasMaze: false,
  },
  obstacle: {
    name: 'Obstacle',
    description: 'Weave around scattered blocks',
    timeLimitMs: null,
    deathOnCollision: true,
    hasObstacles: true,
    hasMaze: false,
  },
  maze: {
    name: 'Maze',
    description: 'Find the exit',
    timeLimitMs: null,
    deathOnCollision: true,
    hasObstacles: false,
    hasMaze: true,
  },
  zen: {
    name: 'Zen',
    description: 'No death, just grow',
    timeLimitMs: null,
    deathOnCollision: false,
    hasObstacles: false,
    hasMaze: false,
  },
};

export interface DifficultyInfo {
  name: string;
  description: string;
  baseIntervalMs: number;
  foodValue: number;
  /** Seconds between power food spawns */
  powerUpIntervalSec: number;
  wrapWalls: boolean;
  obstacleCount: number;
  mazeLayout: string;
}

export const DIFFICULTIES: Record<Difficulty, DifficultyInfo> = {
  easy: {
    name: 'Easy',
    description: 'Slower snake, edges wrap around',
    baseIntervalMs: 120,
    foodValue: 15,
    powerUpIntervalSec: 12,
    wrapWalls: true,
    obstacleCount: 10,
    mazeLayout: 'gallery',
  },
  medium: {
    name: 'Medium',
    description: 'Standard speed, deadly walls',
    baseIntervalMs: 100,
    foodValue: 10,
    powerUpIntervalSec: 15,
    wrapWalls: false,
    obstacleCount: 15,
    mazeLayout: 'gallery',
  },
  hard: {
    name: 'Hard',
    description: 'Faster snake, fewer power-ups',
    baseIntervalMs: 80,
    foodValue: 8,
    powerUpIntervalSec: 20,
    wrapWalls: false,
    obstacleCount: 20,
    mazeLayout: 'labyrinth',
  },
  extreme: {
    name: 'Extreme',
    description: 'Very fast snake, rare power-ups',
    baseIntervalMs: 60,
    foodValue: 5,
    powerUpIntervalSec: 30,
    wrapWalls: false,
    obstacleCount: 28,
    mazeLayout: 'labyrinth',
  },
};

export const MODE_ORDER: GameMode[] = ['classic', 'timeTrial', 'obstacle', 'maze', 'zen'];
export const DIFFICULTY_ORDER: Difficulty[] = ['easy', 'medium', 'hard', 'extreme'];

// ============================================================================
// Name parsing
// ============================================================================

function normalize(name: string): string {
  return name.toLowerCase().replace(/[\s_-]/g, '');
}

export function isGameMode(value: string): value is GameMode {
  return MODE_ORDER.some(m => m === value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTY_ORDER.some(d => d === value);
}

/**
 * Accepts ids and display names in any case: "timeTrial", "time-trial", "Time Trial".
 */
export function parseGameMode(name: string): GameMode {
  const wanted = normalize(name);
  const mode = MODE_ORDER.find(m => normalize(m) === wanted || normalize(MODES[m].name) === wanted);
  if (!mode) {
    throw new ConfigError(`Unknown mode "${name}". Expected one of: ${MODE_ORDER.join(', ')}`);
  }
  return mode;
}

export function parseDifficulty(name: string): Difficulty {
  const wanted = normalize(name);
  const difficulty = DIFFICULTY_ORDER.find(d => normalize(d) === wanted);
  if (!difficulty) {
    throw new ConfigError(`Unknown difficulty "${name}". Expected one of: ${DIFFICULTY_ORDER.join(', ')}`);
  }
  return difficulty;
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveOptions {
  grid?: GridSize;
}

/**
 * Build the record a session runs on. Throws ConfigError for unknown names
 * so bad input never reaches the engine.
 */
export function resolveModeConfig(
  modeName: string,
  difficultyName: string,
  options: ResolveOptions = {},
): ModeConfig {
  const mode = parseGameMode(modeName);
  const difficulty = parseDifficulty(difficultyName);
  const modeInfo = MODES[mode];
  const diffInfo = DIFFICULTIES[difficulty];

  const mazeLayout = modeInfo.hasMaze ? diffInfo.mazeLayout : null;
  let grid = options.grid ?? DEFAULT_GRID;
  if (mazeLayout !== null) {
    // Mazes bring their own board size
    const maze = loadMaze(mazeLayout);
    grid = { width: maze.width, height: maze.height };
  }
  if (!Number.isInteger(grid.width) || !Number.isInteger(grid.height) || grid.width < 5 || grid.height < 5) {
    throw new ConfigError(`Grid must be at least 5x5, got ${grid.width}x${grid.height}`);
  }

  return {
    mode,
    difficulty,
    label: `${modeInfo.name} · ${diffInfo.name}`,
    grid: { width: grid.width, height: grid.height },
    baseIntervalMs: diffInfo.baseIntervalMs,
    timeLimitMs: modeInfo.timeLimitMs,
    deathOnCollision: modeInfo.deathOnCollision,
    // Zen bounces off the edges instead
    wrapWalls: diffInfo.wrapWalls && modeInfo.deathOnCollision,
    mazeLayout,
    obstacleCount: modeInfo.hasObstacles ? diffInfo.obstacleCount : 0,
    foodValue: diffInfo.foodValue,
    growthPerFood: 1,
    powerUpIntervalTicks: Math.round((diffInfo.powerUpIntervalSec * 1000) / diffInfo.baseIntervalMs),
  };
}
